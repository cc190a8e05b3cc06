import { StructValueError } from "../../../binary/struct";
import { uint8_concat } from "../../../binary/uint8-array";
import { IPV4OptionError, IPV4_OPTION_ERROR } from "./errors";
import { ROUTE_ADDRESS, ROUTE_ADDRESS_LENGTH, ROUTE_HEADER_LENGTH, ROUTE_OPTION } from "./route";
import { SECURITY_OPTION, SECURITY_OPTION_LENGTH } from "./security";
import { STREAM_ID_OPTION, STREAM_ID_OPTION_LENGTH } from "./stream-id";
import { TIMESTAMP_HEADER_LENGTH, TIMESTAMP_OPTION, TS_ADDRESS_STAMP, TS_ONLY_STAMP } from "./timestamp";
import {
    DecodedIPV4Option,
    IPV4_MAX_OPTIONS_LENGTH,
    IPV4_OPTION_TYPES,
    TIMESTAMP_FLAGS,
    TimestampOption,
    isTimestampFlag
} from "./types";

function encodeStamps({ flag, stamps, raw }: TimestampOption): Uint8Array {
    if (!isTimestampFlag(flag)) {
        if (stamps.length > 0) {
            throw new IPV4OptionError(IPV4_OPTION_ERROR.INVALID_TIMESTAMP_FLAG, `cannot encode stamps with unassigned flag ${flag}`);
        }
        // stamps of an unassigned flag are only known as octets
        return raw.slice(TIMESTAMP_HEADER_LENGTH);
    }

    return uint8_concat(stamps.map((stamp) => {
        if (flag == TIMESTAMP_FLAGS.TS_ONLY) {
            return TS_ONLY_STAMP.create({ time: stamp.time }).getBuffer();
        }

        if (stamp.address === undefined) {
            throw new StructValueError("stamp is missing its address", stamp);
        }
        return TS_ADDRESS_STAMP.create({ address: stamp.address, time: stamp.time }).getBuffer();
    }));
}

/**
 * Writes an option from its typed fields, the declared length is computed.
 * `raw` is only read for the stamp octets of a timestamp with an unassigned flag.
 * @throws {StructValueError} when a field does not fit, e.g. more routes than a length octet can count
 */
export function encodeIPV4Option(option: DecodedIPV4Option): Uint8Array {
    switch (option.kind) {
        case IPV4_OPTION_TYPES.END_OF_LIST:
        case IPV4_OPTION_TYPES.NO_OPERATION:
            return Uint8Array.of(option.kind);
        case IPV4_OPTION_TYPES.SECURITY:
            return SECURITY_OPTION.create({
                type: option.kind,
                length: SECURITY_OPTION_LENGTH,
                level: option.level,
                compartment: option.compartment,
                restriction: option.restriction,
                tcc: option.tcc,
            }).getBuffer();
        case IPV4_OPTION_TYPES.LOOSE_SOURCE_ROUTE:
        case IPV4_OPTION_TYPES.STRICT_SOURCE_ROUTE:
        case IPV4_OPTION_TYPES.RECORD_ROUTE:
            return ROUTE_OPTION.create({
                type: option.kind,
                length: ROUTE_HEADER_LENGTH + option.routes.length * ROUTE_ADDRESS_LENGTH,
                pointer: option.pointer,
                routes: uint8_concat(option.routes.map((address) => ROUTE_ADDRESS.create({ address }).getBuffer())),
            }).getBuffer();
        case IPV4_OPTION_TYPES.STREAM_ID:
            return STREAM_ID_OPTION.create({
                type: option.kind,
                length: STREAM_ID_OPTION_LENGTH,
                id: option.id,
            }).getBuffer();
        case IPV4_OPTION_TYPES.TIMESTAMP: {
            let stamps = encodeStamps(option);
            return TIMESTAMP_OPTION.create({
                type: option.kind,
                length: TIMESTAMP_HEADER_LENGTH + stamps.byteLength,
                pointer: option.pointer,
                overflow: option.overflow,
                flag: option.flag,
                stamps,
            }).getBuffer();
        }
    }
}

/** @throws {IPV4OptionError} when the encoded options do not fit in an IPv4 header */
export function encodeIPV4Options(options: readonly DecodedIPV4Option[]): Uint8Array {
    let buf = uint8_concat(options.map(encodeIPV4Option));

    if (buf.byteLength > IPV4_MAX_OPTIONS_LENGTH) {
        throw new IPV4OptionError(IPV4_OPTION_ERROR.OPTIONS_TOO_LARGE, `encoded options are ${buf.byteLength} octets, the maximum is ${IPV4_MAX_OPTIONS_LENGTH}`);
    }

    return buf;
}
