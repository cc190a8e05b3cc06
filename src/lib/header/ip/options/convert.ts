import { IPV4OptionError, IPV4_OPTION_ERROR } from "./errors";
import { decodeRouteOption } from "./route";
import { decodeSecurityOption } from "./security";
import { decodeStreamIdOption } from "./stream-id";
import { decodeTimestampOption } from "./timestamp";
import {
    IPV4OptionEnvelope,
    IPV4OptionsParseOptions,
    IPV4_OPTION_TYPES,
    RouteOption,
    SecurityOption,
    StreamIdOption,
    TimestampOption,
    isRouteOptionType
} from "./types";

function mismatch(envelope: IPV4OptionEnvelope, expected: string): IPV4OptionError {
    return new IPV4OptionError(IPV4_OPTION_ERROR.OPTION_TYPE_MISMATCH, `option of type ${envelope.kind} is not a ${expected} option`);
}

/*
 * The conversions decode the envelope's raw octets again, so an envelope
 * that did not come from the walker is validated the same way.
 * Its type octet must agree with its kind.
 */

function checkTypeOctet(envelope: IPV4OptionEnvelope, expected: string): void {
    if (envelope.raw[0] !== envelope.kind) {
        throw new IPV4OptionError(IPV4_OPTION_ERROR.OPTION_TYPE_MISMATCH, `${expected} option of type ${envelope.kind} carries type octet ${envelope.raw[0]}`);
    }
}

export function toSecurityOption(envelope: IPV4OptionEnvelope): SecurityOption {
    if (envelope.kind != IPV4_OPTION_TYPES.SECURITY) {
        throw mismatch(envelope, "security");
    }
    checkTypeOctet(envelope, "security");
    return decodeSecurityOption(envelope.raw).option;
}

export function toRouteOption(envelope: IPV4OptionEnvelope): RouteOption {
    if (!isRouteOptionType(envelope.kind)) {
        throw mismatch(envelope, "route");
    }
    checkTypeOctet(envelope, "route");
    return decodeRouteOption(envelope.raw, envelope.kind).option;
}

export function toStreamIdOption(envelope: IPV4OptionEnvelope): StreamIdOption {
    if (envelope.kind != IPV4_OPTION_TYPES.STREAM_ID) {
        throw mismatch(envelope, "stream id");
    }
    checkTypeOctet(envelope, "stream id");
    return decodeStreamIdOption(envelope.raw).option;
}

export function toTimestampOption(envelope: IPV4OptionEnvelope, options: Partial<IPV4OptionsParseOptions> = {}): TimestampOption {
    if (envelope.kind != IPV4_OPTION_TYPES.TIMESTAMP) {
        throw mismatch(envelope, "timestamp");
    }
    checkTypeOctet(envelope, "timestamp");
    return decodeTimestampOption(envelope.raw, options).option;
}

