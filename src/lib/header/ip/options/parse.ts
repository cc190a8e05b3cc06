import { IPV4OptionError, IPV4_OPTION_ERROR } from "./errors";
import { decodeRouteOption } from "./route";
import { decodeSecurityOption } from "./security";
import { decodeStreamIdOption } from "./stream-id";
import { decodeTimestampOption } from "./timestamp";
import {
    DecodeResult,
    DecodedIPV4Option,
    IPV4OptionsParseOptions,
    IPV4_MAX_OPTIONS_LENGTH,
    IPV4_OPTIONS_PARSE_DEFAULTS,
    IPV4_OPTION_TYPES,
    isIPV4OptionType
} from "./types";

export type IPV4OptionsParseResult =
    | { success: true; options: DecodedIPV4Option[] }
    | { success: false; error: IPV4OptionError };

function decodeOptionAt(bytes: Uint8Array, offset: number, options: IPV4OptionsParseOptions): DecodeResult<DecodedIPV4Option> {
    let type = bytes[offset];

    if (!isIPV4OptionType(type)) {
        throw new IPV4OptionError(IPV4_OPTION_ERROR.INVALID_OPTION_TYPE, `unknown option type ${type}`);
    }

    switch (type) {
        case IPV4_OPTION_TYPES.END_OF_LIST:
        case IPV4_OPTION_TYPES.NO_OPERATION:
            return { option: { kind: type, length: 1, raw: Uint8Array.of(type) }, consumed: 1 };
        case IPV4_OPTION_TYPES.SECURITY:
            return decodeSecurityOption(bytes.subarray(offset));
        case IPV4_OPTION_TYPES.LOOSE_SOURCE_ROUTE:
        case IPV4_OPTION_TYPES.STRICT_SOURCE_ROUTE:
        case IPV4_OPTION_TYPES.RECORD_ROUTE:
            return decodeRouteOption(bytes.subarray(offset), type);
        case IPV4_OPTION_TYPES.STREAM_ID:
            return decodeStreamIdOption(bytes.subarray(offset));
        case IPV4_OPTION_TYPES.TIMESTAMP:
            return decodeTimestampOption(bytes.subarray(offset), options);
    }
}

/**
 * Parses the options field of an IPv4 header, the octets from 20 up to `ihl * 4`.
 * Stops at the end of option list, the octets after it are padding.
 * @throws {IPV4OptionError} on any malformed record, no partial list is returned
 */
export function parseIPV4Options(bytes: Uint8Array, options: Partial<IPV4OptionsParseOptions> = {}): DecodedIPV4Option[] {
    let opts = { ...IPV4_OPTIONS_PARSE_DEFAULTS, ...options };

    if (bytes.byteLength > IPV4_MAX_OPTIONS_LENGTH) {
        throw new IPV4OptionError(IPV4_OPTION_ERROR.OPTIONS_TOO_LARGE, `options field is ${bytes.byteLength} octets, the maximum is ${IPV4_MAX_OPTIONS_LENGTH}`);
    }

    let parsed: DecodedIPV4Option[] = [];

    let p = 0;
    while (p < bytes.byteLength) {
        let result: DecodeResult<DecodedIPV4Option>;
        try {
            result = decodeOptionAt(bytes, p, opts);
        } catch (error) {
            throw error instanceof IPV4OptionError ? error.at(p) : error;
        }

        parsed.push(result.option);

        if (result.option.kind == IPV4_OPTION_TYPES.END_OF_LIST) {
            break;
        }

        p += result.consumed;
    }

    return parsed;
}

/** Same as `parseIPV4Options` but hands the error back instead of throwing */
export function tryParseIPV4Options(bytes: Uint8Array, options: Partial<IPV4OptionsParseOptions> = {}): IPV4OptionsParseResult {
    try {
        return { success: true, options: parseIPV4Options(bytes, options) };
    } catch (error) {
        if (error instanceof IPV4OptionError) {
            return { success: false, error };
        }
        throw error;
    }
}
