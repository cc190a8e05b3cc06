import { SLICE, UINT32, UINT8, defineStruct } from "../../../binary/struct";
import { createEnvelope, readOptionHeader } from "./envelope";
import { IPV4OptionError, IPV4_OPTION_ERROR } from "./errors";
import {
    DecodeResult,
    IPV4OptionsParseOptions,
    IPV4_MAX_OPTIONS_LENGTH,
    IPV4_OPTIONS_PARSE_DEFAULTS,
    IPV4_OPTION_TYPES,
    TIMESTAMP_FLAGS,
    TimestampOption,
    TimestampStamp,
    isTimestampFlag
} from "./types";

/**
 * # Internet Timestamp <https://www.rfc-editor.org/rfc/rfc791#page-22>
```txt
   +--------+--------+--------+--------+
   |01000100| length | pointer|oflw|flg|
   +--------+--------+--------+--------+
   |         internet address          |
   +--------+--------+--------+--------+
   |             timestamp             |
   +--------+--------+--------+--------+
   |                 .                 |
```
*/
export const TIMESTAMP_OPTION = defineStruct({
    type: UINT8,
    length: UINT8,
    /** the number of octets from the beginning of this option to the end of timestamps plus one */
    pointer: UINT8,
    /** the number of IP modules that cannot register timestamps due to lack of space */
    overflow: UINT8(4),
    flag: UINT8(4),
    stamps: SLICE,
});

export const TIMESTAMP_HEADER_LENGTH = TIMESTAMP_OPTION.getMinSize();

export const TS_ONLY_STAMP = defineStruct({
    time: UINT32,
});

export const TS_ADDRESS_STAMP = defineStruct({
    address: UINT32,
    time: UINT32,
});

function readTimeOnlyStamps(data: Uint8Array): TimestampStamp[] {
    let stamps: TimestampStamp[] = [], size = TS_ONLY_STAMP.getMinSize();

    for (let i = 0; i < data.byteLength; i += size) {
        let st = TS_ONLY_STAMP.from(data.subarray(i, i + size));
        stamps.push({ time: st.get("time") });
    }

    return stamps;
}

function readAddressStamps(data: Uint8Array): TimestampStamp[] {
    let stamps: TimestampStamp[] = [], size = TS_ADDRESS_STAMP.getMinSize();

    for (let i = 0; i < data.byteLength; i += size) {
        let st = TS_ADDRESS_STAMP.from(data.subarray(i, i + size));
        stamps.push({ address: st.get("address"), time: st.get("time") });
    }

    return stamps;
}

/** @param slice starts at the type octet */
export function decodeTimestampOption(slice: Uint8Array, options: Partial<IPV4OptionsParseOptions> = {}): DecodeResult<TimestampOption> {
    let { strictTimestampFlag } = { ...IPV4_OPTIONS_PARSE_DEFAULTS, ...options };
    let { length } = readOptionHeader(slice);

    if (slice.byteLength < length) {
        throw new IPV4OptionError(IPV4_OPTION_ERROR.NOT_ENOUGH_DATA, `timestamp option length is ${length}, ${slice.byteLength} octets remain`);
    }

    if (length > IPV4_MAX_OPTIONS_LENGTH) {
        throw new IPV4OptionError(IPV4_OPTION_ERROR.OPTIONS_TOO_LARGE, `timestamp option length ${length} exceeds ${IPV4_MAX_OPTIONS_LENGTH}`);
    }

    if (length < TIMESTAMP_HEADER_LENGTH) {
        throw new IPV4OptionError(IPV4_OPTION_ERROR.INVALID_LENGTH, `timestamp option length is ${length}, the header alone is ${TIMESTAMP_HEADER_LENGTH}`);
    }

    let st = TIMESTAMP_OPTION.from(slice.subarray(0, length)),
        flag = st.get("flag"),
        data = st.get("stamps"),
        stamps: TimestampStamp[] = [];

    if (!isTimestampFlag(flag)) {
        if (strictTimestampFlag) {
            throw new IPV4OptionError(IPV4_OPTION_ERROR.INVALID_TIMESTAMP_FLAG, `timestamp flag ${flag} is unassigned`);
        }

        console.warn(`timestamp flag ${flag} is unassigned, decoding without stamps`);
    } else if (flag == TIMESTAMP_FLAGS.TS_ONLY) {
        if (data.byteLength % TS_ONLY_STAMP.getMinSize() != 0) {
            throw new IPV4OptionError(IPV4_OPTION_ERROR.TS_LENGTH_INCORRECT, `timestamp data of length ${data.byteLength} is not a multiple of ${TS_ONLY_STAMP.getMinSize()}`);
        }
        stamps = readTimeOnlyStamps(data);
    } else {
        if (data.byteLength % TS_ADDRESS_STAMP.getMinSize() != 0) {
            throw new IPV4OptionError(IPV4_OPTION_ERROR.TS_LENGTH_INCORRECT, `timestamp data of length ${data.byteLength} is not a multiple of ${TS_ADDRESS_STAMP.getMinSize()}`);
        }
        stamps = readAddressStamps(data);
    }

    return {
        option: {
            ...createEnvelope(IPV4_OPTION_TYPES.TIMESTAMP, slice, length),
            pointer: st.get("pointer"),
            overflow: st.get("overflow"),
            flag,
            stamps,
        },
        consumed: length,
    };
}
