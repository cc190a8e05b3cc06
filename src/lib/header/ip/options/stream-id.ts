import { UINT16, UINT8, defineStruct } from "../../../binary/struct";
import { createEnvelope, readOptionHeader } from "./envelope";
import { IPV4OptionError, IPV4_OPTION_ERROR } from "./errors";
import { DecodeResult, IPV4_OPTION_TYPES, StreamIdOption } from "./types";

/**
 * # Stream Identifier <https://www.rfc-editor.org/rfc/rfc791#page-21>
```txt
   +--------+--------+--------+--------+
   |10001000|00000010|    Stream ID    |
   +--------+--------+--------+--------+
    Type=136 Length=4
```
*/
export const STREAM_ID_OPTION = defineStruct({
    type: UINT8,
    length: UINT8,
    id: UINT16,
});

export const STREAM_ID_OPTION_LENGTH = STREAM_ID_OPTION.getMinSize();

/** @param slice starts at the type octet */
export function decodeStreamIdOption(slice: Uint8Array): DecodeResult<StreamIdOption> {
    let { length } = readOptionHeader(slice);

    if (length != STREAM_ID_OPTION_LENGTH) {
        throw new IPV4OptionError(IPV4_OPTION_ERROR.STREAM_ID_LENGTH_INCORRECT, `stream id length is ${length}, expected ${STREAM_ID_OPTION_LENGTH}`);
    }

    if (slice.byteLength < length) {
        throw new IPV4OptionError(IPV4_OPTION_ERROR.NOT_ENOUGH_DATA, `stream id option needs ${length} octets, ${slice.byteLength} remain`);
    }

    let st = STREAM_ID_OPTION.from(slice.subarray(0, length));

    return {
        option: {
            ...createEnvelope(IPV4_OPTION_TYPES.STREAM_ID, slice, length),
            id: st.get("id"),
        },
        consumed: length,
    };
}
