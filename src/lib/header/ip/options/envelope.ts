import { UINT8, defineStruct } from "../../../binary/struct";
import { IPV4OptionError, IPV4_OPTION_ERROR } from "./errors";
import { IPV4OptionEnvelope, IPV4OptionType } from "./types";

/**
```txt
   +--------+--------+---------//--------+
   |  type  | length |  length - 2 data  |
   +--------+--------+---------//--------+
```
*/
export const IPV4_OPTION_HEADER = defineStruct({
    type: UINT8,
    /** counts the type and length octets as well as the data */
    length: UINT8,
});

/**
 * Reads the type and length octets of a TLV option.
 * @param slice starts at the type octet
 */
export function readOptionHeader(slice: Uint8Array): { type: number; length: number } {
    if (slice.byteLength < IPV4_OPTION_HEADER.getMinSize()) {
        throw new IPV4OptionError(IPV4_OPTION_ERROR.NOT_ENOUGH_DATA, "missing the length octet");
    }

    let hdr = IPV4_OPTION_HEADER.from(slice.subarray(0, IPV4_OPTION_HEADER.getMinSize()));
    return { type: hdr.get("type"), length: hdr.get("length") };
}

/** @returns an envelope holding a copy of the first `length` octets of `slice` */
export function createEnvelope<Kind extends IPV4OptionType>(kind: Kind, slice: Uint8Array, length: number): IPV4OptionEnvelope<Kind> {
    return { kind, length, raw: slice.slice(0, length) };
}
