import { SLICE, UINT32, UINT8, defineStruct } from "../../../binary/struct";
import { createEnvelope, readOptionHeader } from "./envelope";
import { IPV4OptionError, IPV4_OPTION_ERROR } from "./errors";
import { DecodeResult, IPV4RouteOptionType, RouteOption } from "./types";

/**
 * # Loose Source, Strict Source and Record Route <https://www.rfc-editor.org/rfc/rfc791#page-18>
 * All three share a layout and only differ in type.
```txt
   +--------+--------+--------+---------//--------+
   |  type  | length | pointer|     route data    |
   +--------+--------+--------+---------//--------+
```
*/
export const ROUTE_OPTION = defineStruct({
    type: UINT8,
    length: UINT8,
    /** points to the octet which begins the next address, the smallest legal value is 4 */
    pointer: UINT8,
    /** a series of 32-bit internet addresses */
    routes: SLICE,
});

export const ROUTE_HEADER_LENGTH = ROUTE_OPTION.getMinSize();

export const ROUTE_ADDRESS = defineStruct({
    address: UINT32,
});

export const ROUTE_ADDRESS_LENGTH = ROUTE_ADDRESS.getMinSize();

/**
 * @param slice starts at the type octet
 * @param kind the type octet, the walker has already classified it
 */
export function decodeRouteOption(slice: Uint8Array, kind: IPV4RouteOptionType): DecodeResult<RouteOption> {
    let { length } = readOptionHeader(slice);

    if (slice.byteLength < length) {
        throw new IPV4OptionError(IPV4_OPTION_ERROR.NOT_ENOUGH_DATA, `route option length is ${length}, ${slice.byteLength} octets remain`);
    }

    if (length < ROUTE_HEADER_LENGTH || (length - ROUTE_HEADER_LENGTH) % ROUTE_ADDRESS_LENGTH != 0) {
        throw new IPV4OptionError(IPV4_OPTION_ERROR.ROUTE_LENGTH_INCORRECT, `route data of length ${length - ROUTE_HEADER_LENGTH} is not a multiple of ${ROUTE_ADDRESS_LENGTH}`);
    }

    let st = ROUTE_OPTION.from(slice.subarray(0, length)),
        data = st.get("routes"),
        routes: number[] = [];

    for (let i = 0; i < data.byteLength; i += ROUTE_ADDRESS_LENGTH) {
        routes.push(ROUTE_ADDRESS.from(data.subarray(i, i + ROUTE_ADDRESS_LENGTH)).get("address"));
    }

    return {
        option: {
            ...createEnvelope(kind, slice, length),
            pointer: st.get("pointer"),
            routes,
        },
        consumed: length,
    };
}
