import { UINT16, UINT24, UINT8, defineStruct } from "../../../binary/struct";
import { createEnvelope, readOptionHeader } from "./envelope";
import { IPV4OptionError, IPV4_OPTION_ERROR } from "./errors";
import { DecodeResult, IPV4_OPTION_TYPES, SecurityOption } from "./types";

/**
 * # Security <https://www.rfc-editor.org/rfc/rfc791#page-17>
```txt
   +--------+--------+---//---+---//---+---//---+---//---+
   |10000010|00001011|SSS  SSS|CCC  CCC|HHH  HHH|  TCC  |
   +--------+--------+---//---+---//---+---//---+---//---+
    Type=130 Length=11
```
*/
export const SECURITY_OPTION = defineStruct({
    type: UINT8,
    length: UINT8,
    /** Security (S field), 16 bits */
    level: UINT16,
    /** Compartments (C field), 16 bits. All zero when the information is not compartmented. */
    compartment: UINT16,
    /** Handling Restrictions (H field), 16 bits */
    restriction: UINT16,
    /** Transmission Control Code (TCC field), 24 bits */
    tcc: UINT24,
});

export const SECURITY_OPTION_LENGTH = SECURITY_OPTION.getMinSize();

/** Security levels, the values of the S field */
export const SECURITY_LEVELS = {
    UNCLASSIFIED: 0x0000,
    CONFIDENTIAL: 0xF135,
    EFTO: 0x789A,
    MMMM: 0xBC4D,
    PROG: 0x5E26,
    RESTRICTED: 0xAF13,
    SECRET: 0xD788,
    TOP_SECRET: 0x6BC5,
    RESERVED_0: 0x35E2,
    RESERVED_1: 0x9AF1,
    RESERVED_2: 0x4D78,
    RESERVED_3: 0x24BD,
    RESERVED_4: 0x135E,
    RESERVED_5: 0x89AF,
    RESERVED_6: 0xC4D6,
    RESERVED_7: 0xE26B,
} as const;

export type SecurityLevelName = keyof typeof SECURITY_LEVELS;

function isSecurityLevelName(name: string): name is SecurityLevelName {
    return name in SECURITY_LEVELS;
}

export function getSecurityLevelName(level: number): SecurityLevelName | undefined {
    for (let [name, value] of Object.entries(SECURITY_LEVELS)) {
        if (value == level && isSecurityLevelName(name)) return name;
    }

    return undefined;
}

/** @param slice starts at the type octet */
export function decodeSecurityOption(slice: Uint8Array): DecodeResult<SecurityOption> {
    if (slice.byteLength < SECURITY_OPTION_LENGTH) {
        throw new IPV4OptionError(IPV4_OPTION_ERROR.NOT_ENOUGH_DATA, `security option needs ${SECURITY_OPTION_LENGTH} octets, ${slice.byteLength} remain`);
    }

    let { length } = readOptionHeader(slice);
    if (length != SECURITY_OPTION_LENGTH) {
        throw new IPV4OptionError(IPV4_OPTION_ERROR.INVALID_LENGTH, `security option length is ${length}, expected ${SECURITY_OPTION_LENGTH}`);
    }

    let st = SECURITY_OPTION.from(slice.subarray(0, length));

    return {
        option: {
            ...createEnvelope(IPV4_OPTION_TYPES.SECURITY, slice, length),
            level: st.get("level"),
            compartment: st.get("compartment"),
            restriction: st.get("restriction"),
            tcc: st.get("tcc"),
        },
        consumed: length,
    };
}
