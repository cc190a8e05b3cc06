import { Buffer } from "buffer";
import { IPV4Address } from "../../../address/ipv4";
import { uint8_fromNumber } from "../../../binary/uint8-array";
import { getSecurityLevelName } from "./security";
import { DecodedIPV4Option, IPV4OptionType, IPV4_OPTION_TYPES, TimestampStamp } from "./types";

export const IPV4_OPTION_NAMES: Record<IPV4OptionType, string> = {
    [IPV4_OPTION_TYPES.END_OF_LIST]: "EOL",
    [IPV4_OPTION_TYPES.NO_OPERATION]: "NOP",
    [IPV4_OPTION_TYPES.SECURITY]: "SEC",
    [IPV4_OPTION_TYPES.LOOSE_SOURCE_ROUTE]: "LSRR",
    [IPV4_OPTION_TYPES.STRICT_SOURCE_ROUTE]: "SSRR",
    [IPV4_OPTION_TYPES.RECORD_ROUTE]: "RR",
    [IPV4_OPTION_TYPES.STREAM_ID]: "SID",
    [IPV4_OPTION_TYPES.TIMESTAMP]: "TS",
};

function hex(n: number, bytes: number): string {
    return "0x" + Buffer.from(uint8_fromNumber(n, bytes)).toString("hex");
}

function formatStamp({ address, time }: TimestampStamp): string {
    if (address === undefined) return String(time);
    return `${new IPV4Address(address)}@${time}`;
}

/** One line description, e.g. `RR ptr=4 routes=[10.0.0.1]` */
export function formatIPV4Option(option: DecodedIPV4Option): string {
    let name = IPV4_OPTION_NAMES[option.kind];

    switch (option.kind) {
        case IPV4_OPTION_TYPES.END_OF_LIST:
        case IPV4_OPTION_TYPES.NO_OPERATION:
            return name;
        case IPV4_OPTION_TYPES.SECURITY:
            return `${name} level=${getSecurityLevelName(option.level) ?? hex(option.level, 2)}`
                + ` compartment=${hex(option.compartment, 2)}`
                + ` restriction=${hex(option.restriction, 2)}`
                + ` tcc=${hex(option.tcc, 3)}`;
        case IPV4_OPTION_TYPES.LOOSE_SOURCE_ROUTE:
        case IPV4_OPTION_TYPES.STRICT_SOURCE_ROUTE:
        case IPV4_OPTION_TYPES.RECORD_ROUTE:
            return `${name} ptr=${option.pointer} routes=[${option.routes.map((route) => new IPV4Address(route).toString()).join(", ")}]`;
        case IPV4_OPTION_TYPES.STREAM_ID:
            return `${name} id=${option.id}`;
        case IPV4_OPTION_TYPES.TIMESTAMP:
            return `${name} ptr=${option.pointer} oflw=${option.overflow} flg=${option.flag} stamps=[${option.stamps.map(formatStamp).join(", ")}]`;
    }
}

export function formatIPV4Options(options: readonly DecodedIPV4Option[]): string {
    return options.map(formatIPV4Option).join("\n");
}
