/** Source <https://www.rfc-editor.org/rfc/rfc791#section-3.1> */
export const IPV4_OPTION_TYPES = {
    /** The end of the option list, a single octet. Anything after it is padding. */
    END_OF_LIST: 0,
    /** Used between options, for example to align the beginning of a subsequent option on a 32 bit boundary. A single octet. */
    NO_OPERATION: 1,
    /** Provides a way for hosts to send security, compartmentation, handling restrictions, and TCC. Length 11. */
    SECURITY: 130,
    /** Routing information supplied by the source, the gateway may use any route to reach the next address. */
    LOOSE_SOURCE_ROUTE: 131,
    /** Routing information supplied by the source, the datagram MUST be forwarded directly to the next address. */
    STRICT_SOURCE_ROUTE: 137,
    /** Records the route of an internet datagram. */
    RECORD_ROUTE: 7,
    /** Carries the 16-bit SATNET stream identifier through networks that do not support the stream concept. Length 4. */
    STREAM_ID: 136,
    /** Internet timestamp. */
    TIMESTAMP: 68,
} as const;

export type IPV4OptionType = typeof IPV4_OPTION_TYPES[keyof typeof IPV4_OPTION_TYPES];

export type IPV4RouteOptionType = typeof IPV4_OPTION_TYPES["LOOSE_SOURCE_ROUTE" | "STRICT_SOURCE_ROUTE" | "RECORD_ROUTE"];

/** 60 byte maximum header size - 20 bytes for the mandatory fields */
export const IPV4_MAX_OPTIONS_LENGTH = 40;

export const TIMESTAMP_FLAGS = {
    /** time stamps only, stored in consecutive 32-bit words */
    TS_ONLY: 0,
    /** each timestamp is preceded with the internet address of the registering entity */
    TS_AND_ADDR: 1,
    /** the internet address fields are prespecified */
    TS_PRESPEC: 3,
} as const;

export type TimestampFlag = typeof TIMESTAMP_FLAGS[keyof typeof TIMESTAMP_FLAGS];

const IPV4_OPTION_TYPE_VALUES: ReadonlySet<number> = new Set(Object.values(IPV4_OPTION_TYPES));

export function isIPV4OptionType(n: number): n is IPV4OptionType {
    return IPV4_OPTION_TYPE_VALUES.has(n);
}

export function isRouteOptionType(n: number): n is IPV4RouteOptionType {
    return n == IPV4_OPTION_TYPES.LOOSE_SOURCE_ROUTE
        || n == IPV4_OPTION_TYPES.STRICT_SOURCE_ROUTE
        || n == IPV4_OPTION_TYPES.RECORD_ROUTE;
}

export function isTimestampFlag(n: number): n is TimestampFlag {
    return n == TIMESTAMP_FLAGS.TS_ONLY
        || n == TIMESTAMP_FLAGS.TS_AND_ADDR
        || n == TIMESTAMP_FLAGS.TS_PRESPEC;
}

/** Every decoded option carries its declared length and a copy of the whole record */
export type IPV4OptionEnvelope<Kind extends IPV4OptionType = IPV4OptionType> = {
    readonly kind: Kind;
    /** includes the type and length octets, `1` for the single octet options */
    readonly length: number;
    readonly raw: Uint8Array;
};

export type EndOfListOption = IPV4OptionEnvelope<typeof IPV4_OPTION_TYPES.END_OF_LIST>;

export type NoOperationOption = IPV4OptionEnvelope<typeof IPV4_OPTION_TYPES.NO_OPERATION>;

export type SecurityOption = IPV4OptionEnvelope<typeof IPV4_OPTION_TYPES.SECURITY> & {
    readonly level: number;
    readonly compartment: number;
    readonly restriction: number;
    /** Transmission Control Code, 24 bits */
    readonly tcc: number;
};

export type RouteOption = IPV4OptionEnvelope<IPV4RouteOptionType> & {
    /** 1-based octet offset of the next free route slot, relative to the option start */
    readonly pointer: number;
    readonly routes: readonly number[];
};

export type StreamIdOption = IPV4OptionEnvelope<typeof IPV4_OPTION_TYPES.STREAM_ID> & {
    readonly id: number;
};

export type TimestampStamp = {
    /** milliseconds since midnight UT */
    readonly time: number;
    /** absent when the flag is `TS_ONLY` */
    readonly address?: number;
};

export type TimestampOption = IPV4OptionEnvelope<typeof IPV4_OPTION_TYPES.TIMESTAMP> & {
    readonly pointer: number;
    /** number of modules that could not register a timestamp, 4 bits */
    readonly overflow: number;
    /** 4 bits, unassigned values are only accepted by a lenient parse */
    readonly flag: number;
    readonly stamps: readonly TimestampStamp[];
};

export type DecodedIPV4Option =
    | EndOfListOption
    | NoOperationOption
    | SecurityOption
    | RouteOption
    | StreamIdOption
    | TimestampOption;

/** What a per-kind decoder hands back to the walker */
export type DecodeResult<O extends DecodedIPV4Option> = {
    option: O;
    /** number of octets of the input the record occupies */
    consumed: number;
};

export type IPV4OptionsParseOptions = {
    /** by default is true, if false a timestamp option with an unassigned flag is decoded without stamps */
    strictTimestampFlag: boolean;
};

export const IPV4_OPTIONS_PARSE_DEFAULTS: IPV4OptionsParseOptions = {
    strictTimestampFlag: true,
};
