export const IPV4_OPTION_ERROR = {
    /** the options field, or a record's declared length, exceeds 40 octets */
    OPTIONS_TOO_LARGE: "OPTIONS_TOO_LARGE",
    INVALID_OPTION_TYPE: "INVALID_OPTION_TYPE",
    /** the record needs more octets than remain */
    NOT_ENOUGH_DATA: "NOT_ENOUGH_DATA",
    /** a fixed length option declares the wrong length */
    INVALID_LENGTH: "INVALID_LENGTH",
    ROUTE_LENGTH_INCORRECT: "ROUTE_LENGTH_INCORRECT",
    TS_LENGTH_INCORRECT: "TS_LENGTH_INCORRECT",
    INVALID_TIMESTAMP_FLAG: "INVALID_TIMESTAMP_FLAG",
    STREAM_ID_LENGTH_INCORRECT: "STREAM_ID_LENGTH_INCORRECT",
    /** an option was converted into a kind it is not */
    OPTION_TYPE_MISMATCH: "OPTION_TYPE_MISMATCH",
} as const;

export type IPV4OptionErrorCode = typeof IPV4_OPTION_ERROR[keyof typeof IPV4_OPTION_ERROR];

export class IPV4OptionError extends Error {
    /**
     * @param offset octet index of the failing record, set by the walker
     */
    constructor(public code: IPV4OptionErrorCode, public reason: string, public offset?: number) {
        super(offset === undefined ? `${code}: ${reason}` : `${code}: ${reason} (at octet ${offset})`);
        this.name = IPV4OptionError.name;
    }

    /** @returns a copy pointing at the record that started at `offset` */
    at(offset: number): IPV4OptionError {
        if (this.offset !== undefined) return this;

        return new IPV4OptionError(this.code, this.reason, offset);
    }
}
