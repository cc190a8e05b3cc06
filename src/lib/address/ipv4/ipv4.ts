import { uint8_fromNumber, uint8_readUint32BE } from "../../binary/uint8-array";

const DOT_NOTATED_ADDRESS_REGEX = /^(\b25[0-5]|\b2[0-4][0-9]|\b[01]?[0-9][0-9]?)(\.(25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)){3}$/;

/** Presentation of the 32-bit addresses carried in route and timestamp options */
export class IPV4Address {
    static ADDRESS_LENGTH: number = 32;
    static parse(input: string): Uint8Array {
        input = input.trim();
        if (!DOT_NOTATED_ADDRESS_REGEX.test(input)) {
            throw new Error("failed to parse: " + IPV4Address.name);
        }

        let buffer = new Uint8Array(IPV4Address.ADDRESS_LENGTH / 8);

        input.split(".").forEach((n, i) => {
            buffer[i] = parseInt(n, 10);
        });

        return buffer;
    }

    readonly buffer: Uint8Array;
    constructor(input: string);
    constructor(input: number);
    constructor(input: Uint8Array);
    constructor(input: IPV4Address);
    constructor(input: string | number | Uint8Array | IPV4Address) {
        if (typeof input == "string") {
            this.buffer = IPV4Address.parse(input);
        } else if (typeof input == "number" && Number.isInteger(input) && input >= 0 && input <= 0xffffffff) {
            this.buffer = uint8_fromNumber(input, IPV4Address.ADDRESS_LENGTH / 8);
        } else if (input instanceof IPV4Address) {
            this.buffer = new Uint8Array(input.buffer);
        } else if (input instanceof Uint8Array && (input.length * 8) == IPV4Address.ADDRESS_LENGTH) {
            this.buffer = new Uint8Array(input);
        } else {
            throw new Error("failed to initialize: " + IPV4Address.name);
        }
    }

    toNumber(): number {
        return uint8_readUint32BE(this.buffer);
    }

    toString(): string {
        return `${this.buffer[0]}.${this.buffer[1]}.${this.buffer[2]}.${this.buffer[3]}`;
    }
}
