import { readBits, writeBits } from "./shared";

export class StructValueError extends Error {
    constructor(message: string, public value: unknown) {
        super(`cannot set; ${message}`);
    }
}

export type StructType<T> = {
    /** bitLength of the value type, `-1` marks a variable length slice that takes the remaining bytes */
    bitLength: number;
    /** receives the field bits right aligned in `ceil(bitLength / 8)` bytes */
    getter(buf: Uint8Array): T;
    /** returns the value right aligned in `ceil(bitLength / 8)` bytes */
    setter(value: T): Uint8Array;
}

export type StructValue<T extends StructType<unknown>> = ReturnType<T["getter"]>;

export type StructValues<Types extends Record<string, StructType<unknown>>> = {
    [Key in keyof Types]: StructValue<Types[Key]>
};

/**
 * A big endian, bit packed view over a byte buffer.
 * RULES: (1) total bitLength MUST be a multiple of 8. (2) a slice MUST be the last value.
 */
export class Struct<Types extends Record<string, StructType<unknown>>> {
    readonly order: Array<keyof Types & string>;

    private buffer: Uint8Array;
    private types: Types;
    private offsets: Partial<Record<keyof Types, number>>;

    constructor(types: Types) {
        this.types = types;
        this.order = Object.keys(types).filter((key): key is keyof Types & string => key in types);
        this.offsets = {};

        let offset = 0;
        for (let key of this.order) {
            let { bitLength } = types[key];
            if (bitLength < 0 && key != this.order.at(-1)) {
                throw new Error("cannot define struct; slice must be last value");
            }
            this.offsets[key] = offset;
            offset += Math.max(bitLength, 0);
        }

        if (offset % 8 != 0) {
            throw new Error("cannot define struct; total bitLength MUST be a multiple of 8");
        }

        this.buffer = new Uint8Array(offset / 8);
    }

    /** @returns the bit offset of the value-type */
    private getBitOffset(key: keyof Types): number {
        let offset = this.offsets[key];
        if (offset === undefined) {
            throw new Error("failed to calculate offset");
        }
        return offset;
    }

    getMinSize(): number {
        let last = this.order.at(-1);
        if (!last) return 0;

        return (this.getBitOffset(last) + Math.max(this.types[last].bitLength, 0)) / 8;
    }

    get<Key extends keyof Types>(key: Key): StructValues<Types>[Key] {
        let type = this.types[key], bitOffset = this.getBitOffset(key);

        if (type.bitLength < 0) {
            return <StructValues<Types>[Key]>type.getter(this.buffer.slice(bitOffset / 8));
        }

        return <StructValues<Types>[Key]>type.getter(readBits(this.buffer, bitOffset, type.bitLength));
    }

    set<Key extends keyof Types>(key: Key, value: StructValues<Types>[Key]): this {
        let type = this.types[key], bitOffset = this.getBitOffset(key);
        let buf = type.setter(value);

        if (type.bitLength < 0) {
            let resized = new Uint8Array(bitOffset / 8 + buf.byteLength);
            resized.set(this.buffer.subarray(0, bitOffset / 8));
            resized.set(buf, bitOffset / 8);
            this.buffer = resized;
            return this;
        }

        if (buf.byteLength != Math.ceil(type.bitLength / 8)) {
            throw new StructValueError(`"${String(key)}" expects ${Math.ceil(type.bitLength / 8)} bytes`, value);
        }

        writeBits(this.buffer, bitOffset, type.bitLength, buf);
        return this;
    }

    create(values: Partial<StructValues<Types>>): Struct<Types> {
        let struct = new Struct(this.types);

        for (let key of struct.order) {
            let value = values[key];
            if (value === undefined) continue;
            struct.set(key, value);
        }

        return struct;
    }

    /** copies `buf`, the struct never references the input */
    from(buf: Uint8Array): Struct<Types> {
        let struct = new Struct(this.types);
        struct.buffer = new Uint8Array(buf);
        return struct;
    }

    getBuffer(): Uint8Array {
        return this.buffer;
    }
}
