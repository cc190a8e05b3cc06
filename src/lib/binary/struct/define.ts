import { Struct, StructType } from "./struct";

export function defineStruct<Types extends Record<string, StructType<unknown>>>(input: Types): Struct<Types> {
    return new Struct<Types>(input);
}

/** The returned type can be called to narrow its bitLength, e.g. `UINT8(4)` for a nibble */
export function defineStructType<T>(input: StructType<T>): StructType<T> & ((bitLength: number) => StructType<T>) {
    return Object.assign((bitLength: number) => {
        if (input.bitLength < bitLength) {
            throw new Error(`cannot define, bitLength "${bitLength}" is larger than type size "${input.bitLength}".`);
        }

        return defineStructType<T>({ ...input, bitLength });
    }, input);
}
