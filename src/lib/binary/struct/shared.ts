/** Makes a big endian buffer to a `number`, only safe up to 6 bytes */
export function _bufToNumber(buf: Uint8Array): number {
    let n = 0;
    for (let i = 0; i < buf.byteLength; i++) {
        n = n * 0x100 + buf[i];
    }

    return n;
}

/**
 * Copies `bitLength` bits starting at `bitOffset` into a new buffer of `ceil(bitLength / 8)` bytes.
 * The bits are right aligned, `readBits([0b1010_0000], 0, 4)` gives `[0b0000_1010]`
 */
export function readBits(source: Uint8Array, bitOffset: number, bitLength: number): Uint8Array {
    let target = new Uint8Array(Math.ceil(bitLength / 8));
    let pad = target.byteLength * 8 - bitLength;

    if (bitOffset % 8 == 0 && pad == 0) {
        target.set(source.subarray(bitOffset / 8, bitOffset / 8 + target.byteLength));
        return target;
    }

    for (let i = 0; i < bitLength; i++) {
        let from = bitOffset + i, to = pad + i;
        let bit = (source[from >> 3] >> (7 - (from & 7))) & 1;
        target[to >> 3] |= bit << (7 - (to & 7));
    }

    return target;
}

/** Inverse of `readBits`, writes the right aligned bits of `value` into `target` */
export function writeBits(target: Uint8Array, bitOffset: number, bitLength: number, value: Uint8Array): Uint8Array {
    let pad = value.byteLength * 8 - bitLength;

    for (let i = 0; i < bitLength; i++) {
        let from = pad + i, to = bitOffset + i;
        let bit = (value[from >> 3] >> (7 - (from & 7))) & 1;
        let mask = 1 << (7 - (to & 7));

        target[to >> 3] = bit ? target[to >> 3] | mask : target[to >> 3] & ~mask;
    }

    return target;
}
