/**
 * REFERENCE: feross - buffer - <https://github.com/feross/buffer/blob/master/index.js>
 */

export function uint8_concat(list: readonly Uint8Array[]): Uint8Array {
    let totalLength = list.reduce((sum, { byteLength }) => sum + byteLength, 0);

    let buffer = new Uint8Array(totalLength);

    let offset = 0;
    for (let item of list) {
        buffer.set(item, offset);
        offset += item.byteLength;
    }

    return buffer;
}

/** Big endian, throws a `RangeError` when `n` does not fit in `len` bytes */
export function uint8_fromNumber(n: number, len: number = 1): Uint8Array {
    let buf = new Uint8Array(len);

    let i = len;
    while (i-- > 0) {
        buf[i] = n % 0x100;
        n = Math.floor(n / 0x100);
    }

    if (n > 0) {
        throw new RangeError("value does not fit in " + len + " bytes");
    }

    return buf;
}

export function uint8_readUint32BE(source: Uint8Array, offset = 0): number {
    offset = offset >>> 0; // make positive
    return (source[offset] * 0x1000000) +
        ((source[offset + 1] << 16) | (source[offset + 2] << 8) | source[offset + 3]);
}
