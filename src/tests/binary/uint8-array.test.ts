import { describe, expect, test } from "vitest";
import { Buffer } from "buffer";
import {
    uint8_concat,
    uint8_fromNumber,
    uint8_readUint32BE
} from "../../lib/binary/uint8-array";

describe("Uint8Array Helper functions", () => {
    test("uint8_concat", () => {
        let buffer = uint8_concat([
            new Uint8Array([0xff]),
            new Uint8Array(0),
            new Uint8Array([0xff, 0xaa]),
        ]);

        expect(Array.from(buffer)).toEqual([0xff, 0xff, 0xaa]);
    })

    test("uint8_fromNumber", () => {
        expect(Array.from(uint8_fromNumber(0xffff, 2))).toEqual([0xff, 0xff]);
        expect(Array.from(uint8_fromNumber(1, 3))).toEqual([0, 0, 1]);
        expect(Array.from(uint8_fromNumber(0xc0a80001, 4))).toEqual([192, 168, 0, 1]);
        expect(() => uint8_fromNumber(256, 1)).toThrow(RangeError);
    })

    test("uint8_readUint32BE", () => {
        let buf = Buffer.from("00ffffffff", "hex");
        expect(uint8_readUint32BE(buf, 1)).eq(0xffffffff);
        expect(uint8_readUint32BE(buf)).eq(0x00ffffff);
    })
})
