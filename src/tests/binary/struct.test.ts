import { describe, expect, test } from "vitest";
import { SLICE, StructValueError, UINT16, UINT24, UINT32, UINT8, defineStruct } from "../../lib/binary/struct";

describe("Bit packed struct", () => {

    test("nibbles", () => {
        const struct = defineStruct({
            version: UINT8(4),
            ihl: UINT8(4),
            tos: UINT8,
        });

        let st = struct.from(Uint8Array.of(0x45, 0x10));
        expect(st.get("version")).eq(4);
        expect(st.get("ihl")).eq(5);
        expect(st.get("tos")).eq(16);

        st.set("ihl", 6);
        expect(Array.from(st.getBuffer())).toEqual([0x46, 0x10]);
        expect(st.get("version")).eq(4);
    })

    test("values crossing a byte boundary", () => {
        const struct = defineStruct({
            a: UINT8(4),
            b: UINT16(12),
        });

        let st = struct.from(Uint8Array.of(0xab, 0xcd));
        expect(st.get("a")).eq(0xa);
        expect(st.get("b")).eq(0xbcd);

        st.set("b", 0x123);
        expect(Array.from(st.getBuffer())).toEqual([0xa1, 0x23]);
    })

    test("24 and 32 bit values", () => {
        const struct = defineStruct({
            tcc: UINT24,
            time: UINT32,
        });

        let st = struct.create({ tcc: 0x010203, time: 0xffffffff });
        expect(Array.from(st.getBuffer())).toEqual([1, 2, 3, 0xff, 0xff, 0xff, 0xff]);
        expect(st.get("time")).eq(4294967295);
        expect(struct.getMinSize()).eq(7);
    })

    test("slice", () => {
        const struct = defineStruct({
            type: UINT8,
            data: SLICE,
        });

        expect(struct.getMinSize()).eq(1);

        let st = struct.create({ type: 7, data: Uint8Array.of(9, 9) });
        expect(Array.from(st.getBuffer())).toEqual([7, 9, 9]);
        expect(Array.from(struct.from(Uint8Array.of(1, 2, 3)).get("data"))).toEqual([2, 3]);
    })

    test("from copies the input", () => {
        const struct = defineStruct({ id: UINT16 });

        let buf = Uint8Array.of(0x12, 0x34);
        let st = struct.from(buf);
        buf[0] = 0;

        expect(st.get("id")).eq(0x1234);
    })

    test("define struct with a slice that is not last", () => {
        expect(() => defineStruct({
            slice: SLICE,
            uint: UINT32,
        })).toThrow("slice must be last value");
    })

    test("define struct not filling whole bytes", () => {
        expect(() => defineStruct({
            flag: UINT8(4),
        })).toThrow("MUST be a multiple of 8");
    })

    test("narrowing a type past its size", () => {
        expect(() => UINT8(9)).toThrow();
    })

    test("value that does not fit", () => {
        const struct = defineStruct({ flag: UINT8(4), overflow: UINT8(4) });

        expect(() => struct.create({ flag: 16 })).toThrow(StructValueError);
        expect(() => struct.create({ flag: -1 })).toThrow(StructValueError);
        expect(() => struct.create({ flag: 1.5 })).toThrow(StructValueError);
    })
})
