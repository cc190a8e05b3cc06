import { describe, expect, test, vi } from "vitest";
import { IPV4_OPTION_TYPES, TIMESTAMP_FLAGS, decodeTimestampOption, parseIPV4Options } from "../../../lib/header/ip/options";
import fixtures from "./fixtures.json";

describe("Timestamp option", () => {
    test("timestamps only", () => {
        let { option, consumed } = decodeTimestampOption(new Uint8Array(fixtures.timestampOnlyFull));

        expect(consumed).eq(40);
        expect(option.kind).eq(IPV4_OPTION_TYPES.TIMESTAMP);
        expect(option.pointer).eq(41);
        expect(option.overflow).eq(4);
        expect(option.flag).eq(TIMESTAMP_FLAGS.TS_ONLY);
        expect(option.stamps.length).eq(9);
        expect(option.stamps[0]).toEqual({ time: 0x03eeab37 });
        expect(option.stamps.every((stamp) => !("address" in stamp))).true;
    })

    test("prespecified addresses", () => {
        let { option, consumed } = decodeTimestampOption(new Uint8Array(fixtures.timestampPrespec));

        expect(consumed).eq(12);
        expect(option.pointer).eq(13);
        expect(option.overflow).eq(4);
        expect(option.flag).eq(TIMESTAMP_FLAGS.TS_PRESPEC);
        expect(option.stamps).toEqual([{ address: 0x426d2632, time: 0x02d071ed }]);
    })

    test("addresses and timestamps", () => {
        let bytes = Uint8Array.of(68, 20, 21, 0x01, 10, 0, 0, 1, 0, 0, 0, 1, 10, 0, 0, 2, 0, 0, 1, 0);
        let { option } = decodeTimestampOption(bytes);

        expect(option.overflow).eq(0);
        expect(option.flag).eq(TIMESTAMP_FLAGS.TS_AND_ADDR);
        expect(option.stamps).toEqual([
            { address: 0x0a000001, time: 1 },
            { address: 0x0a000002, time: 256 },
        ]);
    })

    test("empty timestamp data", () => {
        let { option, consumed } = decodeTimestampOption(Uint8Array.of(68, 4, 5, 0x01));
        expect(consumed).eq(4);
        expect(option.stamps).toEqual([]);
    })

    test("timestamps only with data not a multiple of 4", () => {
        let bytes = Uint8Array.of(68, 9, 5, 0x00, 1, 2, 3, 4, 5);
        expect(() => decodeTimestampOption(bytes)).toThrow(/^TS_LENGTH_INCORRECT/);
    })

    test("address stamps with data not a multiple of 8", () => {
        let bytes = Uint8Array.of(68, 8, 5, 0x01, 0, 0, 0, 1);
        expect(() => decodeTimestampOption(bytes)).toThrow(/^TS_LENGTH_INCORRECT/);
    })

    test("length shorter than the header", () => {
        expect(() => decodeTimestampOption(Uint8Array.of(68, 3, 5))).toThrow(/^INVALID_LENGTH/);
    })

    test("declared length past the end of the data", () => {
        expect(() => decodeTimestampOption(Uint8Array.of(68, 20, 5, 0))).toThrow(/^NOT_ENOUGH_DATA/);
    })

    test("declared length larger than the options field", () => {
        let bytes = new Uint8Array(44);
        bytes.set([68, 44, 5, 0]);
        expect(() => decodeTimestampOption(bytes)).toThrow(/^OPTIONS_TOO_LARGE/);
    })

    describe("unassigned flag", () => {
        let bytes = Uint8Array.of(68, 12, 5, 0x12, 10, 0, 0, 1, 0, 0, 0, 1);

        test("rejected by default", () => {
            expect(() => decodeTimestampOption(bytes)).toThrow(/^INVALID_TIMESTAMP_FLAG/);
            expect(() => parseIPV4Options(bytes)).toThrow(/^INVALID_TIMESTAMP_FLAG/);
        })

        test("decoded without stamps when lenient", () => {
            let warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

            let [option] = parseIPV4Options(bytes, { strictTimestampFlag: false });

            expect(option).toEqual({
                kind: IPV4_OPTION_TYPES.TIMESTAMP,
                length: 12,
                raw: bytes,
                pointer: 5,
                overflow: 1,
                flag: 2,
                stamps: [],
            });
            expect(warn).toHaveBeenCalledWith("timestamp flag 2 is unassigned, decoding without stamps");

            warn.mockRestore();
        })
    })
})
