import { describe, expect, test } from "vitest";
import { formatIPV4Option, formatIPV4Options, parseIPV4Options } from "../../../lib/header/ip/options";
import fixtures from "./fixtures.json";

function format(bytes: number[]): string {
    return formatIPV4Options(parseIPV4Options(new Uint8Array(bytes)));
}

describe("Option formatting", () => {
    test("security", () => {
        expect(format(fixtures.security)).eq("SEC level=SECRET compartment=0x0001 restriction=0x0002 tcc=0x010203");
    })

    test("security with an unnamed level", () => {
        let bytes = [...fixtures.security];
        bytes[2] = 0x12;
        bytes[3] = 0x34;
        expect(format(bytes)).eq("SEC level=0x1234 compartment=0x0001 restriction=0x0002 tcc=0x010203");
    })

    test("route", () => {
        expect(format(fixtures.looseSourceRoute)).eq("LSRR ptr=4 routes=[10.0.0.1]");
    })

    test("stream id", () => {
        expect(format(fixtures.streamId)).eq("SID id=4660");
    })

    test("timestamps", () => {
        expect(format(fixtures.timestampPrespec)).eq("TS ptr=13 oflw=4 flg=3 stamps=[66.109.38.50@47215085]");
        expect(format([68, 8, 9, 0, 0, 0, 1, 0])).eq("TS ptr=9 oflw=0 flg=0 stamps=[256]");
    })

    test("one line per option", () => {
        expect(format([1, 1, 0])).eq("NOP\nNOP\nEOL");
        let [rr] = parseIPV4Options(new Uint8Array(fixtures.recordRouteFull));
        expect(formatIPV4Option(rr).startsWith("RR ptr=40 routes=[137.165.1.25, 66.109.38.50,")).true;
    })
})
