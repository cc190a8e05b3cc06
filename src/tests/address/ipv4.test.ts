import { Buffer } from "buffer";
import { describe, test, expect } from "vitest";
import { IPV4Address } from "../../lib/address/ipv4";

describe("IPV4 Address", () => {
    test("toString", () => {
        let addr = "9.0.0.2";
        let buf = Buffer.from("09000002", "hex");
        expect(new IPV4Address(buf).toString()).eq(addr);
    })

    test("parser", () => {
        let addr = "192.168.30.179";
        expect(new IPV4Address(addr).toString()).eq(addr);
        expect(() => new IPV4Address("192.168.30.256")).toThrow();
    })

    test("from a 32-bit number", () => {
        let address = new IPV4Address(0x89a50119);
        expect(address.toString()).eq("137.165.1.25");
        expect(address.toNumber()).eq(0x89a50119);
        expect(new IPV4Address("255.255.255.255").toNumber()).eq(0xffffffff);
    })

    test("number out of range", () => {
        expect(() => new IPV4Address(2 ** 32)).toThrow();
        expect(() => new IPV4Address(-1)).toThrow();
    })

    test("copy", () => {
        let a = new IPV4Address("10.0.0.1"), b = new IPV4Address(a);
        expect(b).not.eq(a);
        expect(b.toString()).eq("10.0.0.1");
    })
})
