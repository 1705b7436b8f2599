import { Buffer } from "buffer";
import { describe, test, expect } from "vitest";
import { IPV6Address } from "../../lib/address/ipv6/ipv6";
import { ArgumentError } from "../../lib/errors";

describe("IPV6 Address", () => {
    test("toString", () => {
        let addr = "ff56:9909:ed01:8888:c438:0600:a1ac:ba00";
        let buf = Buffer.from("ff569909ed018888c4380600a1acba00", "hex");
        expect(new IPV6Address(buf).toString(-1)).eq(addr)
    })
    test("parser", () => {
        let addr = "fe80::c438:600:a1ac:ba00";
        let ipv6 = new IPV6Address(addr);
        expect(ipv6.toString()).eq(addr)
        expect(ipv6.toString(-1)).eq("fe80:0000:0000:0000:c438:0600:a1ac:ba00")
    })

    test("toString & parser", () => {
        let addr = "ff02::"
        let ipv6 = new IPV6Address("ff02::");
        expect(ipv6.toString(4)).eq(addr)
        expect(ipv6.toString(0)).eq("ff02:0:0:0:0:0:0:0")
        expect(ipv6.toString(-1)).eq("ff02:0000:0000:0000:0000:0000:0000:0000")
        expect(new IPV6Address("::").toString()).eq("::")
        expect(new IPV6Address("2001:db8:0:1:0:0:0:1").toString()).eq("2001:db8:0:1::1")
    })

    test("malformed", () => {
        expect(() => new IPV6Address("fe80::1::2")).toThrow(ArgumentError)
        expect(() => new IPV6Address("fe80:1")).toThrow(ArgumentError)
        expect(() => new IPV6Address("192.0.2.1")).toThrow(ArgumentError)
        expect(IPV6Address.validate("ff02::16")).eq(true)
        expect(IPV6Address.validate("ff02::16g")).eq(false)
    })

    test("is X", () => {
        let llAddr = new IPV6Address("fe80::c438:600:a1ac:ba00");
        expect(llAddr.isLinkLocal()).eq(true);

        let mcAddr = new IPV6Address("ff02::1");
        expect(mcAddr.isMulticast()).eq(true)

        let loopAddr = new IPV6Address("::1");
        expect(loopAddr.isLoopback()).eq(true)
    })
})
