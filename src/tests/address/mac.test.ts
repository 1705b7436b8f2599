import { Buffer } from "buffer";
import { describe, expect, test } from "vitest";
import { IPV4Address } from "../../lib/address/ipv4/ipv4";
import { IPV6Address } from "../../lib/address/ipv6/ipv6";
import { MACAddress } from "../../lib/address/mac";
import { ArgumentError } from "../../lib/errors";

describe("MAC Address", () => {
    test("toString", () => {
        let addr = "fe-00-32-43-00-e1";
        let buf = Buffer.from("fe00324300e1", "hex");
        expect(new MACAddress(buf).toString("-")).eq(addr)
        expect(new MACAddress(buf).toString()).eq("fe:00:32:43:00:e1")
    })
    test("parser", () => {
        let mac = new MACAddress("FE-00-32-43-00-E1");
        expect(mac.toString()).eq("fe:00:32:43:00:e1")
        expect(mac.equals(new MACAddress("fe:00:32:43:00:e1"))).eq(true)
    })
    test("malformed", () => {
        expect(() => new MACAddress("fe:00:32:43:00")).toThrow(ArgumentError)
        expect(() => new MACAddress("fe:00:32:43:00:zz")).toThrow(ArgumentError)
        expect(() => new MACAddress(new Uint8Array(5))).toThrow(ArgumentError)
    })
    test("is X", () => {
        expect(new MACAddress("ff:ff:ff:ff:ff:ff").isBroadcast()).eq(true)
        expect(new MACAddress("01:00:5e:00:00:01").isMulticast()).eq(true)
        expect(new MACAddress("00:00:5e:00:00:01").isMulticast()).eq(false)
    })
    test("multicast groups", () => {
        expect(MACAddress.forMulticast(new IPV4Address("239.129.2.3")).toString()).eq("01:00:5e:01:02:03")
        expect(MACAddress.forMulticast(new IPV6Address("ff02::1:ff00:1")).toString()).eq("33:33:ff:00:00:01")
        expect(() => MACAddress.forMulticast(new IPV4Address("192.0.2.1"))).toThrow("192.0.2.1 is not a multicast address")
    })
})
