import { Buffer } from "buffer";
import { afterEach, describe, expect, test, vi } from "vitest";
import { IPV4Address } from "../../lib/address/ipv4/ipv4";
import { IPV6Address } from "../../lib/address/ipv6/ipv6";
import { MACAddress } from "../../lib/address/mac";
import { ArgumentError, BindingError, ParseError } from "../../lib/errors";
import { ETHER_TYPES, ICMP, IPV4, TCP, TCP_FLAGS, UDP } from "../../lib/header";
import { hexdump } from "../../lib/packet/inspect";
import { LINK_TYPES, parseFrame } from "../../lib/packet/link-types";
import { Packet } from "../../lib/packet/packet";
import type { LiveInterface } from "../../lib/wire/wire";

function __fromHex(hex: string): Uint8Array {
    return new Uint8Array(Buffer.from(hex, "hex"));
}
function __toHex(buf: Uint8Array): string {
    return Buffer.from(buf).toString("hex");
}

const saddr = new IPV4Address("192.0.2.1");
const daddr = new IPV4Address("192.0.2.2");

const IP_ICMP = "4500001e000000004001f6dbc0000201c000020208007d61123400016869";
const ETH_IP_ICMP = "00112233445566778899aabb0800" + IP_ICMP;

function echoRequest(): Packet {
    return Packet.gen("Eth", { dmac: new MACAddress("00:11:22:33:44:55"), smac: new MACAddress("66:77:88:99:aa:bb") })
        .add("IP", { saddr, daddr })
        .add("ICMP", { type: 8, body: __fromHex("123400016869") })
        .calc();
}

afterEach(() => {
    vi.restoreAllMocks();
});

describe("Composing", () => {
    test("discriminators and checksums", () => {
        let pkt = echoRequest();
        expect(pkt.toString()).eq("Eth / IP / ICMP");
        expect(pkt.header("Eth")?.numeric("ethertype")).eq(ETHER_TYPES.IPv4);
        expect(pkt.headerOf(IPV4)?.get("proto")).eq(1);
        expect(pkt.headerOf(ICMP)?.get("csum")).eq(0x7d61);
        expect(__toHex(pkt.toBuffer())).eq(ETH_IP_ICMP);
        expect(pkt.size).eq(44);
    });

    test("UDP checksum covers the pseudo header", () => {
        let pkt = Packet.gen("IP", { saddr, daddr })
            .add("UDP", { sport: 1024, dport: 53, body: __fromHex("abcdef01") })
            .calc();

        expect(pkt.headerOf(UDP)?.get("length")).eq(12);
        expect(__toHex(pkt.toBuffer())).eq("45000020000000004011f6c9c0000201c000020204000035000cdccdabcdef01");
    });

    test("TCP options are padded to a word", () => {
        let pkt = Packet.gen("IP", { saddr, daddr })
            .add("TCP", { sport: 1234, dport: 80, seqnum: 1, flags: TCP_FLAGS.SYN, window: 1024, options: __fromHex("020405b4") })
            .calc();

        expect(__toHex(pkt.headerOf(TCP)?.getBuffer() ?? new Uint8Array())).eq("04d200500000000100000000600204000b000000020405b4");

        let tcp = TCP.create({ options: __fromHex("010101") }).calcLength();
        expect(tcp.get("doffset")).eq(6);
        expect(__toHex(tcp.get("options"))).eq("01010100");
    });

    test("ICMPv6 checksum covers the pseudo header", () => {
        let pkt = Packet.gen("IPv6", { saddr: new IPV6Address("2001:db8::1"), daddr: new IPV6Address("2001:db8::2") })
            .add("ICMPv6", { type: 128, body: __fromHex("00010002") })
            .calc();

        expect(__toHex(pkt.toBuffer())).eq(
            "6000000000083a40" +
            "20010db8000000000000000000000001" +
            "20010db8000000000000000000000002" +
            "8000244500010002"
        );
    });

    test("explicit discriminators must match a binding", () => {
        expect(() => Packet.gen("IP", { proto: 17 }).add("ICMP")).toThrow(BindingError);
        expect(() => Packet.gen("UDP").add("IP")).toThrow("IP cannot follow UDP");
    });

    test("unknown protocols", () => {
        expect(() => Packet.gen("SCTP")).toThrow(`unknown protocol "SCTP"`);
    });

    test("insert", () => {
        let pkt = Packet.gen("Eth").add("IPv6").add("UDP");
        let ipv6 = pkt.headers[1];
        expect(ipv6.get("nextHeader")).eq(17);

        pkt.insert(ipv6, "IPv6::HopByHop");
        expect(pkt.toString()).eq("Eth / IPv6 / IPv6::HopByHop / UDP");
        expect(ipv6.get("nextHeader")).eq(0);
        expect(ipv6.isAssigned("nextHeader")).eq(false);
        expect(pkt.headers[2].get("nextHeader")).eq(17);

        let stray = IPV4.create();
        expect(() => pkt.insert(stray, "UDP")).toThrow("IP is not a header of this packet");
    });

    test("insert keeps discriminators set by the caller", () => {
        let pkt = Packet.gen("IPv6", { nextHeader: 17 }).add("UDP");
        expect(() => pkt.insert(pkt.headers[0], "IPv6::HopByHop")).toThrow(BindingError);
        expect(pkt.toString()).eq("IPv6 / UDP");
    });

    test("body", () => {
        let pkt = Packet.gen("IP", { saddr, daddr }).add("UDP");
        pkt.body = __fromHex("0102");
        pkt.calc();
        expect(pkt.headerOf(UDP)?.get("length")).eq(10);
        expect(pkt.headerOf(IPV4)?.get("len")).eq(30);
        expect(__toHex(pkt.body)).eq("0102");

        expect(() => { new Packet().body = new Uint8Array(1); }).toThrow(ArgumentError);
        expect(new Packet().body.byteLength).eq(0);
    });

    test("toWire", () => {
        let written: Uint8Array[] = [];
        let iface: LiveInterface = {
            name: "test0",
            linkType: LINK_TYPES.ETHERNET,
            next: () => undefined,
            write: data => { written.push(data); },
            close: () => { },
        };

        echoRequest().toWire(iface);
        expect(written.map(__toHex)).toStrictEqual([ETH_IP_ICMP]);
    });
});

describe("Dissecting", () => {
    test("parse", () => {
        let pkt = Packet.parse(__fromHex(ETH_IP_ICMP), { firstHeader: "Eth" });
        expect(pkt.toString()).eq("Eth / IP / ICMP");
        expect(pkt.headerOf(IPV4)?.get("saddr").toString()).eq("192.0.2.1");
        expect(pkt.headerOf(ICMP)?.toHuman("type")).eq("ECHO_REQUEST");
        expect(__toHex(pkt.body)).eq("123400016869");
        expect(pkt.equals(echoRequest())).eq(true);
        expect(pkt.is("ICMP")).eq(true);
        expect(pkt.is("UDP")).eq(false);
    });

    test("unknown upper layers stay payload", () => {
        let bytes = __fromHex(IP_ICMP);
        bytes[9] = 99;
        let pkt = Packet.parse(bytes, { firstHeader: IPV4 });
        expect(pkt.toString()).eq("IP");
        expect(__toHex(pkt.body)).eq("08007d61123400016869");
    });

    test("first header is guessed", () => {
        expect(Packet.parse(__fromHex(ETH_IP_ICMP)).toString()).eq("Eth / IP / ICMP");
        expect(Packet.parse(__fromHex(IP_ICMP)).toString()).eq("IP / ICMP");
        expect(() => Packet.parse(__fromHex("ffff"))).toThrow(ParseError);
    });

    test("truncated input", () => {
        expect(() => Packet.parse(__fromHex(IP_ICMP).subarray(0, 12), { firstHeader: "IP" })).toThrow(ParseError);
    });

    test("link types", () => {
        expect(parseFrame(__fromHex(ETH_IP_ICMP), LINK_TYPES.ETHERNET).toString()).eq("Eth / IP / ICMP");
        expect(parseFrame(__fromHex(IP_ICMP), LINK_TYPES.IPV4).toString()).eq("IP / ICMP");
        expect(parseFrame(__fromHex(IP_ICMP), LINK_TYPES.RAW).toString()).eq("IP / ICMP");

        let warn = vi.spyOn(console, "warn").mockImplementation(() => { });
        expect(parseFrame(__fromHex(IP_ICMP), 147).toString()).eq("IP / ICMP");
        expect(warn).toHaveBeenCalledWith("unknown link type 147, guessing the first header");
    });
});

describe("Inspecting", () => {
    test("hexdump", () => {
        let buf = Uint8Array.from({ length: 18 }, (_, i) => i);
        expect(hexdump(buf)).eq(
            "0000  00 01 02 03 04 05 06 07 08 09 0a 0b 0c 0d 0e 0f\n" +
            "0010  10 11"
        );
        expect(hexdump(new Uint8Array(0))).eq("");
    });

    test("inspect", () => {
        let pkt = Packet.gen("IP", { saddr, daddr })
            .add("UDP", { sport: 1024, dport: 53, body: __fromHex("abcdef01") })
            .calc();

        let text = pkt.inspect();
        expect(text.split("\n")[0]).eq("--- IP ---");
        expect(text.split("\n")).toContain("proto: UDP");
        expect(text.endsWith(
            "--- UDP ---\nsport: 1024\ndport: 53\nlength: 12\ncsum: 56525\n--- body ---\n0000  ab cd ef 01"
        )).eq(true);
    });
});
