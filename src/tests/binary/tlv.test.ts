import { Buffer } from "buffer";
import { describe, expect, test } from "vitest";
import { ARRAY, STRUCT, UINT16, UINT8, defineStruct, defineTLV } from "../../lib/binary/struct/";
import { uint8_fromString, uint8_toString } from "../../lib/binary/uint8-array";
import { ParseError } from "../../lib/errors";
import { IPV4_OPTION, IPV4_OPTION_TYPES } from "../../lib/header/ip/ipv4";
import { IPV6_OPTION, IPV6_OPTION_TYPES } from "../../lib/header/ip/hop-by-hop";

function __fromHex(hex: string): Uint8Array {
    return new Uint8Array(Buffer.from(hex, "hex"));
}
function __toHex(buf: Uint8Array): string {
    return Buffer.from(buf).toString("hex");
}

describe("TLV", () => {
    test("length follows the value", () => {
        let ra = IPV4_OPTION.create({ type: IPV4_OPTION_TYPES.RA, value: new Uint8Array(2) });
        expect(ra.get("length")).eq(4);
        expect(ra.size).eq(4);
        expect(__toHex(ra.getBuffer())).eq("94040000");

        ra.set("value", __fromHex("abcdef"));
        expect(ra.get("length")).eq(5);
        expect(__toHex(ra.getBuffer())).eq("9405abcdef");
    });

    test("explicit length is kept", () => {
        let ra = IPV4_OPTION.create({ type: IPV4_OPTION_TYPES.RA, value: new Uint8Array(2), length: 9 });
        expect(ra.get("length")).eq(9);
        expect(__toHex(ra.getBuffer())).eq("94090000");
    });

    test("type only records", () => {
        let eol = IPV4_OPTION.create({ type: IPV4_OPTION_TYPES.EOL });
        expect(eol.has("length")).eq(false);
        expect(eol.has("value")).eq(false);
        expect(__toHex(eol.getBuffer())).eq("00");
        expect(eol.toHuman()).eq("EOL");

        let pad1 = IPV6_OPTION.create({ type: IPV6_OPTION_TYPES.PAD1 });
        expect(__toHex(pad1.getBuffer())).eq("00");
    });

    test("decode", () => {
        let [ra, consumed] = IPV4_OPTION.decode(__fromHex("9404abcdff"));
        expect(consumed).eq(4);
        expect(ra.get("type")).eq(IPV4_OPTION_TYPES.RA);
        expect(__toHex(ra.get("value"))).eq("abcd");
        expect(ra.toHuman()).eq("RA(abcd)");
    });

    test("list of options", () => {
        const options = defineStruct({ options: ARRAY(STRUCT(IPV4_OPTION)) });
        let st = options.from(__fromHex("019404000000"));
        expect(st.get("options").map(o => o.typeName)).toStrictEqual(["NOP", "RA", "EOL"]);
        expect(st.size).eq(6);
    });

    test("length without header", () => {
        const TEXT = defineTLV(UINT8, UINT16).register(1, {
            toHuman: uint8_toString,
            fromHuman: uint8_fromString,
        });

        let tlv = TEXT.create({ type: 1, value: uint8_fromString("hi") });
        expect(__toHex(tlv.getBuffer())).eq("0100026869");
        expect(tlv.toHuman()).eq("1(hi)");

        tlv.setHumanValue("abc");
        expect(tlv.get("length")).eq(3);

        let other = TEXT.create({ type: 2, value: __fromHex("ff") });
        expect(other.toHuman()).eq("2(ff)");
        other.setHumanValue("0a0b");
        expect(__toHex(other.getBuffer())).eq("0200020a0b");

        expect(() => TEXT.from(__fromHex("0100056869"))).toThrow(ParseError);
    });

    test("registered codec", () => {
        let padN = IPV6_OPTION.create({ type: IPV6_OPTION_TYPES.PADN, value: new Uint8Array(2) });
        expect(__toHex(padN.getBuffer())).eq("01020000");
        expect(padN.toHuman()).eq("PADN(2 bytes)");

        let ra = IPV6_OPTION.create({ type: IPV6_OPTION_TYPES.ROUTER_ALERT });
        ra.setHumanValue("2");
        expect(__toHex(ra.getBuffer())).eq("05020002");
        expect(ra.toHuman()).eq("ROUTER_ALERT(2)");
    });
});
