import { Buffer } from "buffer";
import { describe, expect, test } from "vitest";
import {
    ARRAY, CSTRING, DEFAULT, ENUM, INT16, INT64, INT8, INT_STRING, LENGTH_FROM, OPTIONAL, SLICE,
    STRUCT, UINT16, UINT32, UINT8, defineStruct
} from "../../lib/binary/struct/";
import { CreateStructTypeError, FormatError, ParseError, StructValueError, ArgumentError } from "../../lib/errors";

function __fromHex(hex: string): Uint8Array {
    return new Uint8Array(Buffer.from(hex, "hex"));
}
function __toHex(buf: Uint8Array): string {
    return Buffer.from(buf).toString("hex");
}

describe("Buffer based struct", () => {

    test("First test", () => {

        const struct = defineStruct({
            version: UINT8(4),
            ihl: UINT8(4),
            flags: UINT16(3),
            fragOffset: UINT16(9),
            pad: UINT16(4),
            slice: SLICE
        })

        let st = struct.from(__fromHex("4feff090"));
        expect(st.get("version")).eq(4)
        expect(st.get("ihl")).eq(15)
        expect(st.get("flags")).eq(7)
        expect(st.get("fragOffset")).eq(0x0ff)
        expect(st.get("pad")).eq(0)
        expect(__toHex(st.get("slice"))).eq("90")
        let sliceText = "Hello World";
        st.set("slice", Buffer.from(sliceText, "ascii"))
        expect(Buffer.from(st.get("slice")).toString("ascii")).eq(sliceText)

        st.set("version", 6)
        expect(st.get("version")).eq(6)
        expect(st.get("ihl")).eq(15)
        st.set("ihl", 2)
        expect(st.get("version")).eq(6)
        st.set("fragOffset", 0xa)
        expect(st.get("fragOffset")).eq(0xa)
        expect(st.get("flags")).eq(7)
        st.set("flags", 4)
        expect(st.get("fragOffset")).eq(0xa)
        expect(st.get("flags")).eq(0x4)

        // 0110 0010, 100 000001010 0000
        expect(__toHex(st.getBuffer()).slice(0, 6)).eq("6280a0")
    })

    test("define Struct #1", () => {
        expect(() => defineStruct({
            slice: SLICE,
            uint: UINT32
        })).toThrow(CreateStructTypeError)
    })

    test("define Struct #2", () => {
        let struct = defineStruct({
            uint2: UINT8(2),
            int2: INT8(2),
            pad: INT8(4),
        })

        expect(struct.getMinSize()).toEqual(1);

        expect(() => defineStruct({
            flags: UINT16(3),
            fragOffset: UINT16(13),
        })).not.toThrow();

        expect(() => defineStruct({
            flags: UINT16(3),
            fragOffset: UINT16(12),
        })).toThrow(CreateStructTypeError);

        expect(() => defineStruct({
            a: UINT32(30),
            b: UINT32(30),
        })).toThrow(CreateStructTypeError);

        expect(() => UINT8(9)).toThrow(CreateStructTypeError);

        expect(UINT8.bitLength).toBe(8)
    })

    test("lengths refer to earlier fields", () => {
        expect(() => defineStruct({
            data: LENGTH_FROM(SLICE, ["len"], ({ len }) => len),
            len: UINT8,
        })).toThrow(CreateStructTypeError)
    })

    test("create Struct #1", () => {
        let createdStruct = defineStruct({
            uint: UINT32,
            int: INT16,
        }).create({
            uint: 100,
            int: -100
        });

        expect(createdStruct.get("uint")).toEqual(100);

        createdStruct.set("uint", 10)
        expect(createdStruct.get("uint")).toEqual(10);

        createdStruct.set("int", -10)
        expect(createdStruct.get("int")).toEqual(-10);

        expect(__toHex(createdStruct.getBuffer())).eq("0000000afff6");
        expect(createdStruct.getMinSize()).toEqual(6);
    });

    test("create Struct #2", () => {
        let createdStruct = defineStruct({
            int: INT8,
            uint: UINT8,
            slice: SLICE
        }).from(__fromHex("ffff1111"))

        expect(createdStruct.getMinSize()).toEqual(2)

        expect(createdStruct.get("int")).toEqual(-1)
        expect(createdStruct.get("uint")).toEqual(255)
        expect(createdStruct.get("slice").length * 8).toEqual(16)

        createdStruct.set("slice", __fromHex("ff"))
        expect(createdStruct.size).toEqual(3)
    });

    test("little endian", () => {
        let struct = defineStruct({
            uint: UINT16
        });
        expect(struct.from(__fromHex("0100"), { bigEndian: false }).get("uint")).toBe(1)
        expect(__toHex(struct.create({ uint: 0x0102 }, { bigEndian: false }).getBuffer())).eq("0201")
        expect(__toHex(struct.create({ uint: 0x0102 }).getBuffer())).eq("0102")
    })

    test("64 bit integers", () => {
        let struct = defineStruct({ v: INT64 });
        expect(__toHex(struct.create({ v: -2n }).getBuffer())).eq("fffffffffffffffe")
        expect(struct.from(__fromHex("ffffffffffffffff")).get("v")).eq(-1n)
    })

    test("values that do not fit", () => {
        let st = defineStruct({ a: UINT8, b: UINT8(4), c: UINT8(4) }).create();
        expect(() => st.set("a", 256)).toThrow(StructValueError)
        expect(() => st.set("b", 16)).toThrow(StructValueError)
        expect(() => st.assign({ d: 1 })).toThrow(StructValueError)
    })

    test("too few bytes", () => {
        let struct = defineStruct({ a: UINT32 });
        expect(() => struct.from(new Uint8Array(2))).toThrow(ParseError)
        expect(() => struct.from(new Uint8Array(2))).toThrow('too few bytes for "a" (needed 4 bytes, 2 available)')
    })

    test("defaults", () => {
        let st = defineStruct({ ttl: DEFAULT(UINT8, 64), b: UINT8 }).create();
        expect(st.get("ttl")).eq(64)
        expect(st.isAssigned("ttl")).eq(false)
        st.set("b", 1)
        expect(st.isAssigned("b")).eq(true)
    })

    test("toHuman", () => {
        let st = defineStruct({ a: UINT8, b: ENUM(UINT8, { ONE: 1, TWO: 2 }) }).create({ a: 1, b: 2 });
        expect(st.toHuman()).eq("a: 1\nb: TWO")
        st.fromHuman("b", "ONE")
        expect(st.get("b")).eq(1)
    })

    test("clone", () => {
        let struct = defineStruct({ a: UINT8, data: SLICE });
        let st = struct.create({ a: 1, data: __fromHex("aabb") });
        let copy = struct.clone(st);
        copy.get("data")[0] = 0;
        copy.set("a", 2);
        expect(__toHex(st.get("data"))).eq("aabb")
        expect(st.get("a")).eq(1)
        expect(copy.isAssigned("data")).eq(true)
    })

    test("clone copies nested structs", () => {
        let point = defineStruct({ x: UINT8, y: UINT8 });
        let path = defineStruct({ head: STRUCT(point), points: ARRAY(STRUCT(point), 2) });
        let st = path.create({ head: point.create({ x: 1 }), points: [point.create({ x: 2 }), point.create({ x: 3 })] });

        let copy = path.clone(st);
        copy.get("head").set("x", 9);
        copy.get("points")[0].set("x", 9);

        expect(st.get("head").get("x")).eq(1)
        expect(st.get("points").map(p => p.get("x"))).toStrictEqual([2, 3])
        expect(__toHex(copy.getBuffer())).eq("090009000300")
    })
})

describe("Value types", () => {
    test("ENUM", () => {
        let type = ENUM(UINT8, { A: 1, B: 2 });
        expect(type.toHuman(2)).eq("B")
        expect(type.toHuman(9)).eq("<unknown:9>")
        expect(type.fromHuman?.("A")).eq(1)
        expect(type.fromHuman?.("0x02")).eq(2)
        expect(() => type.fromHuman?.("C")).toThrow(ArgumentError)
    })

    test("CSTRING", () => {
        expect(CSTRING().decode(__fromHex("686900ff"), { bigEndian: true }, {})).toEqual(["hi", 3])
        expect(() => CSTRING().decode(__fromHex("6869"), { bigEndian: true }, {})).toThrow(ParseError)
        expect(__toHex(CSTRING(4).encode("hi", { bigEndian: true }))).eq("68690000")
        expect(CSTRING(4).decode(__fromHex("68690000"), { bigEndian: true }, {})).toEqual(["hi", 4])
    })

    test("INT_STRING", () => {
        let type = INT_STRING(UINT8);
        expect(__toHex(type.encode("abc", { bigEndian: true }))).eq("03616263")
        expect(type.decode(__fromHex("0261626300"), { bigEndian: true }, {})).toEqual(["ab", 3])
        expect(() => type.decode(__fromHex("0561"), { bigEndian: true }, {})).toThrow(ParseError)
    })

    test("OPTIONAL", () => {
        let struct = defineStruct({
            flags: UINT8,
            extra: OPTIONAL(UINT16, ["flags"], ({ flags }) => (flags & 1) == 1),
            rest: SLICE,
        });

        let st = struct.from(__fromHex("011234aa"));
        expect(st.get("extra")).eq(0x1234)
        expect(__toHex(st.get("rest"))).eq("aa")

        st = struct.from(__fromHex("001234"));
        expect(st.has("extra")).eq(false)
        expect(st.get("extra")).eq(0)
        expect(__toHex(st.get("rest"))).eq("1234")
        expect(st.size).eq(3)
    })

    test("LENGTH_FROM", () => {
        let struct = defineStruct({
            len: UINT8,
            data: LENGTH_FROM(SLICE, ["len"], ({ len }) => len),
            tail: UINT8,
        });

        let st = struct.from(__fromHex("02aabbcc"));
        expect(__toHex(st.get("data"))).eq("aabb")
        expect(st.get("tail")).eq(0xcc)
        expect(st.offsetOf("tail")).eq(3)

        expect(() => struct.from(__fromHex("05aa"))).toThrow(ParseError)
    })

    test("STRUCT", () => {
        let inner = defineStruct({ a: UINT8, b: UINT8 });
        let outer = defineStruct({ first: STRUCT(inner), last: UINT8 });
        let st = outer.from(__fromHex("010203"));
        expect(st.get("first").get("b")).eq(2)
        expect(st.get("last")).eq(3)
        expect(st.toHuman()).eq("first: { a: 1, b: 2 }\nlast: 3")
    })
})

describe("Arrays", () => {
    const COUNTED = defineStruct({
        count: UINT8,
        items: ARRAY(UINT16, { counter: "count" }),
        rest: SLICE,
    });

    test("counter bound", () => {
        let st = COUNTED.from(__fromHex("020001000200030004"));
        expect(st.get("items")).toEqual([1, 2])
        expect(__toHex(st.get("rest"))).eq("00030004")
    })

    test("the counter is read before every element", () => {
        let st = COUNTED.create({ count: 3 });
        let consumed = st.readField("items", __fromHex("000a000b000c000d"));
        expect(consumed).eq(6)
        expect(st.get("items")).toEqual([10, 11, 12])

        st.set("count", 1);
        st.readField("items", __fromHex("000a000b000c000d"));
        expect(st.get("items")).toEqual([10])
    })

    test("push leaves the counter, append and remove follow it", () => {
        let st = COUNTED.create();
        st.push("items", 1, 2);
        expect(st.get("count")).eq(0)
        expect(__toHex(st.getBuffer())).eq("0000010002")

        st.append("items", 3);
        expect(st.get("count")).eq(1)
        st.remove("items", 0);
        expect(st.get("count")).eq(0)
        expect(st.get("items")).toEqual([2, 3])
    })

    test("length bound", () => {
        let struct = defineStruct({
            len: UINT8,
            items: LENGTH_FROM(ARRAY(UINT16), ["len"], ({ len }) => len),
            tail: UINT8,
        });

        let st = struct.from(__fromHex("04000100020f"));
        expect(st.get("items")).toEqual([1, 2])
        expect(st.get("tail")).eq(0x0f)

        expect(() => struct.from(__fromHex("030001000f"))).toThrow(FormatError)
    })

    test("fixed size", () => {
        let struct = defineStruct({ items: ARRAY(UINT8, 3) });
        expect(struct.getMinSize()).eq(3)
        expect(struct.from(__fromHex("010203")).get("items")).toEqual([1, 2, 3])
        expect(() => struct.create({ items: [1, 2] })).toThrow(StructValueError)
    })
})
