import { Buffer } from "buffer";
import { describe, expect, test } from "vitest";
import { SLICE, UINT8 } from "../../lib/binary/struct/";
import { ArgumentError, BindingError } from "../../lib/errors";
import { Binding, ProtocolRegistry, createProtocolRegistry, defineHeader } from "../../lib/header";
import { Packet } from "../../lib/packet/packet";

function __fromHex(hex: string): Uint8Array {
    return new Uint8Array(Buffer.from(hex, "hex"));
}
function __toHex(buf: Uint8Array): string {
    return Buffer.from(buf).toString("hex");
}

const OUTER = defineHeader("Outer", { kind: UINT8, body: SLICE });
const FIRST = defineHeader("First", { x: UINT8, body: SLICE });
const SECOND = defineHeader("Second", { y: UINT8, body: SLICE });

function testRegistry(): ProtocolRegistry {
    return new ProtocolRegistry()
        .bind(OUTER, FIRST, { kind: 1 })
        .bind(OUTER, SECOND, { kind: { min: 2 } });
}

describe("Binding", () => {
    test("describe", () => {
        expect(new Binding(OUTER, FIRST, { kind: 1 }).describe()).eq("Outer -> First when kind == 1");
        expect(new Binding(OUTER, FIRST, { kind: [1, 3] }).describe()).eq("Outer -> First when kind in [1, 3]");
        expect(new Binding(OUTER, SECOND, { kind: { min: 2 } }, { bodyLength: { min: 1, max: 3 } }).describe())
            .eq("Outer -> Second when kind >= 2, 1 <= bodyLength <= 3");
        expect(new Binding(OUTER, SECOND, {}).describe()).eq("Outer -> Second");
    });

    test("defaults", () => {
        expect(new Binding(OUTER, FIRST, { kind: [3, 1] }).defaults()).toStrictEqual({ kind: 3 });
        expect(new Binding(OUTER, FIRST, { kind: { min: 7 } }).defaults()).toStrictEqual({ kind: 7 });
        expect(new Binding(OUTER, FIRST, { kind: { max: 4 } }).defaults()).toStrictEqual({ kind: 0 });
    });

    test("unknown fields", () => {
        expect(() => new Binding(OUTER, FIRST, { nope: 1 })).toThrow(`Outer has no field "nope" to bind on`);
        expect(() => new Binding(OUTER, FIRST, { body: 1 })).toThrow(ArgumentError);
        expect(() => new Binding(OUTER, FIRST, { kind: [] })).toThrow(`empty value list for "kind"`);
    });

    test("matches", () => {
        let binding = new Binding(OUTER, FIRST, { kind: [1, 2] }, { bodyLength: { min: 2 } });
        expect(binding.matches(OUTER.from(__fromHex("01aabb")))).eq(true);
        expect(binding.matches(OUTER.from(__fromHex("01aa")))).eq(false);
        expect(binding.matches(OUTER.from(__fromHex("03aabb")))).eq(false);
    });
});

describe("ProtocolRegistry", () => {
    test("overlapping bindings", () => {
        let registry = testRegistry();
        expect(() => registry.bind(OUTER, FIRST, { kind: [0, 1] })).not.toThrow();
        expect(() => registry.bind(OUTER, SECOND, { kind: [1, 2] })).toThrow(BindingError);
        expect(() => registry.bind(OUTER, FIRST, { kind: 5 }))
            .toThrow(`ambiguous binding: "Outer -> First when kind == 5" overlaps "Outer -> Second when kind >= 2"`);
    });

    test("body length separates bindings", () => {
        let registry = new ProtocolRegistry()
            .bind(OUTER, FIRST, { kind: 3 }, { bodyLength: { max: 4 } });
        expect(() => registry.bind(OUTER, SECOND, { kind: 3 }, { bodyLength: { min: 5 } })).not.toThrow();
        expect(() => registry.bind(OUTER, SECOND, { kind: 3 }, { bodyLength: { min: 4 } })).toThrow(BindingError);
    });

    test("the shared bindings do not overlap", () => {
        expect(() => createProtocolRegistry()).not.toThrow();
    });

    test("lookup", () => {
        let registry = testRegistry();
        expect(registry.get("First")).eq(FIRST);
        expect(registry.find("Third")).eq(undefined);
        expect(() => registry.get("Third")).toThrow(`unknown protocol "Third"`);
        expect(registry.all().map(t => t.protocolName)).toStrictEqual(["Outer", "First", "Second"]);
    });

    test("names are unique", () => {
        let registry = testRegistry();
        let other = defineHeader("First", { z: UINT8, body: SLICE });
        expect(() => registry.register(other)).toThrow("protocol First is already registered");
    });

    test("sealed by the first packet", () => {
        let registry = testRegistry();
        new Packet({ registry });

        expect(registry.isSealed).eq(true);
        expect(() => registry.register(OUTER)).not.toThrow();
        expect(() => registry.register(defineHeader("Third", { body: SLICE })))
            .toThrow("cannot register Third; the registry is in use and sealed");
        expect(() => registry.bind(FIRST, SECOND)).toThrow(BindingError);
    });
});

describe("Composing with bindings", () => {
    test("discriminators are set from the binding", () => {
        let pkt = Packet.gen(OUTER, {}, { registry: testRegistry() }).add(FIRST, { x: 7 });
        expect(pkt.headers[0].numeric("kind")).eq(1);
        expect(__toHex(pkt.toBuffer())).eq("0107");

        pkt = Packet.gen(OUTER, {}, { registry: testRegistry() }).add(SECOND);
        expect(pkt.headers[0].numeric("kind")).eq(2);
    });

    test("explicit values must match", () => {
        let pkt = Packet.gen(OUTER, { kind: 9 }, { registry: testRegistry() }).add(SECOND);
        expect(pkt.headers[0].numeric("kind")).eq(9);

        expect(() => Packet.gen(OUTER, { kind: 5 }, { registry: testRegistry() }).add(FIRST))
            .toThrow("Outer does not match any binding to First: Outer -> First when kind == 1");
    });

    test("unbound protocols", () => {
        let error: unknown;
        try {
            Packet.gen(FIRST, {}, { registry: testRegistry() }).add(OUTER);
        } catch (e) {
            error = e;
        }

        expect(error).toBeInstanceOf(BindingError);
        if (!(error instanceof BindingError)) return;
        expect(error.from).eq("First");
        expect(error.to).eq("Outer");
        expect(error.hint).eq("registry.bind(First, Outer, { /* discriminator fields of First */ })");
        expect(error.message).eq("Outer cannot follow First; registry.bind(First, Outer, { /* discriminator fields of First */ })");
    });

    test("dissect", () => {
        let registry = testRegistry();
        let pkt = Packet.parse(__fromHex("0107aa"), { firstHeader: "Outer", registry });
        expect(pkt.toString()).eq("Outer / First");
        expect(pkt.headers[1].numeric("x")).eq(7);
        expect(__toHex(pkt.body)).eq("aa");

        pkt = Packet.parse(__fromHex("0507aa"), { firstHeader: OUTER, registry });
        expect(pkt.toString()).eq("Outer / Second");
        expect(__toHex(pkt.body)).eq("aa");

        pkt = Packet.parse(__fromHex("0007aa"), { firstHeader: OUTER, registry });
        expect(pkt.toString()).eq("Outer");
        expect(__toHex(pkt.body)).eq("07aa");
    });
});
