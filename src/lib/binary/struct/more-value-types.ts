import { ArgumentError, ParseError, StructValueError } from "../../errors";
import { uint8_fromString, uint8_toString } from "../uint8-array";
import { StructDependency, StructType, StructValue } from "./shared";
import { IntType } from "./value-types";

export type EnumTable = Readonly<Record<string, number>>;

export type EnumType<Table extends EnumTable> = IntType & {
    table: Table;
    nameOf(value: number): string | undefined;
};

/**
 * An integer that is shown by name, stored and accepted as a number.
 * @example ENUM(UINT8, { ECHO_REQUEST: 8, ECHO_REPLY: 0 })
 */
export function ENUM<Table extends EnumTable>(sType: IntType, table: Table): EnumType<Table> {
    let names = new Map<number, string>();
    for (let [name, value] of Object.entries(table)) {
        if (!names.has(value)) names.set(value, name);
    }

    return {
        ...sType,
        table,
        nameOf: value => names.get(value),
        toHuman: value => names.get(value) ?? `<unknown:${value}>`,
        fromHuman(input) {
            input = input.trim();
            if (input in table) return table[input];
            if (/^(0x[0-9a-f]+|\d+)$/i.test(input)) {
                let value = Number(input);
                sType.toBits(value);
                return value;
            }
            throw new ArgumentError(`"${input}" is not one of ${Object.keys(table).join(", ")}`);
        },
    };
}

export type ValueCodec = {
    /** human value to wire value */
    encode(value: number): number;
    /** wire value to human value */
    decode(raw: number): number;
};

/**
 * Stores the human value and converts it at the wire boundary,
 * eg. the floating point like "max response code" of MLDv2 and IGMPv3.
 */
export function CODED(sType: IntType, codec: ValueCodec): IntType {
    return {
        ...sType,
        decode(buf, options, bound) {
            let [raw, consumed] = sType.decode(buf, options, bound);
            return [codec.decode(raw), consumed];
        },
        encode: (value, options) => sType.encode(codec.encode(value), options),
        fromBits: bits => codec.decode(sType.fromBits(bits)),
        toBits: value => sType.toBits(codec.encode(value)),
    };
}

/**
 * NUL terminated string. With a `staticLength` the field always occupies that many
 * bytes and the string is cut at the first NUL.
 */
export function CSTRING(staticLength?: number): StructType<string> {
    let terminated = (value: string) => uint8_fromString(value + "\0");

    return {
        bitLength: staticLength ? staticLength * 8 : -1,
        defaultValue: () => "",
        decode(buf) {
            let limit = staticLength ?? buf.byteLength;
            let end = buf.subarray(0, limit).indexOf(0);
            if (end < 0 && !staticLength) {
                throw new ParseError("string is not terminated");
            }
            let text = uint8_toString(buf.subarray(0, end < 0 ? limit : end));
            return [text, staticLength ?? end + 1];
        },
        encode(value) {
            let bytes = terminated(value);
            if (!staticLength) return bytes;
            if (bytes.byteLength > staticLength + 1) {
                throw new StructValueError(`string longer than ${staticLength} bytes`, value);
            }
            let buf = new Uint8Array(staticLength);
            buf.set(bytes.subarray(0, staticLength));
            return buf;
        },
        size: value => staticLength ?? terminated(value).byteLength,
        toHuman: value => value,
        fromHuman: input => input,
    };
}

/** a string prefixed with its byte length */
export function INT_STRING(lengthType: IntType): StructType<string> {
    let prefix = lengthType.bitLength / 8;

    return {
        bitLength: -1,
        defaultValue: () => "",
        decode(buf, options) {
            let [length] = lengthType.decode(buf, options, {});
            if (buf.byteLength < prefix + length) {
                throw new ParseError("string is truncated", prefix + length, buf.byteLength);
            }
            return [uint8_toString(buf.subarray(prefix, prefix + length)), prefix + length];
        },
        encode(value, options) {
            let bytes = uint8_fromString(value);
            let buf = new Uint8Array(prefix + bytes.byteLength);
            buf.set(lengthType.encode(bytes.byteLength, options));
            buf.set(bytes, prefix);
            return buf;
        },
        size: value => prefix + uint8_fromString(value).byteLength,
        toHuman: value => value,
        fromHuman: input => input,
    };
}

/**
 * The field is only encoded and decoded when `predicate` holds for the named earlier fields.
 * @example OPTIONAL(UINT32, ["flags"], ({ flags }) => (flags & 1) == 1)
 */
export function OPTIONAL<T>(sType: StructType<T>, refs: readonly string[], predicate: StructDependency<boolean>["resolve"]): StructType<T> {
    return { ...sType, present: { refs, resolve: predicate } };
}

/**
 * The field occupies the number of bytes computed from the named earlier fields.
 * @example LENGTH_FROM(SLICE, ["ihl"], ({ ihl }) => ihl * 4 - 20)
 */
export function LENGTH_FROM<T>(sType: StructType<T>, refs: readonly string[], length: StructDependency<number>["resolve"]): StructType<T> {
    return { ...sType, lengthFrom: { refs, resolve: length } };
}

/** overrides the value a field starts with */
export function DEFAULT<ST extends StructType<unknown>>(sType: ST, value: StructValue<ST>): ST {
    return { ...sType, defaultValue: () => value };
}
