import { ArgumentError, ParseError, StructValueError } from "../../errors";
import { uint8_fromHex, uint8_readUint, uint8_toHex, uint8_writeUint } from "../uint8-array";
import { defineSizedType } from "./define";
import { StructOptions, StructType } from "./shared";

type ByteOrder = "big" | "little" | "inherit";

export type IntType = StructType<number> & {
    fromBits(bits: number): number;
    toBits(value: number): number;
};

function isBigEndian(order: ByteOrder, options: StructOptions): boolean {
    return order == "inherit" ? options.bigEndian : order == "big";
}

function parseInteger(input: string): number {
    let n = Number(input.trim());
    if (!Number.isInteger(n)) {
        throw new ArgumentError("not an integer: " + input);
    }
    return n;
}

function readBytes(buf: Uint8Array, byteLength: number): Uint8Array {
    if (buf.byteLength < byteLength) {
        throw new ParseError("too few bytes", byteLength, buf.byteLength);
    }
    return buf.subarray(0, byteLength);
}

function defineUINT(bitLength: number, order: ByteOrder = "inherit"): IntType {
    let byteLength = Math.ceil(bitLength / 8);
    let toBits = (v: number) => {
        if (!Number.isInteger(v)) {
            throw new StructValueError("value must be an integer!", v)
        }
        if (v < 0) {
            throw new StructValueError("value must be positive!", v)
        }
        if (v >= 2 ** bitLength) {
            throw new StructValueError("value does not fit in bits", v)
        }
        return v;
    };

    return {
        bitLength,
        defaultValue: () => 0,
        decode(buf, options) {
            let bytes = readBytes(buf, byteLength);
            return [uint8_readUint(bytes, 0, byteLength, isBigEndian(order, options)), byteLength];
        },
        encode(v, options) {
            return uint8_writeUint(new Uint8Array(byteLength), toBits(v), 0, byteLength, isBigEndian(order, options));
        },
        size: () => byteLength,
        toHuman: v => v.toString(),
        fromHuman: parseInteger,
        fromBits: bits => bits,
        toBits,
    };
}

/** two's complement */
function defineINT(bitLength: number, order: ByteOrder = "inherit"): IntType {
    let byteLength = Math.ceil(bitLength / 8);
    let limit = 2 ** (bitLength - 1);
    let fromBits = (bits: number) => bits >= limit ? bits - 2 * limit : bits;
    let toBits = (v: number) => {
        if (!Number.isInteger(v)) {
            throw new StructValueError("value must be an integer!", v)
        }
        if (v >= limit || v < -limit) {
            throw new StructValueError("value does not fit in bits", v)
        }
        return v < 0 ? v + 2 * limit : v;
    };

    return {
        bitLength,
        defaultValue: () => 0,
        decode(buf, options) {
            let bytes = readBytes(buf, byteLength);
            return [fromBits(uint8_readUint(bytes, 0, byteLength, isBigEndian(order, options))), byteLength];
        },
        encode(v, options) {
            return uint8_writeUint(new Uint8Array(byteLength), toBits(v), 0, byteLength, isBigEndian(order, options));
        },
        size: () => byteLength,
        toHuman: v => v.toString(),
        fromHuman: parseInteger,
        fromBits,
        toBits,
    };
}

function define64(signed: boolean, order: ByteOrder = "inherit"): StructType<bigint> {
    let min = signed ? -(2n ** 63n) : 0n, max = signed ? 2n ** 63n : 2n ** 64n;
    return {
        bitLength: 64,
        defaultValue: () => 0n,
        decode(buf, options) {
            let bytes = readBytes(buf, 8);
            let view = new DataView(bytes.buffer, bytes.byteOffset, 8);
            let littleEndian = !isBigEndian(order, options);
            return [signed ? view.getBigInt64(0, littleEndian) : view.getBigUint64(0, littleEndian), 8];
        },
        encode(v, options) {
            if (v < min || v >= max) {
                throw new StructValueError("value does not fit in bits", v)
            }
            let buf = new Uint8Array(8), view = new DataView(buf.buffer);
            let littleEndian = !isBigEndian(order, options);
            if (signed) {
                view.setBigInt64(0, v, littleEndian);
            } else {
                view.setBigUint64(0, v, littleEndian);
            }
            return buf;
        },
        size: () => 8,
        toHuman: v => v.toString(),
        fromHuman(input) {
            try {
                return BigInt(input.trim());
            } catch (error) {
                throw new ArgumentError("not an integer: " + input, { cause: error });
            }
        },
    };
}

const sizedUINT = (bitLength: number, order?: ByteOrder) =>
    defineSizedType(defineUINT(bitLength, order), bits => defineUINT(bits, order));
const sizedINT = (bitLength: number, order?: ByteOrder) =>
    defineSizedType(defineINT(bitLength, order), bits => defineINT(bits, order));

// byte order follows the struct options
export const UINT8 = sizedUINT(8);
export const UINT16 = sizedUINT(16);
export const UINT24 = sizedUINT(24);
export const UINT32 = sizedUINT(32);
export const UINT64 = define64(false);

export const INT8 = sizedINT(8);
export const INT16 = sizedINT(16);
export const INT32 = sizedINT(32);
export const INT64 = define64(true);

// fixed byte order
export const UINT16BE = sizedUINT(16, "big");
export const UINT32BE = sizedUINT(32, "big");
export const UINT16LE = sizedUINT(16, "little");
export const UINT24LE = sizedUINT(24, "little");
export const UINT32LE = sizedUINT(32, "little");
export const UINT64BE = define64(false, "big");
export const UINT64LE = define64(false, "little");
export const INT16LE = sizedINT(16, "little");
export const INT32LE = sizedINT(32, "little");
export const INT64LE = define64(true, "little");

/** the rest of the input, or exactly the bound length */
export const SLICE: StructType<Uint8Array> = {
    bitLength: -1,
    greedy: true,
    defaultValue: () => new Uint8Array(0),
    decode(buf, _, bound) {
        if (bound.length === undefined) {
            return [new Uint8Array(buf), buf.byteLength];
        }
        return [new Uint8Array(readBytes(buf, bound.length)), bound.length];
    },
    encode: buf => buf,
    size: buf => buf.byteLength,
    toHuman: buf => uint8_toHex(buf),
    fromHuman: uint8_fromHex,
}

export const BYTE_ARRAY = (length: number): StructType<Uint8Array> => ({
    bitLength: length * 8,
    defaultValue: () => new Uint8Array(length),
    decode(buf) {
        return [new Uint8Array(readBytes(buf, length)), length];
    },
    encode(buf) {
        if (buf.byteLength != length) {
            throw new StructValueError(`expected ${length} bytes`, buf);
        }
        return buf;
    },
    size: () => length,
    toHuman: buf => uint8_toHex(buf),
    fromHuman: uint8_fromHex,
})
