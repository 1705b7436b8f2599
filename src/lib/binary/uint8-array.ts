import { ArgumentError } from "../errors";

/**
 * Helpers over plain `Uint8Array`s, so that nothing depends on the node `Buffer`.
 */

export function uint8_equals(a: Uint8Array, b: Uint8Array): boolean {
    return a.byteLength == b.byteLength && a.every((n, i) => n == b[i]);
}

export function uint8_concat(list: readonly Uint8Array[]): Uint8Array {
    let buffer = new Uint8Array(list.reduce((sum, { byteLength }) => sum + byteLength, 0));

    let offset = 0;
    for (let part of list) {
        buffer.set(part, offset);
        offset += part.byteLength;
    }

    return buffer;
}

/** big endian representation of `n` in `len` bytes, the high bytes that do not fit are dropped */
export function uint8_fromNumber(n: number, len: number = 1): Uint8Array {
    let buf = uint8_writeUint(new Uint8Array(len), n % 2 ** (len * 8), 0, len);

    if (n >= 2 ** (len * 8)) {
        console.warn(n + ": does not fit in specified size")
    }

    return buf;
}

/** reads an unsigned integer of `length` (at most 6) bytes */
export function uint8_readUint(source: Uint8Array, offset: number, length: number, bigEndian = true): number {
    let n = 0;
    for (let i = 0; i < length; i++) {
        n = n * 256 + source[bigEndian ? offset + i : offset + length - 1 - i];
    }
    return n;
}

/** writes an unsigned integer of `length` (at most 6) bytes */
export function uint8_writeUint(target: Uint8Array, n: number, offset: number, length: number, bigEndian = true): Uint8Array {
    for (let i = length - 1; i >= 0; i--) {
        target[bigEndian ? offset + i : offset + length - 1 - i] = n % 256;
        n = Math.floor(n / 256);
    }
    return target;
}

export function uint8_fromString(str: string): Uint8Array {
    return new TextEncoder().encode(str);
}

export function uint8_toString(buf: Uint8Array): string {
    return new TextDecoder().decode(buf);
}

export function uint8_toHex(buf: Uint8Array): string {
    return Array.from(buf, n => n.toString(16).padStart(2, "0")).join("");
}

export function uint8_fromHex(hex: string): Uint8Array {
    hex = hex.replace(/\s+/g, "");
    if (hex.length % 2 || /[^0-9a-f]/i.test(hex)) {
        throw new ArgumentError("invalid hex string: " + hex);
    }
    return Uint8Array.from({ length: hex.length / 2 }, (_, i) => parseInt(hex.slice(i * 2, i * 2 + 2), 16));
}

/** number of bytes needed to pad `length` to a multiple of `alignment` */
export function uint8_padLength(length: number, alignment = 4): number {
    return (alignment - (length % alignment)) % alignment;
}
