import { StructValueError } from "../../errors";

export type StructOptions = {
    /** big endian is true by default if false it will be assumed that littleEndian is true */
    bigEndian: boolean;
}

export const STRUCT_DEFAULT_OPTIONS: StructOptions = {
    bigEndian: true,
}

/** limits handed to a value type while it decodes */
export type StructBound = {
    /** exact number of bytes the value occupies */
    length?: number;
    /** number of elements, called again before every element */
    count?: () => number;
}

/**
 * A value computed from earlier siblings in the same struct.
 * `refs` names the siblings, they are handed to `resolve` as numbers
 * (byte arrays and arrays by their length).
 */
export type StructDependency<R> = {
    refs: readonly string[];
    resolve(siblings: Record<string, number>): R;
}

export interface StructType<T> {
    /** bitLength of the value type, -1 when the size depends on the value */
    bitLength: number;
    /** returns a fresh value used when nothing has been set */
    defaultValue(): T;
    decode(buf: Uint8Array, options: StructOptions, bound: StructBound): [value: T, consumed: number];
    encode(value: T, options: StructOptions): Uint8Array;
    size(value: T, options: StructOptions): number;
    toHuman(value: T): string;
    fromHuman?(input: string): T;

    /** integer conversions used when the value lives inside a bit-field group */
    fromBits?(bits: number): T;
    toBits?(value: T): number;

    /** reads everything it is given, unless a length bounds it */
    greedy?: boolean;
    /** the field is only present when this holds */
    present?: StructDependency<boolean>;
    /** the field occupies exactly this many bytes */
    lengthFrom?: StructDependency<number>;
    /** name of an earlier sibling holding the number of elements */
    counter?: string;
}

export type StructTypes = Record<string, StructType<unknown>>;
export type StructKey<Types extends StructTypes> = keyof Types & string;
export type StructValue<ST> = ST extends StructType<infer T> ? T : never;
export type StructValues<Types extends StructTypes> = { [K in StructKey<Types>]: StructValue<Types[K]> };
export type ElementOf<V> = V extends readonly (infer E)[] ? E : never;

/** Makes buffer to a `number` */
export function _bufToNumber(buf: Uint8Array) {
    let n = 0;
    for (let i = 0; i < buf.byteLength; i++) {
        n = n * 256 + buf[i];
    }
    return n;
}

/** converts a sibling value into the number a dependency sees */
export function toNumeric(key: string, value: unknown): number {
    if (typeof value == "number") return value;
    if (typeof value == "bigint") return Number(value);
    if (typeof value == "boolean") return value ? 1 : 0;
    if (value instanceof Uint8Array || Array.isArray(value)) return value.length;

    throw new StructValueError(`"${key}" is not numeric`, value);
}

export function resolveDependency<R>(dependency: StructDependency<R>, values: Record<string, unknown>): R {
    let siblings: Record<string, number> = {};
    for (let ref of dependency.refs) {
        siblings[ref] = toNumeric(ref, values[ref]);
    }
    return dependency.resolve(siblings);
}
