import { ArgumentError, CreateStructTypeError, FormatError, ParseError, StructValueError } from "../../errors";
import { uint8_concat, uint8_readUint, uint8_writeUint } from "../uint8-array";
import {
    ElementOf, STRUCT_DEFAULT_OPTIONS, StructBound, StructKey, StructOptions, StructType, StructTypes,
    StructValue, StructValues, resolveDependency, toNumeric
} from "./shared";

type GroupMember = {
    key: string;
    width: number;
    /** distance of the member's least significant bit from the end of the group */
    shift: number;
    fromBits(bits: number): unknown;
    toBits(value: unknown): number;
}

type FieldLayout =
    | { kind: "field"; key: string; type: StructType<unknown> }
    | { kind: "group"; byteLength: number; members: GroupMember[] };

/** bit-field groups are wider than a byte only as far as a safe integer goes */
const MAX_GROUP_BITS = 48;

/**
 * The validated, shared description of a struct: field order, value types
 * and bit-field groups. Instances only carry values.
 *
 * RULES:
 * (1) consecutive fields that are not byte aligned form a bit-field group, a group MUST end on a byte boundary.
 * (2) a greedy value-type, eg. `SLICE`, MUST be the last value unless its length is bound.
 * (3) lengths, presence and counters may only refer to earlier fields.
 */
export class StructSchema<Types extends StructTypes> {
    readonly order: StructKey<Types>[];
    readonly options: StructOptions;
    private readonly keys: ReadonlySet<string>;
    private readonly layout: FieldLayout[];

    constructor(readonly types: Types, options: Partial<StructOptions> = {}) {
        this.options = { ...STRUCT_DEFAULT_OPTIONS, ...options };
        this.order = Object.keys(types).filter((key): key is StructKey<Types> => key in types);
        this.keys = new Set(this.order);
        this.layout = this.buildLayout();
    }

    private buildLayout(): FieldLayout[] {
        let layout: FieldLayout[] = [];
        let group: { kind: "group"; byteLength: number; members: GroupMember[] } | undefined;
        let groupBits = 0;
        let seen = new Set<string>();

        for (let [index, key] of this.order.entries()) {
            let type: StructType<unknown> = this.types[key];

            let refs = [...(type.present?.refs ?? []), ...(type.lengthFrom?.refs ?? []), ...(type.counter ? [type.counter] : [])];
            for (let ref of refs) {
                if (!seen.has(ref)) {
                    throw new CreateStructTypeError(StructSchema, `"${key}" refers to "${ref}" which is not an earlier field`);
                }
            }

            if (group || (type.bitLength > 0 && type.bitLength % 8 != 0)) {
                let { fromBits, toBits } = type;
                if (!fromBits || !toBits || type.bitLength <= 0 || refs.length) {
                    throw new CreateStructTypeError(StructSchema, `"${key}" cannot be part of a bit-field group`);
                }

                if (!group) {
                    group = { kind: "group", byteLength: 0, members: [] };
                    groupBits = 0;
                    layout.push(group);
                }

                group.members.push({ key, width: type.bitLength, shift: groupBits, fromBits, toBits });
                groupBits += type.bitLength;

                if (groupBits > MAX_GROUP_BITS) {
                    throw new CreateStructTypeError(StructSchema, `bit-field group ending with "${key}" is wider than ${MAX_GROUP_BITS} bits`);
                }

                if (groupBits % 8 == 0) {
                    // shift held the offset from the start of the group until now
                    for (let member of group.members) {
                        member.shift = groupBits - member.shift - member.width;
                    }
                    group.byteLength = groupBits / 8;
                    group = undefined;
                }
            } else {
                if (type.greedy && !type.lengthFrom && index != this.order.length - 1) {
                    throw new CreateStructTypeError(StructSchema, "cannot define struct; slice must be last value");
                }
                layout.push({ kind: "field", key, type });
            }

            seen.add(key);
        }

        if (group) {
            throw new CreateStructTypeError(StructSchema, "cannot define struct; total bitLength MUST be a multiple of 8");
        }

        return layout;
    }

    isKey(key: string): key is StructKey<Types> {
        return this.keys.has(key);
    }

    assertKey(key: string): void {
        if (!this.keys.has(key)) {
            throw new StructValueError(`unknown field "${key}"`, key);
        }
    }

    /** the sum of the required fixed size fields */
    getMinSize(): number {
        let size = 0;
        for (let entry of this.layout) {
            if (entry.kind == "group") {
                size += entry.byteLength;
            } else if (!entry.type.present && entry.type.bitLength > 0) {
                size += entry.type.bitLength / 8;
            }
        }
        return size;
    }

    /** true when the last field reads everything it is given */
    get greedy(): boolean {
        let last = this.layout.at(-1);
        return last?.kind == "field" && !!last.type.greedy && !last.type.lengthFrom;
    }

    defaults(): Record<string, unknown> {
        let values: Record<string, unknown> = {};
        for (let key of this.order) {
            values[key] = this.types[key].defaultValue();
        }
        return values;
    }

    isPresent(key: string, values: Record<string, unknown>): boolean {
        this.assertKey(key);
        let present = this.types[key].present;
        return present ? resolveDependency(present, values) : true;
    }

    /** throws a `StructValueError` when the value cannot be encoded */
    checkValue(key: string, value: unknown, options: StructOptions): void {
        let member = this.findMember(key);
        if (member) {
            member.toBits(value);
            return;
        }

        let type: StructType<unknown> = this.types[key];
        if (value === undefined || value === null) {
            throw new StructValueError(`"${key}" cannot be empty`, value);
        }
        if (type.bitLength > 0) {
            type.encode(value, options);
        }
    }

    private findMember(key: string): GroupMember | undefined {
        for (let entry of this.layout) {
            if (entry.kind != "group") continue;
            let member = entry.members.find(m => m.key == key);
            if (member) return member;
        }
        return undefined;
    }

    /**
     * decodes values in declaration order into `values`
     * @returns number of bytes consumed
     */
    decodeValues(buf: Uint8Array, options: StructOptions, values: Record<string, unknown>, assigned: Set<string>): number {
        let offset = 0;

        for (let entry of this.layout) {
            let rest = buf.subarray(offset);

            if (entry.kind == "group") {
                offset += this.decodeGroup(entry, rest, values, assigned);
                continue;
            }

            let decoded = this.decodeField(entry.key, entry.type, rest, options, values);
            if (!decoded) continue;

            values[entry.key] = decoded[0];
            assigned.add(entry.key);
            offset += decoded[1];
        }

        return offset;
    }

    private decodeGroup(
        entry: { byteLength: number; members: GroupMember[] },
        buf: Uint8Array,
        values: Record<string, unknown>,
        assigned: Set<string>,
        only?: string
    ): number {
        if (buf.byteLength < entry.byteLength) {
            throw new ParseError(`too few bytes for "${entry.members.map(m => m.key).join(", ")}"`, entry.byteLength, buf.byteLength);
        }

        // bit-field groups are always most significant byte first
        let n = uint8_readUint(buf, 0, entry.byteLength, true);
        for (let member of entry.members) {
            if (only && member.key != only) continue;
            values[member.key] = member.fromBits(Math.floor(n / 2 ** member.shift) % 2 ** member.width);
            assigned.add(member.key);
        }

        return entry.byteLength;
    }

    private decodeField(key: string, type: StructType<unknown>, buf: Uint8Array, options: StructOptions, values: Record<string, unknown>): [unknown, number] | undefined {
        if (type.present && !resolveDependency(type.present, values)) {
            return undefined;
        }

        let bound: StructBound = {};

        if (type.lengthFrom) {
            let length = resolveDependency(type.lengthFrom, values);
            if (!Number.isInteger(length) || length < 0) {
                throw new FormatError(`invalid length ${length} for "${key}"`);
            }
            if (length > buf.byteLength) {
                throw new ParseError(`too few bytes for "${key}"`, length, buf.byteLength);
            }
            bound.length = length;
            buf = buf.subarray(0, length);
        }

        let counter = type.counter;
        if (counter) {
            bound.count = () => toNumeric(counter, values[counter]);
        }

        if (type.bitLength > 0 && buf.byteLength < type.bitLength / 8) {
            throw new ParseError(`too few bytes for "${key}"`, type.bitLength / 8, buf.byteLength);
        }

        let [value, consumed] = type.decode(buf, options, bound);
        return [value, bound.length ?? consumed];
    }

    /**
     * decodes a single field against the current values of its siblings
     * @returns number of bytes consumed
     */
    decodeSingle(key: string, buf: Uint8Array, options: StructOptions, values: Record<string, unknown>, assigned: Set<string>): number {
        this.assertKey(key);

        for (let entry of this.layout) {
            if (entry.kind == "group") {
                if (entry.members.some(m => m.key == key)) {
                    return this.decodeGroup(entry, buf, values, assigned, key);
                }
            } else if (entry.key == key) {
                let decoded = this.decodeField(key, entry.type, buf, options, values);
                if (!decoded) return 0;

                values[key] = decoded[0];
                assigned.add(key);
                return decoded[1];
            }
        }

        return 0;
    }

    encodeValues(values: Record<string, unknown>, options: StructOptions): Uint8Array {
        let parts: Uint8Array[] = [];

        for (let entry of this.layout) {
            if (entry.kind == "group") {
                let n = 0;
                for (let member of entry.members) {
                    n += member.toBits(values[member.key]) * 2 ** member.shift;
                }
                parts.push(uint8_writeUint(new Uint8Array(entry.byteLength), n, 0, entry.byteLength, true));
            } else if (!entry.type.present || resolveDependency(entry.type.present, values)) {
                parts.push(entry.type.encode(values[entry.key], options));
            }
        }

        return uint8_concat(parts);
    }

    /** encoded size of the present fields */
    sizeOf(values: Record<string, unknown>, options: StructOptions): number {
        let size = 0;
        for (let entry of this.layout) {
            size += this.entrySize(entry, values, options);
        }
        return size;
    }

    offsetOf(key: string, values: Record<string, unknown>, options: StructOptions): number {
        this.assertKey(key);

        let offset = 0;
        for (let entry of this.layout) {
            if (entry.kind == "group" ? entry.members.some(m => m.key == key) : entry.key == key) {
                return offset;
            }
            offset += this.entrySize(entry, values, options);
        }
        return offset;
    }

    private entrySize(entry: FieldLayout, values: Record<string, unknown>, options: StructOptions): number {
        if (entry.kind == "group") {
            return entry.byteLength;
        }
        if (entry.type.present && !resolveDependency(entry.type.present, values)) {
            return 0;
        }
        return entry.type.size(values[entry.key], options);
    }
}

/**
 * Schema plus a way to make instances; `create` and `from` return whatever
 * instance type the definition is for, eg. headers.
 */
export abstract class StructDefinition<Types extends StructTypes, Instance extends Struct<Types>> extends StructSchema<Types> {
    protected abstract instantiate(options: StructOptions): Instance;

    create(values: Partial<StructValues<Types>> = {}, options: Partial<StructOptions> = {}): Instance {
        if (values instanceof Uint8Array) {
            throw new ArgumentError("cannot create using Uint8Array. Please use from");
        }

        let struct = this.instantiate({ ...this.options, ...options });
        struct.assign(values);
        return struct;
    }

    /**
     * Decodes a struct from the beginning of `buf`. Bytes after the struct are ignored.
     * @throws {ParseError} when `buf` is too short
     */
    from(buf: Uint8Array, options: Partial<StructOptions> = {}): Instance {
        return this.decode(buf, options)[0];
    }

    decode(buf: Uint8Array, options: Partial<StructOptions> = {}): [struct: Instance, consumed: number] {
        let struct = this.instantiate({ ...this.options, ...options });
        let consumed = struct.read(buf);
        return [struct, consumed];
    }

    /** copies values and which of them were assigned, byte arrays, arrays and nested structs are copied too */
    clone(struct: Instance): Instance {
        let copy = this.instantiate(struct.options);
        struct.copyTo(copy);
        return copy;
    }
}

export class PlainStructDefinition<Types extends StructTypes> extends StructDefinition<Types, Struct<Types>> {
    protected instantiate(options: StructOptions): Struct<Types> {
        return new Struct<Types>(this, options);
    }
}

function copyValue(value: unknown): unknown {
    if (value instanceof Uint8Array) return new Uint8Array(value);
    if (value instanceof Struct) return value.clone();
    if (Array.isArray(value)) return value.map(copyValue);
    return value;
}

export class Struct<Types extends StructTypes> {
    protected values: Record<string, unknown>;
    /** fields that were set explicitly or decoded */
    protected assigned = new Set<string>();

    constructor(readonly schema: StructSchema<Types>, readonly options: StructOptions) {
        this.values = schema.defaults();
    }

    get order(): readonly StructKey<Types>[] {
        return this.schema.order;
    }

    get<Key extends StructKey<Types>>(key: Key): StructValue<Types[Key]> {
        this.schema.assertKey(key);
        return <StructValue<Types[Key]>>this.values[key];
    }

    set<Key extends StructKey<Types>>(key: Key, value: StructValue<Types[Key]>): this {
        this.setField(key, value);
        return this;
    }

    /** untyped counterpart of `set` for values that come from outside typed code, eg. a protocol looked up by name */
    assign(values: object): this {
        for (let [key, value] of Object.entries(values)) {
            if (value !== undefined) this.setField(key, value);
        }
        return this;
    }

    /** sets the fields that were not set explicitly, they stay unassigned and can be filled again */
    fill(values: object): this {
        for (let [key, value] of Object.entries(values)) {
            if (value === undefined || this.assigned.has(key)) continue;
            this.schema.assertKey(key);
            this.schema.checkValue(key, value, this.options);
            this.values[key] = value;
            this.afterSet(key);
        }
        return this;
    }

    protected setField(key: string, value: unknown): void {
        this.schema.assertKey(key);
        this.schema.checkValue(key, value, this.options);
        this.values[key] = value;
        this.assigned.add(key);
        this.afterSet(key);
    }

    /** called after a field was set, not while decoding */
    protected afterSet(_key: string): void { }

    /** numeric view of a field, used by bindings and length calculations */
    numeric(key: string): number {
        this.schema.assertKey(key);
        return toNumeric(key, this.values[key]);
    }

    /** false when the field's presence predicate does not hold */
    has(key: StructKey<Types>): boolean {
        return this.schema.isPresent(key, this.values);
    }

    isAssigned(key: StructKey<Types>): boolean {
        return this.assigned.has(key);
    }

    get size(): number {
        return this.schema.sizeOf(this.values, this.options);
    }

    getMinSize(): number {
        return this.schema.getMinSize();
    }

    offsetOf(key: StructKey<Types>): number {
        return this.schema.offsetOf(key, this.values, this.options);
    }

    getBuffer(options: StructOptions = this.options): Uint8Array {
        return this.schema.encodeValues(this.values, options);
    }

    /**
     * Replaces every value with the ones decoded from `buf`
     * @returns number of bytes consumed
     */
    read(buf: Uint8Array): number {
        let values = this.schema.defaults(), assigned = new Set<string>();
        let consumed = this.schema.decodeValues(buf, this.options, values, assigned);

        this.values = values;
        this.assigned = assigned;
        return consumed;
    }

    /**
     * Decodes one field from `buf`, lengths and counters come from the current sibling values
     * @returns number of bytes consumed
     */
    readField(key: StructKey<Types>, buf: Uint8Array): number {
        return this.schema.decodeSingle(key, buf, this.options, this.values, this.assigned);
    }

    toHuman(key?: StructKey<Types>): string {
        if (key) {
            return this.schema.types[key].toHuman(this.values[key]);
        }

        let lines: string[] = [];
        for (let k of this.order) {
            if (!this.has(k)) continue;
            lines.push(`${k}: ${this.toHuman(k)}`);
        }
        return lines.join("\n");
    }

    fromHuman(key: StructKey<Types>, input: string): this {
        let type: StructType<unknown> = this.schema.types[key];
        if (!type.fromHuman) {
            throw new ArgumentError(`"${key}" cannot be set from text`);
        }
        this.setField(key, type.fromHuman(input));
        return this;
    }

    toObject(): Record<string, unknown> {
        return { ...this.values };
    }

    copyTo(target: Struct<Types>): void {
        for (let [key, value] of Object.entries(this.values)) {
            target.values[key] = copyValue(value);
        }
        target.assigned = new Set(this.assigned);
    }

    /** deep copy of the same struct type */
    clone(): Struct<Types> {
        let copy = new Struct<Types>(this.schema, this.options);
        this.copyTo(copy);
        return copy;
    }

    /** pushes elements on an array field, its counter is left untouched */
    push<Key extends StructKey<Types>>(key: Key, ...elements: ElementOf<StructValue<Types[Key]>>[]): this {
        this.list(key).push(...elements);
        return this;
    }

    /** pushes elements on an array field and increments its counter */
    append<Key extends StructKey<Types>>(key: Key, ...elements: ElementOf<StructValue<Types[Key]>>[]): this {
        this.list(key).push(...elements);
        this.adjustCounter(key, elements.length);
        return this;
    }

    /** removes the element at `index` from an array field and decrements its counter */
    remove(key: StructKey<Types>, index: number): this {
        let list = this.list(key);
        if (index < 0 || index >= list.length) {
            throw new StructValueError(`no element ${index} in "${key}"`, index);
        }
        list.splice(index, 1);
        this.adjustCounter(key, -1);
        return this;
    }

    private list(key: StructKey<Types>): unknown[] {
        let list = this.get(key);
        if (!Array.isArray(list)) {
            throw new StructValueError(`"${key}" is not an array`, list);
        }
        return list;
    }

    private adjustCounter(key: StructKey<Types>, change: number): void {
        let counter = this.schema.types[key].counter;
        if (counter) {
            this.setField(counter, this.numeric(counter) + change);
        }
    }
}
