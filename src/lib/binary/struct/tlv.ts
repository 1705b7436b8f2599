import { uint8_fromHex, uint8_toHex } from "../uint8-array";
import { LENGTH_FROM, OPTIONAL } from "./more-value-types";
import { StructOptions, StructType, StructValues } from "./shared";
import { Struct, StructDefinition } from "./struct";
import { IntType, SLICE } from "./value-types";

export type TLVTypes = {
    type: IntType;
    length: StructType<number>;
    value: StructType<Uint8Array>;
};

/** renders and parses the value of one TLV type */
export type TLVValueCodec = {
    toHuman(value: Uint8Array): string;
    fromHuman?(input: string): Uint8Array;
};

export type TLVOptions = {
    /** the length field counts the type and length fields as well as the value */
    lengthIncludesHeader?: boolean;
    /** types that are encoded as the type field alone, eg. IPv6 Pad1 */
    typeOnly?: readonly number[];
};

/**
 * Type-length-value record. `length` follows the value whenever the value is set,
 * a length given explicitly to `create` or `set` afterwards is kept.
 */
export class TLVDefinition extends StructDefinition<TLVTypes, TLV> {
    readonly headerSize: number;
    readonly lengthIncludesHeader: boolean;
    private codecs = new Map<number, TLVValueCodec>();

    constructor(typeType: IntType, lengthType: IntType, tlvOptions: TLVOptions = {}, options: Partial<StructOptions> = {}) {
        let headerSize = (typeType.bitLength + lengthType.bitLength) / 8;
        let lengthIncludesHeader = tlvOptions.lengthIncludesHeader ?? false;
        let typeOnly = tlvOptions.typeOnly ?? [];
        let hasLength = ({ type }: Record<string, number>) => !typeOnly.includes(type);

        super({
            type: typeType,
            length: OPTIONAL(lengthType, ["type"], hasLength),
            value: OPTIONAL(
                LENGTH_FROM(SLICE, ["length"], ({ length }) => lengthIncludesHeader ? length - headerSize : length),
                ["type"], hasLength
            ),
        }, options);

        this.headerSize = headerSize;
        this.lengthIncludesHeader = lengthIncludesHeader;
    }

    protected instantiate(options: StructOptions): TLV {
        return new TLV(this, options);
    }

    create(values: Partial<StructValues<TLVTypes>> = {}, options: Partial<StructOptions> = {}): TLV {
        let tlv = super.create(values, options);
        if (values.length !== undefined) {
            tlv.set("length", values.length);
        }
        return tlv;
    }

    /** registers how values of `type` are shown and parsed */
    register(type: number, codec: TLVValueCodec): this {
        this.codecs.set(type, codec);
        return this;
    }

    codecFor(type: number): TLVValueCodec | undefined {
        return this.codecs.get(type);
    }
}

export class TLV extends Struct<TLVTypes> {
    constructor(readonly definition: TLVDefinition, options: StructOptions) {
        super(definition, options);
    }

    clone(): TLV {
        return this.definition.clone(this);
    }

    protected afterSet(key: string): void {
        if (key == "value" || key == "type") this.calcLength();
    }

    /** sets `length` from the current value */
    calcLength(): this {
        if (!this.has("length")) return this;

        let length = this.get("value").byteLength;
        if (this.definition.lengthIncludesHeader) {
            length += this.definition.headerSize;
        }
        return this.set("length", length);
    }

    get typeName(): string {
        return this.toHuman("type");
    }

    /** the value rendered by the codec registered for its type, hex otherwise */
    humanValue(): string {
        let codec = this.definition.codecFor(this.get("type"));
        return codec ? codec.toHuman(this.get("value")) : uint8_toHex(this.get("value"));
    }

    setHumanValue(input: string): this {
        let codec = this.definition.codecFor(this.get("type"));
        return this.set("value", codec?.fromHuman ? codec.fromHuman(input) : uint8_fromHex(input));
    }

    toHuman(key?: keyof TLVTypes): string {
        if (key) return super.toHuman(key);
        if (!this.has("value")) return this.typeName;
        return `${this.typeName}(${this.humanValue()})`;
    }
}

/**
 * @example defineTLV(UINT8, UINT8, { typeOnly: [0] })
 */
export function defineTLV(typeType: IntType, lengthType: IntType, tlvOptions: TLVOptions = {}, options: Partial<StructOptions> = {}) {
    return new TLVDefinition(typeType, lengthType, tlvOptions, options);
}
