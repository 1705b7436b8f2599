import { StructValueError } from "../errors";
import { STRUCT_DEFAULT_OPTIONS, StructOptions, StructType, StructTypes, Struct, StructDefinition } from "../binary/struct";
import type { Packet } from "../packet/packet";

/** every header ends with the bytes it carries */
export type HeaderTypes = StructTypes & { body: StructType<Uint8Array> };

export type HeaderHooks<Types extends HeaderTypes> = {
    /** sets length fields from the current body */
    calcLength?(header: Header<Types>): void;
    /** sets the checksum field, lengths and body are already up to date */
    calcChecksum?(header: Header<Types>): void;
    /**
     * Unfolded sum of the pseudo header an upper layer prefixes to its checksum input.
     * Only network layers provide it.
     */
    pseudoHeaderSum?(header: Header<Types>, protocol: number, length: number): number;
};

/**
 * Definition of one protocol layer. Instances are `Header`s tagged with `protocolName`.
 * Header types are registered with a `ProtocolRegistry` and bound to each other there.
 */
export class HeaderType<Types extends HeaderTypes> extends StructDefinition<Types, Header<Types>> {
    constructor(
        readonly protocolName: string,
        types: Types,
        readonly hooks: HeaderHooks<Types> = {},
        options: Partial<StructOptions> = {}
    ) {
        super(types, options);
    }

    protected instantiate(options: StructOptions): Header<Types> {
        return new Header(this, options);
    }

    toString(): string {
        return this.protocolName;
    }
}

export type AnyHeaderType = HeaderType<HeaderTypes>;
export type AnyHeader = Header<HeaderTypes>;

export class Header<Types extends HeaderTypes> extends Struct<Types> {
    /** set once the header is part of a packet */
    packet?: Packet;

    constructor(readonly definition: HeaderType<Types>, options: StructOptions = STRUCT_DEFAULT_OPTIONS) {
        super(definition, options);
    }

    clone(): Header<Types> {
        return this.definition.clone(this);
    }

    get protocolName(): string {
        return this.definition.protocolName;
    }

    get body(): Uint8Array {
        let body = this.values["body"];
        if (!(body instanceof Uint8Array)) {
            throw new StructValueError(`body of ${this.protocolName} is not a byte array`, body);
        }
        return body;
    }

    set body(body: Uint8Array) {
        this.setField("body", body);
    }

    /** size without the body */
    get headerSize(): number {
        return this.size - this.body.byteLength;
    }

    is<T extends HeaderTypes>(type: HeaderType<T>): this is Header<T> {
        return this.definition === type;
    }

    /** the header below this one in its packet */
    previous(): AnyHeader | undefined {
        let headers = this.packet?.headers ?? [];
        let index = headers.findIndex(h => h === this);
        return index > 0 ? headers[index - 1] : undefined;
    }

    /**
     * Pseudo header sum of the nearest lower layer that provides one, eg. IPv6 below
     * a hop-by-hop extension below UDP. Zero when there is none.
     */
    pseudoHeaderSum(protocol: number, length: number): number {
        let lower = this.previous();
        while (lower) {
            let hook = lower.definition.hooks.pseudoHeaderSum;
            if (hook) return hook(lower, protocol, length);
            lower = lower.previous();
        }
        return 0;
    }

    calcLength(): this {
        this.definition.hooks.calcLength?.(this);
        return this;
    }

    calcChecksum(): this {
        this.definition.hooks.calcChecksum?.(this);
        return this;
    }

    /** fields without the body, one per line */
    toHuman(key?: keyof Types & string): string {
        if (key) return super.toHuman(key);

        let lines: string[] = [];
        for (let k of this.order) {
            if (k == "body" || !this.has(k)) continue;
            lines.push(`${k}: ${this.toHuman(k)}`);
        }
        return lines.join("\n");
    }
}

/**
 * @example
 * export const UDP = defineHeader("UDP", {
 *     sport: UINT16,
 *     dport: UINT16,
 *     length: UINT16,
 *     csum: UINT16,
 *     body: SLICE,
 * }, { calcLength: udp => udp.set("length", udp.size) });
 */
export function defineHeader<Types extends HeaderTypes>(
    protocolName: string,
    types: Types,
    hooks: HeaderHooks<Types> = {},
    options: Partial<StructOptions> = {}
): HeaderType<Types> {
    return new HeaderType(protocolName, types, hooks, options);
}
