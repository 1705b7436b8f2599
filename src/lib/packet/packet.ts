import { ArgumentError, BindingError, PacketError, ParseError } from "../errors";
import { uint8_equals } from "../binary/uint8-array";
import { StructValues } from "../binary/struct";
import { AnyHeader, AnyHeaderType, Header, HeaderType, HeaderTypes } from "../header/header";
import { ProtocolRegistry } from "../header/registry";
import { defaultRegistry } from "../header";
import type { LiveInterface } from "../wire/wire";
import { inspectPacket } from "./inspect";

export type PacketOptions = {
    registry?: ProtocolRegistry;
};

export type ParseOptions = PacketOptions & {
    /** protocol of the outermost header, guessed when missing */
    firstHeader?: string | AnyHeaderType;
};

/**
 * Ordered headers, outermost first. Every header is bound to the one before it;
 * the body of the last header is the payload of the packet.
 *
 * @example
 * let pkt = Packet.gen("IP", { saddr: new IPV4Address("192.0.2.1") })
 *     .add("UDP", { sport: 1024, dport: 53 })
 *     .calc();
 */
export class Packet {
    readonly headers: AnyHeader[] = [];
    readonly registry: ProtocolRegistry;

    constructor({ registry = defaultRegistry() }: PacketOptions = {}) {
        this.registry = registry.seal();
    }

    /** a packet with `type` as outermost header */
    static gen<T extends HeaderTypes>(type: HeaderType<T>, values?: Partial<StructValues<T>>, options?: PacketOptions): Packet;
    static gen(type: string | AnyHeaderType, values?: object, options?: PacketOptions): Packet;
    static gen(type: string | AnyHeaderType, values: object = {}, options: PacketOptions = {}): Packet {
        return new Packet(options).add(type, values);
    }

    /**
     * Dissects `bytes`, following the bindings of the registry from the first header on.
     * @throws {ParseError} when no registered header fits the start of `bytes`
     */
    static parse(bytes: Uint8Array, { firstHeader, registry = defaultRegistry() }: ParseOptions = {}): Packet {
        let packet = new Packet({ registry });

        if (firstHeader === undefined) {
            let guessed = packet.guessFirstHeader(bytes);
            if (!guessed) {
                throw new ParseError("cannot identify the first header");
            }
            return guessed;
        }

        let type = typeof firstHeader == "string" ? registry.get(firstHeader) : firstHeader;
        packet.dissect(type.from(bytes));
        return packet;
    }

    /** first registered type that decodes `bytes` and is followed by a known successor */
    private guessFirstHeader(bytes: Uint8Array): Packet | undefined {
        for (let type of this.registry.all()) {
            let packet = new Packet({ registry: this.registry });
            try {
                packet.dissect(type.from(bytes));
            } catch (error) {
                if (error instanceof PacketError) continue;
                throw error;
            }

            if (packet.headers.length > 1) return packet;
        }
        return undefined;
    }

    private dissect(header: AnyHeader): void {
        this.attach(header, this.headers.length);

        let successors = new Set(this.registry.successorsOf(header).map(b => b.to));
        if (successors.size > 1) {
            // bind rejects overlapping rules, a registry built elsewhere may still hold them
            throw new BindingError(`more than one successor of ${header.protocolName}: ${[...successors].join(", ")}`);
        }

        for (let type of successors) {
            this.dissect(type.from(header.body));
        }
    }

    /**
     * Appends a header and binds it to the current last one. Discriminator fields of the
     * last header that were set explicitly must satisfy a binding, the others are set
     * from the first binding that fits.
     * @throws {BindingError} when the two protocols are not bound or the set values rule out every binding
     */
    add<T extends HeaderTypes>(type: HeaderType<T>, values?: Partial<StructValues<T>>): this;
    add(type: string | AnyHeaderType, values?: object): this;
    add(type: string | AnyHeaderType, values: object = {}): this {
        let header = this.createHeader(type, values);
        let last = this.headers.at(-1);
        if (last) {
            this.bindTo(last, header);
        }
        this.attach(header, this.headers.length);
        return this;
    }

    /** inserts a header after `previous`, it is bound to `previous` and to the header that follows it */
    insert(previous: AnyHeader, type: string | AnyHeaderType, values: object = {}): this {
        let index = this.headers.indexOf(previous);
        if (index < 0) {
            throw new ArgumentError(`${previous.protocolName} is not a header of this packet`);
        }

        let header = this.createHeader(type, values);
        this.bindTo(previous, header);

        let next = this.headers.at(index + 1);
        if (next) {
            this.bindTo(header, next);
        }

        this.attach(header, index + 1);
        return this;
    }

    private createHeader(type: string | AnyHeaderType, values: object): AnyHeader {
        let headerType = typeof type == "string" ? this.registry.get(type) : type;
        return headerType.create().assign(values);
    }

    private attach(header: AnyHeader, index: number): void {
        header.packet = this;
        this.headers.splice(index, 0, header);
    }

    private bindTo(previous: AnyHeader, header: AnyHeader): void {
        let from = previous.protocolName, to = header.protocolName;
        let bindings = this.registry.bindingsBetween(previous.definition, header.definition);

        if (!bindings.length) {
            throw new BindingError(
                `${to} cannot follow ${from}`, from, to,
                `registry.bind(${from}, ${to}, { /* discriminator fields of ${from} */ })`
            );
        }

        let binding = bindings.find(b => b.acceptsAssigned(previous) && b.acceptsBodyLength(header.size));
        if (!binding) {
            throw new BindingError(
                `${from} does not match any binding to ${to}: ${bindings.map(b => b.describe()).join("; ")}`, from, to
            );
        }

        previous.fill(binding.defaults());
    }

    /** true when the packet has a header of the protocol */
    is(protocolName: string): boolean {
        return this.headers.some(h => h.protocolName == protocolName);
    }

    /** the `n`th header of the protocol */
    header(protocolName: string, n = 0): AnyHeader | undefined {
        return this.headers.filter(h => h.protocolName == protocolName)[n];
    }

    /** the `n`th header of `type`, typed */
    headerOf<T extends HeaderTypes>(type: HeaderType<T>, n = 0): Header<T> | undefined {
        for (let header of this.headers) {
            if (header.is(type) && n-- == 0) return header;
        }
        return undefined;
    }

    /** the body of the last header */
    get body(): Uint8Array {
        return this.headers.at(-1)?.body ?? new Uint8Array(0);
    }

    set body(body: Uint8Array) {
        let last = this.headers.at(-1);
        if (!last) {
            throw new ArgumentError("cannot set the body of a packet without headers");
        }
        last.body = body;
    }

    /** sets length fields, innermost header first */
    calcLength(): this {
        for (let i = this.headers.length - 1; i >= 0; i--) {
            this.syncBody(i);
            this.headers[i].calcLength();
        }
        return this;
    }

    /** sets checksums, innermost header first, after the lengths they cover are set */
    calcChecksum(): this {
        for (let i = this.headers.length - 1; i >= 0; i--) {
            this.syncBody(i);
            this.headers[i].calcChecksum();
        }
        return this;
    }

    calc(): this {
        return this.calcLength().calcChecksum();
    }

    /** the body of a header is the encoded header after it */
    private syncBody(index: number): void {
        let next = this.headers.at(index + 1);
        if (next) {
            this.headers[index].body = next.getBuffer();
        }
    }

    toBuffer(): Uint8Array {
        for (let i = this.headers.length - 2; i >= 0; i--) {
            this.syncBody(i);
        }
        return this.headers.at(0)?.getBuffer() ?? new Uint8Array(0);
    }

    get size(): number {
        return this.toBuffer().byteLength;
    }

    equals(other: Packet): boolean {
        return uint8_equals(this.toBuffer(), other.toBuffer());
    }

    /** sends the encoded packet through `iface` */
    toWire(iface: LiveInterface): void {
        iface.write(this.toBuffer());
    }

    inspect(): string {
        return inspectPacket(this);
    }

    toString(): string {
        return this.headers.map(h => h.protocolName).join(" / ");
    }
}
