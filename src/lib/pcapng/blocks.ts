import { FormatError, ParseError } from "../errors";
import { INT64, LENGTH_FROM, SLICE, TLV, UINT16, UINT32, defineStruct } from "../binary/struct";
import { uint8_concat, uint8_padLength, uint8_readUint } from "../binary/uint8-array";
import {
    BLOCK_FRAME_SIZE,
    DEFAULT_TSRESOL,
    PCAPNG_BLOCK_TYPES,
    PCAPNG_BYTE_ORDER_MAGIC_BIG,
    PCAPNG_BYTE_ORDER_MAGIC_LITTLE,
    PCAPNG_OPTION_TYPES,
    SECTION_LENGTH_UNKNOWN,
} from "./constants";
import { findOption, readComments, readOptions, writeOptions } from "./options";
import type { Section } from "./section";

/**
    ```txt
                1                   2                     3
0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1
   +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
0 |                          Block Type                           |
   +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
4 |                      Block Total Length                       |
   +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
8 /                          Block Body                           /
  /              variable length, padded to 32 bits               /
   +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
  |                      Block Total Length                       |
   +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
    ```
 */
export const PCAPNG_BLOCK = defineStruct({
    type: UINT32,
    blockLength: UINT32,
    body: LENGTH_FROM(SLICE, ["blockLength"], ({ blockLength }) => Math.max(blockLength - BLOCK_FRAME_SIZE, 0)),
    trailingLength: UINT32,
});

export const PCAPNG_SECTION_HEADER = defineStruct({
    magicNumber: UINT32,
    versionMajor: UINT16,
    versionMinor: UINT16,
    /** signed, -1 when unknown */
    sectionLength: INT64,
    options: SLICE,
});

export const PCAPNG_IFACE_DESC = defineStruct({
    linkType: UINT16,
    reserved: UINT16,
    snaplen: UINT32,
    options: SLICE,
});

export const PCAPNG_SPACKET = defineStruct({
    originalLength: UINT32,
    data: SLICE,
});

/** the packet data is followed by its padding */
export const PCAPNG_EPACKET = defineStruct({
    interfaceId: UINT32,
    timestampHigh: UINT32,
    timestampLow: UINT32,
    capturedLength: UINT32,
    originalLength: UINT32,
    data: LENGTH_FROM(SLICE, ["capturedLength"], ({ capturedLength }) => capturedLength + uint8_padLength(capturedLength)),
    options: SLICE,
});

/** a framed block whose fields overrun its body is malformed, not truncated */
function decodeInside<T>(name: string, decode: () => T): T {
    try {
        return decode();
    } catch (error) {
        if (error instanceof ParseError) throw new FormatError(`${name}: ${error.message}`, { cause: error });
        throw error;
    }
}

function pad(buf: Uint8Array): Uint8Array {
    let padding = uint8_padLength(buf.byteLength);
    return padding ? uint8_concat([buf, new Uint8Array(padding)]) : buf;
}

export type BlockFrame = {
    type: number;
    blockLength: number;
    body: Uint8Array;
};

/**
 * Reads the block at the start of `buf`.
 * @throws {ParseError} when `buf` ends inside the block
 * @throws {FormatError} when the leading and trailing lengths disagree
 */
export function readBlockFrame(buf: Uint8Array, bigEndian: boolean): BlockFrame {
    let block = PCAPNG_BLOCK.from(buf, { bigEndian });
    let blockLength = block.get("blockLength"), trailingLength = block.get("trailingLength");

    if (blockLength < BLOCK_FRAME_SIZE) {
        throw new FormatError(`block length ${blockLength} is shorter than the block framing`);
    }
    if (blockLength != trailingLength) {
        throw new FormatError(`block lengths disagree: ${blockLength} and ${trailingLength}`);
    }

    return { type: block.get("type"), blockLength, body: block.get("body") };
}

export function writeBlockFrame(type: number, body: Uint8Array, bigEndian: boolean): Uint8Array {
    let padded = pad(body);
    let blockLength = padded.byteLength + BLOCK_FRAME_SIZE;
    return PCAPNG_BLOCK.create({ type, blockLength, body: padded, trailingLength: blockLength }, { bigEndian }).getBuffer();
}

/**
 * Byte order of the section starting at `buf`, from its byte order magic.
 * @returns true when the section is big endian
 */
export function detectByteOrder(buf: Uint8Array): boolean {
    if (buf.byteLength < BLOCK_FRAME_SIZE) {
        throw new ParseError("too few bytes for a section header", BLOCK_FRAME_SIZE, buf.byteLength);
    }

    let magic = uint8_readUint(buf, 8, 4);
    if (magic === PCAPNG_BYTE_ORDER_MAGIC_BIG) return true;
    if (magic === PCAPNG_BYTE_ORDER_MAGIC_LITTLE) return false;

    throw new FormatError(`byte order magic 0x${magic.toString(16).padStart(8, "0")} not recognized`);
}

export abstract class Block {
    abstract readonly type: number;
    /** byte order of the section holding the block, set when it is added to one */
    bigEndian = false;

    protected abstract encodeBody(): Uint8Array;

    abstract inspect(): string;

    encode(): Uint8Array {
        return writeBlockFrame(this.type, this.encodeBody(), this.bigEndian);
    }

    get size(): number {
        return this.encode().byteLength;
    }
}

/** a block with options, they are kept encoded and decoded when asked for */
export abstract class OptionsBlock extends Block {
    options: Uint8Array = new Uint8Array(0);

    getOptions(): TLV[] {
        return readOptions(this.options, this.bigEndian);
    }

    setOptions(options: readonly TLV[]): this {
        this.options = writeOptions(options, this.bigEndian);
        return this;
    }

    comments(): string[] {
        return readComments(this.options, this.bigEndian);
    }
}

export class SectionHeaderBlock extends OptionsBlock {
    readonly type = PCAPNG_BLOCK_TYPES.SECTION_HEADER;
    versionMajor = 1;
    versionMinor = 0;
    sectionLength: bigint = SECTION_LENGTH_UNKNOWN;

    constructor(bigEndian = false) {
        super();
        this.bigEndian = bigEndian;
    }

    /** @throws {FormatError} for a major version other than 1 */
    static decode(body: Uint8Array, bigEndian: boolean): SectionHeaderBlock {
        let hdr = PCAPNG_SECTION_HEADER.from(body, { bigEndian });
        if (hdr.get("versionMajor") !== 1) {
            throw new FormatError(`unsupported version ${hdr.get("versionMajor")}.${hdr.get("versionMinor")}, must be 1.x`);
        }

        let block = new SectionHeaderBlock(bigEndian);
        block.versionMinor = hdr.get("versionMinor");
        block.sectionLength = hdr.get("sectionLength");
        block.options = hdr.get("options");
        return block;
    }

    get knowsSectionLength(): boolean {
        return this.sectionLength >= 0n;
    }

    protected encodeBody(): Uint8Array {
        return PCAPNG_SECTION_HEADER.create({
            magicNumber: PCAPNG_BYTE_ORDER_MAGIC_BIG,
            versionMajor: this.versionMajor,
            versionMinor: this.versionMinor,
            sectionLength: this.sectionLength,
            options: this.options,
        }, { bigEndian: this.bigEndian }).getBuffer();
    }

    inspect(): string {
        let length = this.knowsSectionLength ? this.sectionLength.toString() : "unknown";
        return `SHB ${this.bigEndian ? "big" : "little"} endian, version ${this.versionMajor}.${this.versionMinor}, section length ${length}`;
    }
}

export class InterfaceDescriptionBlock extends OptionsBlock {
    readonly type = PCAPNG_BLOCK_TYPES.IFACE_DESC;
    /** blocks captured on the interface */
    readonly packets: PacketBlock[] = [];
    section?: Section;

    /**
     * @param linkType see `LINK_TYPES`
     * @param snaplen 0 when unlimited
     */
    constructor(public linkType = 1, public snaplen = 0) {
        super();
    }

    static decode(body: Uint8Array, bigEndian: boolean): InterfaceDescriptionBlock {
        let desc = PCAPNG_IFACE_DESC.from(body, { bigEndian });
        let block = new InterfaceDescriptionBlock(desc.get("linkType"), desc.get("snaplen"));
        block.bigEndian = bigEndian;
        block.options = desc.get("options");
        return block;
    }

    /**
     * Timestamp ticks per second from if_tsresol. The high bit of the option
     * selects a power of two, otherwise a power of ten.
     */
    get ticksPerSecond(): number {
        let value = findOption(this.getOptions(), PCAPNG_OPTION_TYPES.IF_TSRESOL)?.get("value");
        if (!value || value.byteLength != 1) {
            return 10 ** DEFAULT_TSRESOL;
        }

        let tsresol = value[0];
        return tsresol & 0x80 ? 2 ** (tsresol & 0x7f) : 10 ** tsresol;
    }

    /** seconds per timestamp tick */
    get resolution(): number {
        return 1 / this.ticksPerSecond;
    }

    protected encodeBody(): Uint8Array {
        return PCAPNG_IFACE_DESC.create({
            linkType: this.linkType,
            snaplen: this.snaplen,
            options: this.options,
        }, { bigEndian: this.bigEndian }).getBuffer();
    }

    inspect(): string {
        return `IDB link type ${this.linkType}, snaplen ${this.snaplen}, ${this.packets.length} packets`;
    }
}

export class EnhancedPacketBlock extends OptionsBlock {
    readonly type = PCAPNG_BLOCK_TYPES.EPACKET;
    /** timestamp in units of the interface's resolution */
    ticks: bigint = 0n;
    iface?: InterfaceDescriptionBlock;

    constructor(public data: Uint8Array = new Uint8Array(0), public interfaceId = 0, public originalLength = data.byteLength) {
        super();
    }

    /** @throws {FormatError} when the captured length runs past the block */
    static decode(body: Uint8Array, bigEndian: boolean): EnhancedPacketBlock {
        let epb = decodeInside("enhanced packet block", () => PCAPNG_EPACKET.from(body, { bigEndian }));
        let capturedLength = epb.get("capturedLength");

        let block = new EnhancedPacketBlock(epb.get("data").slice(0, capturedLength), epb.get("interfaceId"), epb.get("originalLength"));
        block.bigEndian = bigEndian;
        block.ticks = (BigInt(epb.get("timestampHigh")) << 32n) | BigInt(epb.get("timestampLow"));
        block.options = epb.get("options");
        return block;
    }

    get capturedLength(): number {
        return this.data.byteLength;
    }

    private get ticksPerSecond(): number {
        return this.iface?.ticksPerSecond ?? 10 ** DEFAULT_TSRESOL;
    }

    /** seconds since the epoch */
    get timestamp(): number {
        return Number(this.ticks) / this.ticksPerSecond;
    }

    set timestamp(seconds: number) {
        this.ticks = BigInt(Math.round(seconds * this.ticksPerSecond));
    }

    get date(): Date {
        return new Date(this.timestamp * 1000);
    }

    protected encodeBody(): Uint8Array {
        return PCAPNG_EPACKET.create({
            interfaceId: this.interfaceId,
            timestampHigh: Number(this.ticks >> 32n),
            timestampLow: Number(this.ticks & 0xffffffffn),
            capturedLength: this.capturedLength,
            originalLength: this.originalLength,
            data: pad(this.data),
            options: this.options,
        }, { bigEndian: this.bigEndian }).getBuffer();
    }

    inspect(): string {
        return `EPB interface ${this.interfaceId}, timestamp ${this.timestamp}, ${this.capturedLength}/${this.originalLength} bytes`;
    }
}

/** a packet without timestamp on interface 0 */
export class SimplePacketBlock extends Block {
    readonly type = PCAPNG_BLOCK_TYPES.SPACKET;
    readonly interfaceId = 0;
    iface?: InterfaceDescriptionBlock;

    constructor(public data: Uint8Array = new Uint8Array(0), public originalLength = data.byteLength) {
        super();
    }

    /**
     * The block has no captured length, the data is the original length cut to the snaplen.
     * @param snaplen snaplen of interface 0
     */
    static decode(body: Uint8Array, bigEndian: boolean, snaplen: number): SimplePacketBlock {
        let spb = PCAPNG_SPACKET.from(body, { bigEndian });
        let originalLength = spb.get("originalLength"), data = spb.get("data");
        let length = snaplen > 0 ? Math.min(originalLength, snaplen) : originalLength;

        if (length > data.byteLength) {
            throw new FormatError(`simple packet block holds ${data.byteLength} bytes, ${length} expected`);
        }

        let block = new SimplePacketBlock(data.slice(0, length), originalLength);
        block.bigEndian = bigEndian;
        return block;
    }

    protected encodeBody(): Uint8Array {
        return PCAPNG_SPACKET.create({ originalLength: this.originalLength, data: pad(this.data) }, { bigEndian: this.bigEndian }).getBuffer();
    }

    inspect(): string {
        return `SPB ${this.data.byteLength}/${this.originalLength} bytes`;
    }
}

export type PacketBlock = EnhancedPacketBlock | SimplePacketBlock;

/** a block of a type this library does not know, kept as is */
export class UnknownBlock extends Block {
    constructor(readonly type: number, public body: Uint8Array = new Uint8Array(0)) {
        super();
    }

    protected encodeBody(): Uint8Array {
        return this.body;
    }

    inspect(): string {
        return `block 0x${this.type.toString(16).padStart(8, "0")}, ${this.body.byteLength} bytes`;
    }
}
