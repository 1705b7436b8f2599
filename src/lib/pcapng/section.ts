import { FormatError, ParseError } from "../errors";
import { uint8_concat, uint8_readUint } from "../binary/uint8-array";
import {
    Block,
    BlockFrame,
    EnhancedPacketBlock,
    InterfaceDescriptionBlock,
    OptionsBlock,
    SectionHeaderBlock,
    SimplePacketBlock,
    UnknownBlock,
    detectByteOrder,
    readBlockFrame,
} from "./blocks";
import { PCAPNG_BLOCK_TYPES, PCAPNG_MAGIC_NUMBER } from "./constants";

/**
 * A section header and the blocks after it, in file order. Every block of a
 * section shares the byte order of its header.
 */
export class Section {
    /** blocks after the section header */
    readonly blocks: Block[] = [];

    constructor(readonly header: SectionHeaderBlock = new SectionHeaderBlock()) { }

    get bigEndian(): boolean {
        return this.header.bigEndian;
    }

    get interfaces(): InterfaceDescriptionBlock[] {
        return this.blocks.filter((b): b is InterfaceDescriptionBlock => b instanceof InterfaceDescriptionBlock);
    }

    get unknownBlocks(): UnknownBlock[] {
        return this.blocks.filter((b): b is UnknownBlock => b instanceof UnknownBlock);
    }

    /**
     * Appends a block. Packet blocks are attached to their interface: the one
     * with their interface id, interface 0 for simple packet blocks.
     * @throws {FormatError} when a packet block's interface is not in the section
     */
    add(block: Block): this {
        this.adoptByteOrder(block);

        if (block instanceof InterfaceDescriptionBlock) {
            block.section = this;
        } else if (block instanceof EnhancedPacketBlock || block instanceof SimplePacketBlock) {
            let iface = this.interfaces.at(block.interfaceId);
            if (!iface) {
                throw new FormatError(`packet block on interface ${block.interfaceId}, the section has ${this.interfaces.length} interfaces`);
            }
            block.iface = iface;
            iface.packets.push(block);
        }

        this.blocks.push(block);
        return this;
    }

    private adoptByteOrder(block: Block): void {
        if (block.bigEndian == this.bigEndian) return;

        if (block instanceof OptionsBlock) {
            let options = block.getOptions();
            block.bigEndian = this.bigEndian;
            block.setOptions(options);
        } else {
            block.bigEndian = this.bigEndian;
        }
    }

    /** the section header's length is updated unless it is unknown */
    encode(): Uint8Array {
        let blocks = this.blocks.map(b => b.encode());
        if (this.header.knowsSectionLength) {
            this.header.sectionLength = BigInt(blocks.reduce((sum, b) => sum + b.byteLength, 0));
        }
        return uint8_concat([this.header.encode(), ...blocks]);
    }

    /**
     * Decodes the section starting at `buf`. A section without a known length
     * ends at the next section header or the end of `buf`.
     * @returns the section and the number of bytes it took
     */
    static decode(buf: Uint8Array): [section: Section, consumed: number] {
        if (buf.byteLength < 4 || uint8_readUint(buf, 0, 4) !== PCAPNG_MAGIC_NUMBER) {
            throw new FormatError("no section header found");
        }

        let bigEndian = detectByteOrder(buf);
        let frame = readBlockFrame(buf, bigEndian);
        let section = new Section(SectionHeaderBlock.decode(frame.body, bigEndian));

        let offset = frame.blockLength, end = buf.byteLength;
        if (section.header.knowsSectionLength) {
            let sectionLength = Number(section.header.sectionLength);
            if (offset + sectionLength > buf.byteLength) {
                throw new ParseError("section is longer than the input", sectionLength, buf.byteLength - offset);
            }
            end = offset + sectionLength;
        }

        while (offset < end) {
            let rest = buf.subarray(offset, end);
            if (!section.header.knowsSectionLength && rest.byteLength >= 4 && uint8_readUint(rest, 0, 4) === PCAPNG_MAGIC_NUMBER) {
                break;
            }

            let next = readBlockFrame(rest, bigEndian);
            section.add(section.decodeBlock(next));
            offset += next.blockLength;
        }

        return [section, offset];
    }

    private decodeBlock({ type, body }: BlockFrame): Block {
        switch (type) {
            case PCAPNG_BLOCK_TYPES.IFACE_DESC:
                return InterfaceDescriptionBlock.decode(body, this.bigEndian);
            case PCAPNG_BLOCK_TYPES.EPACKET:
                return EnhancedPacketBlock.decode(body, this.bigEndian);
            case PCAPNG_BLOCK_TYPES.SPACKET: {
                let iface = this.interfaces.at(0);
                if (!iface) {
                    throw new FormatError("simple packet block before any interface description");
                }
                return SimplePacketBlock.decode(body, this.bigEndian, iface.snaplen);
            }
            default: {
                let block = new UnknownBlock(type, body);
                block.bigEndian = this.bigEndian;
                return block;
            }
        }
    }

    inspect(): string {
        return [this.header, ...this.blocks].map(b => b.inspect()).join("\n");
    }
}
