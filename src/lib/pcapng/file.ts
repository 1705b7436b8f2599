import fs from "fs-extra";
import { ArgumentError } from "../errors";
import { uint8_concat } from "../binary/uint8-array";
import { ProtocolRegistry } from "../header/registry";
import { LINK_TYPES, parseFrame } from "../packet/link-types";
import { Packet } from "../packet/packet";
import { EnhancedPacketBlock, InterfaceDescriptionBlock, PacketBlock, SimplePacketBlock } from "./blocks";
import { Section } from "./section";

export type PacketSource = Packet | Uint8Array;

export type ReadArrayOptions = {
    /** timestamp of the first packet, in seconds */
    timestamp?: number;
    /** seconds between two packets */
    tsInc?: number;
};

export type FileOptions = {
    registry?: ProtocolRegistry;
};

export type PacketRecord = {
    block: PacketBlock;
    iface: InterfaceDescriptionBlock;
};

const DEFAULT_FILENAME = "out.pcapng";

function toBytes(packet: PacketSource): Uint8Array {
    return packet instanceof Packet ? packet.toBuffer() : packet;
}

/**
 * A PcapNG file: sections in file order, each with its own byte order.
 *
 * @example
 * let file = new PcapNGFile().readFile("capture.pcapng");
 * for (let packet of file.toArray()) console.log(packet.toString());
 */
export class PcapNGFile {
    readonly sections: Section[] = [];
    readonly registry?: ProtocolRegistry;

    constructor({ registry }: FileOptions = {}) {
        this.registry = registry;
    }

    /** appends the sections in `bytes` */
    read(bytes: Uint8Array): this {
        let offset = 0;
        while (offset < bytes.byteLength) {
            let [section, consumed] = Section.decode(bytes.subarray(offset));
            this.sections.push(section);
            offset += consumed;
        }
        return this;
    }

    /** @throws {ArgumentError} when the file cannot be read */
    readFile(path: string): this {
        let bytes: Uint8Array;
        try {
            bytes = fs.readFileSync(path);
        } catch (error) {
            throw new ArgumentError(`cannot read file ${path}`, { cause: error });
        }
        return this.read(bytes);
    }

    /** data of every packet block in `path` */
    readPacketBytes(path: string): Uint8Array[] {
        return [...new PcapNGFile({ registry: this.registry }).readFile(path).packetBlocks()].map(({ block }) => block.data);
    }

    /** every packet in `path`, dissected according to the link type of its interface */
    readPackets(path: string): Packet[] {
        return new PcapNGFile({ registry: this.registry }).readFile(path).toArray();
    }

    /** packet blocks with their interface, in file order */
    *packetBlocks(): Generator<PacketRecord> {
        for (let section of this.sections) {
            for (let block of section.blocks) {
                if (!(block instanceof EnhancedPacketBlock || block instanceof SimplePacketBlock)) continue;
                if (!block.iface) continue;
                yield { block, iface: block.iface };
            }
        }
    }

    toBuffer(): Uint8Array {
        return uint8_concat(this.sections.map(s => s.encode()));
    }

    /**
     * Writes the file to `path`, after what is there when `append` is set.
     * @returns the number of bytes written
     */
    toFile(path: string, { append = false }: { append?: boolean } = {}): number {
        let bytes = this.toBuffer();
        let fd = fs.openSync(path, append ? "a" : "w");
        try {
            fs.writeSync(fd, bytes);
            fs.fsyncSync(fd);
        } finally {
            fs.closeSync(fd);
        }
        return bytes.byteLength;
    }

    write(path = DEFAULT_FILENAME): number {
        return this.toFile(path, { append: false });
    }

    append(path = DEFAULT_FILENAME): number {
        return this.toFile(path, { append: true });
    }

    /**
     * Adds a section with one ethernet interface holding `packets`. The packets get enhanced
     * packet blocks timestamped from `timestamp` on when both `timestamp` and `tsInc` are given,
     * simple packet blocks otherwise.
     */
    readArray(packets: readonly PacketSource[], { timestamp, tsInc }: ReadArrayOptions = {}): this {
        let section = this.newSection();
        for (let [i, packet] of packets.entries()) {
            if (timestamp === undefined || tsInc === undefined) {
                section.add(new SimplePacketBlock(toBytes(packet)));
            } else {
                section.add(this.timestamped(section, packet, timestamp + i * tsInc));
            }
        }
        return this;
    }

    /** adds a section with one ethernet interface holding the packets keyed by their timestamp in seconds */
    readHash(packets: ReadonlyMap<number, PacketSource>): this {
        let section = this.newSection();
        for (let [timestamp, packet] of packets) {
            section.add(this.timestamped(section, packet, timestamp));
        }
        return this;
    }

    private newSection(): Section {
        let section = new Section().add(new InterfaceDescriptionBlock(LINK_TYPES.ETHERNET));
        this.sections.push(section);
        return section;
    }

    private timestamped(section: Section, packet: PacketSource, timestamp: number): EnhancedPacketBlock {
        let block = new EnhancedPacketBlock(toBytes(packet));
        block.iface = section.interfaces.at(0);
        block.timestamp = timestamp;
        return block;
    }

    /** every packet, dissected according to the link type of its interface */
    toArray(): Packet[] {
        return [...this.packetBlocks()].map(({ block, iface }) => this.parse(block, iface));
    }

    /** packets of enhanced packet blocks keyed by timestamp, simple packet blocks have none */
    toHash(): Map<number, Packet> {
        let packets = new Map<number, Packet>();
        for (let { block, iface } of this.packetBlocks()) {
            if (block instanceof EnhancedPacketBlock) {
                packets.set(block.timestamp, this.parse(block, iface));
            }
        }
        return packets;
    }

    private parse(block: PacketBlock, iface: InterfaceDescriptionBlock): Packet {
        return parseFrame(block.data, iface.linkType, this.registry);
    }

    clear(): this {
        this.sections.length = 0;
        return this;
    }

    inspect(): string {
        return this.sections.map(s => s.inspect()).join("\n");
    }
}
