import { uint8_toHex } from "../binary/uint8-array";
import type { Packet } from "./packet";

const BYTES_PER_LINE = 16;

/** hex dump, 16 bytes per line prefixed with the offset */
export function hexdump(buf: Uint8Array): string {
    let lines: string[] = [];
    for (let offset = 0; offset < buf.byteLength; offset += BYTES_PER_LINE) {
        let hex = uint8_toHex(buf.subarray(offset, offset + BYTES_PER_LINE)).replace(/(..)(?!$)/g, "$1 ");
        lines.push(`${offset.toString(16).padStart(4, "0")}  ${hex}`);
    }
    return lines.join("\n");
}

/**
 * ```txt
 * --- IP ---
 * version: 4
 * ...
 * --- body ---
 * 0000  de ad be ef
 * ```
 */
export function inspectPacket(packet: Packet): string {
    let sections = packet.headers.map(h => `--- ${h.protocolName} ---\n${h.toHuman()}`);
    if (packet.body.byteLength) {
        sections.push(`--- body ---\n${hexdump(packet.body)}`);
    }
    return sections.join("\n");
}
