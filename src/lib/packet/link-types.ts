import { ProtocolRegistry } from "../header/registry";
import { Packet } from "./packet";

/** Source: <https://www.tcpdump.org/linktypes.html> */
export const LINK_TYPES = {
    ETHERNET: 1,
    RAW: 101,
    IPV4: 228,
    IPV6: 229,
} as const;

/** protocol of the outermost header for the link types that name one */
const FIRST_HEADERS: Readonly<Record<number, string>> = {
    [LINK_TYPES.ETHERNET]: "Eth",
    [LINK_TYPES.IPV4]: "IP",
    [LINK_TYPES.IPV6]: "IPv6",
};

/**
 * Dissects a frame of `linkType`. Raw frames, and frames of link types without
 * a known outermost header, get their first header guessed.
 */
export function parseFrame(data: Uint8Array, linkType: number, registry?: ProtocolRegistry): Packet {
    let firstHeader = FIRST_HEADERS[linkType];
    if (firstHeader === undefined && linkType != LINK_TYPES.RAW) {
        console.warn(`unknown link type ${linkType}, guessing the first header`);
    }
    return Packet.parse(data, { firstHeader, registry });
}
