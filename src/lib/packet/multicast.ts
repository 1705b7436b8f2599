import { ArgumentError } from "../errors";
import { HOP_BY_HOP, IPV6_OPTION, IPV6_OPTION_TYPES } from "../header/ip/hop-by-hop";
import { IPV4, IPV4_OPTION, IPV4_OPTION_TYPES } from "../header/ip/ipv4";
import { IPV6 } from "../header/ip/ipv6";
import { PROTOCOLS } from "../header/ip/protocols";
import { Packet } from "./packet";

/**
 * Fixes up the IP header of an IGMP packet the way RFC 2236 wants it: TTL 1
 * and a router alert option. Lengths and checksums are recalculated.
 */
export function igmpize(packet: Packet): Packet {
    let ip = packet.headerOf(IPV4);
    if (!ip) {
        throw new ArgumentError(`cannot igmpize ${packet}; there is no IP header`);
    }

    ip.set("ttl", 1);
    ip.get("options").push(IPV4_OPTION.create({ type: IPV4_OPTION_TYPES.RA, value: new Uint8Array(2) }));
    return packet.calc();
}

/**
 * Fixes up the IPv6 header of an MLD packet the way RFC 2710 wants it: hop limit 1
 * and a hop-by-hop extension carrying a router alert option.
 */
export function mldize(packet: Packet): Packet {
    let ipv6 = packet.headerOf(IPV6);
    if (!ipv6) {
        throw new ArgumentError(`cannot mldize ${packet}; there is no IPv6 header`);
    }

    let next = ipv6.get("nextHeader");
    ipv6.set("hopLimit", 1);
    ipv6.set("nextHeader", PROTOCOLS.HOPOPT);
    packet.insert(ipv6, HOP_BY_HOP, {
        nextHeader: next,
        options: [IPV6_OPTION.create({ type: IPV6_OPTION_TYPES.ROUTER_ALERT, value: new Uint8Array(2) })],
    });
    return packet.calc();
}
