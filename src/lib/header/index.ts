import { ARP } from "./arp";
import { DOT1Q, ETH, ETHER_TYPES } from "./ethernet/ethernet";
import { ICMP } from "./icmp/v4";
import { ICMPV6, ICMPV6_TYPES } from "./icmp/v6";
import { IGMP, IGMP_MQ, IGMP_TYPES } from "./igmp";
import { HOP_BY_HOP } from "./ip/hop-by-hop";
import { IPV4 } from "./ip/ipv4";
import { IPV6 } from "./ip/ipv6";
import { PROTOCOLS } from "./ip/protocols";
import { MLD } from "./mld/mld";
import { MLQ, MLR } from "./mld/mldv2";
import { ProtocolRegistry } from "./registry";
import { TCP } from "./tcp";
import { UDP } from "./udp";

export * from "./header";
export * from "./binding";
export * from "./registry";
export * from "./arp";
export * from "./ethernet/ethernet";
export * from "./icmp/v4";
export * from "./icmp/v6";
export * from "./igmp";
export * from "./ip/hop-by-hop";
export * from "./ip/ipv4";
export * from "./ip/ipv6";
export * from "./ip/protocols";
export * from "./mld/mld";
export * from "./mld/mldv2";
export * from "./tcp";
export * from "./udp";

/** a registry holding every header type of this library and the bindings between them */
export function createProtocolRegistry(): ProtocolRegistry {
    let registry = new ProtocolRegistry();

    for (let link of [ETH, DOT1Q]) {
        registry
            .bind(link, IPV4, { ethertype: ETHER_TYPES.IPv4 })
            .bind(link, IPV6, { ethertype: ETHER_TYPES.IPv6 })
            .bind(link, ARP, { ethertype: ETHER_TYPES.ARP });
    }
    registry.bind(ETH, DOT1Q, { ethertype: ETHER_TYPES.VLAN });

    registry
        .bind(IPV4, ICMP, { proto: PROTOCOLS.ICMP })
        .bind(IPV4, IGMP, { proto: PROTOCOLS.IGMP, fragOffset: 0, ttl: 1 })
        .bind(IPV4, TCP, { proto: PROTOCOLS.TCP })
        .bind(IPV4, UDP, { proto: PROTOCOLS.UDP });

    registry.bind(IPV6, HOP_BY_HOP, { nextHeader: PROTOCOLS.HOPOPT });
    for (let network of [IPV6, HOP_BY_HOP]) {
        registry
            .bind(network, ICMPV6, { nextHeader: PROTOCOLS.ICMPv6 })
            .bind(network, TCP, { nextHeader: PROTOCOLS.TCP })
            .bind(network, UDP, { nextHeader: PROTOCOLS.UDP });
    }

    registry
        .bind(IGMP, IGMP_MQ, { type: IGMP_TYPES.MEMBERSHIP_QUERY }, { bodyLength: { min: 1 } })
        // an MLDv2 query is an MLD query with at least 24 bytes
        .bind(ICMPV6, MLD, { type: ICMPV6_TYPES.MULTICAST_LISTENER_QUERY }, { bodyLength: { max: 23 } })
        .bind(ICMPV6, MLD, { type: [ICMPV6_TYPES.MULTICAST_LISTENER_REPORT, ICMPV6_TYPES.MULTICAST_LISTENER_DONE] })
        .bind(ICMPV6, MLQ, { type: ICMPV6_TYPES.MULTICAST_LISTENER_QUERY }, { bodyLength: { min: 24 } })
        .bind(ICMPV6, MLR, { type: ICMPV6_TYPES.MULTICAST_LISTENER_REPORT_V2 });

    return registry;
}

let shared: ProtocolRegistry | undefined;

/** the registry packets use unless they are given one, created on first use */
export function defaultRegistry(): ProtocolRegistry {
    shared ??= createProtocolRegistry();
    return shared;
}
