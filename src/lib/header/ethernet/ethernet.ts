import { MAC_ADDRESS } from "../../struct-types/address";
import { ENUM, SLICE, UINT16 } from "../../binary/struct";
import { defineHeader } from "../header";

/** Source: <https://en.wikipedia.org/wiki/EtherType> */
export const ETHER_TYPES = {
    IPv4: 0x0800,
    ARP: 0x0806,
    WAKE_ON_LAN: 0x0842,
    RARP: 0x8035,
    VLAN: 0x8100,
    IPv6: 0x86dd,
    FLOW_CONTROL: 0x8808,
    LACP: 0x8809,
    MPLS_UNICAST: 0x8847,
    MPLS_MULTICAST: 0x8848,
    PPPoE_DISCOVERY: 0x8863,
    PPPoE_SESSION: 0x8864,
    EAPoLAN: 0x888e,
    SVLAN: 0x88a8,
    LLDP: 0x88cc,
    PTP: 0x88f7,
} as const;

export const ETHER_TYPE = ENUM(UINT16, ETHER_TYPES);

/**
 * Source: <https://en.wikipedia.org/wiki/Ethernet_frame>
 *
 * The frame check sequence is not part of the header, captures rarely carry it.
 */
export const ETH = defineHeader("Eth", {
    dmac: MAC_ADDRESS,
    smac: MAC_ADDRESS,
    ethertype: ETHER_TYPE,
    body: SLICE,
});

/**
 * 802.1Q tag, it sits where the ethertype of the enclosing frame would be
 * Source <https://en.wikipedia.org/wiki/IEEE_802.1Q>
 */
export const DOT1Q = defineHeader("Dot1q", {
    /** Priority code point */
    pcp: UINT16(3),
    /** Drop eligible indicator */
    dei: UINT16(1),
    /** VLAN identifier */
    vid: UINT16(12),
    ethertype: ETHER_TYPE,
    body: SLICE,
});
