import { calculateIcmpChecksum } from "../../binary/checksum";
import { ENUM, SLICE, UINT16, UINT8 } from "../../binary/struct";
import { defineHeader } from "../header";
import { PROTOCOLS } from "../ip/protocols";

export const ICMPV6_TYPES = {
    DESTINATION_UNREACHABLE: 1,
    PACKET_TOO_BIG: 2,
    TIME_EXCEEDED: 3,
    PARAMETER_PROBLEM: 4,
    ECHO_REQUEST: 128,
    ECHO_REPLY: 129,
    MULTICAST_LISTENER_QUERY: 130,
    MULTICAST_LISTENER_REPORT: 131,
    MULTICAST_LISTENER_DONE: 132,
    ROUTER_SOLICITATION: 133,
    ROUTER_ADVERTISMENT: 134,
    NEIGHBOR_SOLICITATION: 135,
    NEIGHBOR_ADVERTISMENT: 136,
    REDIRECT_MESSAGE: 137,
    MULTICAST_LISTENER_REPORT_V2: 143,
} as const;

export type ICMPV6_Type = typeof ICMPV6_TYPES[keyof typeof ICMPV6_TYPES];

/**
 * Source: [RFC 4443](https://datatracker.ietf.org/doc/html/rfc4443#section-2.1)
 *
 * The checksum covers the IPv6 pseudo header.
 */
export const ICMPV6 = defineHeader("ICMPv6", {
    type: ENUM(UINT8, ICMPV6_TYPES),
    code: UINT8,
    csum: UINT16,
    body: SLICE,
}, {
    calcChecksum(icmp) {
        icmp.set("csum", 0);
        let pseudo = icmp.pseudoHeaderSum(PROTOCOLS.ICMPv6, icmp.size);
        icmp.set("csum", calculateIcmpChecksum(icmp.getBuffer(), pseudo));
    },
});
