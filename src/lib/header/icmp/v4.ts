import { calculateIcmpChecksum } from "../../binary/checksum";
import { ENUM, SLICE, UINT16, UINT8 } from "../../binary/struct";
import { defineHeader } from "../header";

export const ICMPV4_TYPES = {
    ECHO_REPLY: 0,
    DESTINATION_UNREACHABLE: 3,
    REDIRECT_MESSAGE: 5,
    ECHO_REQUEST: 8,
    ROUTER_ADVERTISMENT: 9,
    ROUTER_SOLICITATION: 10,
    TIME_EXCEEDED: 11,
    PARAMETER_PROBLEM: 12,
    TIMESTAMP: 13,
    TIMESTAMP_REPLY: 14,
    /** xping  reply */
    EXTENDED_ECHO_REPLY: 42,
    /** xping request */
    EXTENDED_ECHO_REQUEST: 43,
} as const;

export type ICMPV4_Type = typeof ICMPV4_TYPES[keyof typeof ICMPV4_TYPES];

/**
 * Type, code and checksum, the rest of the message (eg. identifier and sequence number
 * of an echo) is the body.
 *
 * Source: [RFC 792](https://datatracker.ietf.org/doc/html/rfc792)
 */
export const ICMP = defineHeader("ICMP", {
    type: ENUM(UINT8, ICMPV4_TYPES),
    code: UINT8,
    /** ones' complement of the ones' complement sum of the whole message, zero is sent as 0xffff */
    csum: UINT16,
    body: SLICE,
}, {
    calcChecksum(icmp) {
        icmp.set("csum", 0);
        icmp.set("csum", calculateIcmpChecksum(icmp.getBuffer()));
    },
});
