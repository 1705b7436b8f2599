import { ENUM, UINT8 } from "../../binary/struct";

/** Source: <https://www.iana.org/assignments/protocol-numbers/protocol-numbers.xhtml> */
export const PROTOCOLS = {
    HOPOPT: 0,
    ICMP: 1,
    IGMP: 2,
    TCP: 6,
    UDP: 17,
    IPv6: 41,
    IPv6_ROUTE: 43,
    IPv6_FRAG: 44,
    ESP: 50,
    AH: 51,
    ICMPv6: 58,
    IPv6_NONXT: 59,
    IPv6_OPTS: 60,
    SCTP: 132,
} as const;

export type Protocol = typeof PROTOCOLS[keyof typeof PROTOCOLS];

export const PROTOCOL = ENUM(UINT8, PROTOCOLS);
