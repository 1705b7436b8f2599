import { calculateIcmpChecksum } from "../binary/checksum";
import { ARRAY, CODED, ENUM, SLICE, UINT16, UINT8, ValueCodec } from "../binary/struct";
import { IPV4_ADDRESS } from "../struct-types/address";
import { defineHeader } from "./header";

export const IGMP_TYPES = {
    MEMBERSHIP_QUERY: 0x11,
    MEMBERSHIP_REPORT_V1: 0x12,
    MEMBERSHIP_REPORT: 0x16,
    LEAVE_GROUP: 0x17,
    MEMBERSHIP_REPORT_V3: 0x22,
} as const;

/**
 * IGMPv3 "Max Resp Code" and "QQIC": values from 128 on are sent as a 3-bit exponent
 * and a 4-bit mantissa, so large values lose precision.
 * Source: [RFC 3376 §4.1.1](https://datatracker.ietf.org/doc/html/rfc3376#section-4.1.1)
 * ```txt
 *   0 1 2 3 4 5 6 7
 *  +-+-+-+-+-+-+-+-+
 *  |1| exp | mant  |
 *  +-+-+-+-+-+-+-+-+
 * ```
 */
export const IGMPV3_CODE: ValueCodec = {
    encode(value) {
        if (value < 128) return value;
        if (value > 31743) return 255;

        let exp = 0;
        value >>= 3;
        while (value > 31) {
            exp++;
            value >>= 1;
        }
        return 0x80 | (exp << 4) | (value & 0xf);
    },
    decode(raw) {
        if (raw < 128) return raw;
        let mant = raw & 0xf, exp = (raw >> 4) & 0x7;
        return (0x10 | mant) << (exp + 3);
    },
};

/**
 * IGMPv2 message, IGMPv3 queries continue in {@link IGMP_MQ}.
 * Source: [RFC 2236](https://datatracker.ietf.org/doc/html/rfc2236#section-2)
 *
 * ```txt
 *   0                   1                   2                   3
 *   0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |      Type     | Max Resp Time |           Checksum            |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |                         Group Address                         |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * ```
 */
export const IGMP = defineHeader("IGMP", {
    type: ENUM(UINT8, IGMP_TYPES),
    /** in units of 1/10 second, IGMPv3 queries encode it with {@link IGMPV3_CODE} */
    maxRespTime: UINT8,
    csum: UINT16,
    groupAddr: IPV4_ADDRESS,
    body: SLICE,
}, {
    calcChecksum(igmp) {
        igmp.set("csum", 0);
        igmp.set("csum", calculateIcmpChecksum(igmp.getBuffer()));
    },
});

/**
 * IGMPv3 membership query, the part following the IGMPv2 fields.
 * Source: [RFC 3376 §4.1](https://datatracker.ietf.org/doc/html/rfc3376#section-4.1)
 *
 * ```txt
 *   0                   1                   2                   3
 *   0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  | Resv  |S| QRV |     QQIC      |     Number of Sources (N)     |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |                       Source Address [1]                      |
 *  +-                              .                              -+
 *  .                               .                               .
 *  +-                                                             -+
 *  |                       Source Address [N]                      |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * ```
 */
export const IGMP_MQ = defineHeader("IGMP::MQ", {
    resv: UINT8(4),
    /** Suppress Router-Side Processing */
    flagS: UINT8(1),
    /** Querier's Robustness Variable */
    qrv: UINT8(3),
    /** Querier's Query Interval, in seconds */
    qqic: CODED(UINT8, IGMPV3_CODE),
    numberOfSources: UINT16,
    sourceAddr: ARRAY(IPV4_ADDRESS, { counter: "numberOfSources" }),
    body: SLICE,
});
