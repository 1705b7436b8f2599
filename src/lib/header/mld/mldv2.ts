import {
    ARRAY, CODED, ENUM, LENGTH_FROM, SLICE, STRUCT, UINT16, UINT8, ValueCodec, defineStruct
} from "../../binary/struct";
import { IPV6_ADDRESS } from "../../struct-types/address";
import { defineHeader } from "../header";
import { IGMPV3_CODE } from "../igmp";

/**
 * MLDv2 "Maximum Response Code": values from 32768 on are sent as a 3-bit exponent
 * and a 12-bit mantissa.
 * Source: [RFC 3810 §5.1.3](https://datatracker.ietf.org/doc/html/rfc3810#section-5.1.3)
 * ```txt
 *   0 1 2 3 4 5 6 7 8 9 A B C D E F
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |1| exp |          mant         |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * ```
 */
export const MLDV2_CODE: ValueCodec = {
    encode(value) {
        if (value < 32768) return value;
        if (value > 8387583) return 0xffff;

        let exp = 0;
        value >>= 3;
        while (value > 8191) {
            exp++;
            value >>= 1;
        }
        return 0x8000 | ((exp & 7) << 12) | (value & 0xfff);
    },
    decode(raw) {
        if (raw < 32768) return raw;
        let mant = raw & 0xfff, exp = (raw >> 12) & 0x7;
        return (0x1000 | mant) << (exp + 3);
    },
};

export const MLDV2_RECORD_TYPES = {
    MODE_IS_INCLUDE: 1,
    MODE_IS_EXCLUDE: 2,
    CHANGE_TO_INCLUDE_MODE: 3,
    CHANGE_TO_EXCLUDE_MODE: 4,
    ALLOW_NEW_SOURCES: 5,
    BLOCK_OLD_SOURCES: 6,
} as const;

/**
 * Source: [RFC 3810 §5.2.4](https://datatracker.ietf.org/doc/html/rfc3810#section-5.2.4)
 *
 * ```txt
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |  Record Type  |  Aux Data Len |     Number of Sources (N)     |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  *                       Multicast Address                       *
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  *                       Source Address [1..N]                   *
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  .                         Auxiliary Data                        .
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * ```
 */
export const MCAST_ADDRESS_RECORD = defineStruct({
    type: ENUM(UINT8, MLDV2_RECORD_TYPES),
    /** length of `auxData` in 32-bit words */
    auxDataLen: UINT8,
    numberOfSources: UINT16,
    multicastAddr: IPV6_ADDRESS,
    sourceAddr: ARRAY(IPV6_ADDRESS, { counter: "numberOfSources" }),
    auxData: LENGTH_FROM(SLICE, ["auxDataLen"], ({ auxDataLen }) => auxDataLen * 4),
});

/**
 * MLDv2 query, an MLD query whose body is at least 24 bytes.
 * Source: [RFC 3810 §5.1](https://datatracker.ietf.org/doc/html/rfc3810#section-5.1)
 *
 * ```txt
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |    Maximum Response Code      |           Reserved            |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  *                       Multicast Address                       *
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  | Resv  |S| QRV |     QQIC      |     Number of Sources (N)     |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  *                       Source Address [1..N]                   *
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * ```
 */
export const MLQ = defineHeader("MLDv2::MLQ", {
    /** milliseconds */
    maxRespDelay: CODED(UINT16, MLDV2_CODE),
    reserved: UINT16,
    mcastAddr: IPV6_ADDRESS,
    resv: UINT8(4),
    /** Suppress Router-Side Processing */
    flagS: UINT8(1),
    /** Querier's Robustness Variable */
    qrv: UINT8(3),
    /** Querier's Query Interval, in seconds */
    qqic: CODED(UINT8, IGMPV3_CODE),
    numberOfSources: UINT16,
    sourceAddr: ARRAY(IPV6_ADDRESS, { counter: "numberOfSources" }),
    body: SLICE,
});

/**
 * MLDv2 report, ICMPv6 type 143.
 * Source: [RFC 3810 §5.2](https://datatracker.ietf.org/doc/html/rfc3810#section-5.2)
 */
export const MLR = defineHeader("MLDv2::MLR", {
    reserved: UINT16,
    numberOfMar: UINT16,
    records: ARRAY(STRUCT(MCAST_ADDRESS_RECORD), { counter: "numberOfMar" }),
    body: SLICE,
});
