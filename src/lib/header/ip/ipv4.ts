import { IPV4_ADDRESS } from "../../struct-types/address";
import { calculateChecksum, sum16 } from "../../binary/checksum";
import { ARRAY, DEFAULT, ENUM, LENGTH_FROM, SLICE, STRUCT, UINT16, UINT8, defineStruct, defineTLV } from "../../binary/struct";
import { uint8_padLength } from "../../binary/uint8-array";
import { defineHeader } from "../header";
import { PROTOCOL } from "./protocols";

/** Source: <https://www.iana.org/assignments/ip-parameters/ip-parameters.xhtml> */
export const IPV4_OPTION_TYPES = {
    /** End of Options List */
    EOL: 0,
    /** No Operation */
    NOP: 1,
    /** Record Route */
    RR: 7,
    /** Time Stamp */
    TS: 0x44,
    /** Loose Source Route */
    LSRR: 0x83,
    /** Strict Source Route */
    SSRR: 0x89,
    /** Router Alert, RFC 2113 */
    RA: 0x94,
} as const;

/** EOL and NOP are a single type byte, the length of other options counts type and length too */
export const IPV4_OPTION = defineTLV(ENUM(UINT8, IPV4_OPTION_TYPES), UINT8, {
    lengthIncludesHeader: true,
    typeOnly: [IPV4_OPTION_TYPES.EOL, IPV4_OPTION_TYPES.NOP],
});

export const IPV4_PSEUDO_HEADER = defineStruct({
    saddr: IPV4_ADDRESS,
    daddr: IPV4_ADDRESS,
    zeroes: UINT8,
    proto: UINT8,
    len: UINT16,
});

/**
 * Source <https://www.saminiir.com/lets-code-tcp-ip-stack-2-ipv4-icmpv4/>
 *
 * ```txt
 *   0                   1                   2                   3
 *   0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |Version|  IHL  |Type of Service|          Total Length         |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |         Identification        |Flags|      Fragment Offset    |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |  Time to Live |    Protocol   |         Header Checksum       |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |                       Source Address                          |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |                    Destination Address                        |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |                    Options                    |    Padding    |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * ```
 */
export const IPV4 = defineHeader("IP", {
    version: DEFAULT(UINT8(4), 4),
    /** header length in 32-bit words */
    ihl: DEFAULT(UINT8(4), 5),
    tos: UINT8,
    /** length of the whole datagram */
    len: UINT16,
    id: UINT16,
    /** reserved, don't fragment, more fragments */
    flags: UINT16(3),
    /** in units of 8 bytes */
    fragOffset: UINT16(13),
    ttl: DEFAULT(UINT8, 64),
    proto: PROTOCOL,
    /** covers the header only */
    csum: UINT16,
    saddr: IPV4_ADDRESS,
    daddr: IPV4_ADDRESS,
    /** options and padding, `ihl` words minus the fixed 20 bytes */
    options: LENGTH_FROM(ARRAY(STRUCT(IPV4_OPTION)), ["ihl"], ({ ihl }) => ihl * 4 - 20),
    body: SLICE,
}, {
    calcLength(ip) {
        let options = ip.get("options");
        let optionsSize = options.reduce((size, option) => size + option.size, 0);
        for (let i = uint8_padLength(optionsSize); i > 0; i--) {
            options.push(IPV4_OPTION.create({ type: IPV4_OPTION_TYPES.EOL }));
            optionsSize++;
        }
        ip.set("ihl", 5 + optionsSize / 4);
        ip.set("len", ip.size);
    },
    calcChecksum(ip) {
        ip.set("csum", 0);
        ip.set("csum", calculateChecksum(ip.getBuffer().subarray(0, ip.headerSize)));
    },
    pseudoHeaderSum(ip, proto, len) {
        return sum16(IPV4_PSEUDO_HEADER.create({
            saddr: ip.get("saddr"),
            daddr: ip.get("daddr"),
            proto, len,
        }).getBuffer());
    },
});
