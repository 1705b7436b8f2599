import { IPV6_ADDRESS } from "../../struct-types/address";
import { sum16 } from "../../binary/checksum";
import { DEFAULT, SLICE, UINT16, UINT24, UINT32, UINT8, defineStruct } from "../../binary/struct";
import { defineHeader } from "../header";
import { PROTOCOL } from "./protocols";

export const IPV6_PSEUDO_HEADER = defineStruct({
    saddr: IPV6_ADDRESS,
    daddr: IPV6_ADDRESS,
    len: UINT32,
    zeroes: UINT24,
    proto: UINT8,
});

/**
 * Source: [RFC 8200](https://datatracker.ietf.org/doc/html/rfc8200#section-3)
 *
 * ```txt
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |Version| Traffic Class |           Flow Label                  |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |         Payload Length        |  Next Header  |   Hop Limit   |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |                                                               |
 *  +                         Source Address                        +
 *  |                                                               |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |                                                               |
 *  +                      Destination Address                      +
 *  |                                                               |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * ```
 */
export const IPV6 = defineHeader("IPv6", {
    version: DEFAULT(UINT8(4), 6),
    trafficClass: UINT8,
    flowLabel: UINT32(20),
    /** length of everything after this header, extension headers included */
    payloadLength: UINT16,
    nextHeader: PROTOCOL,
    hopLimit: DEFAULT(UINT8, 64),
    saddr: IPV6_ADDRESS,
    daddr: IPV6_ADDRESS,
    body: SLICE,
}, {
    calcLength(ip) {
        ip.set("payloadLength", ip.body.byteLength);
    },
    pseudoHeaderSum(ip, proto, len) {
        return sum16(IPV6_PSEUDO_HEADER.create({
            saddr: ip.get("saddr"),
            daddr: ip.get("daddr"),
            proto, len,
        }).getBuffer());
    },
});
