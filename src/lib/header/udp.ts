import { calculateChecksum } from "../binary/checksum";
import { SLICE, UINT16 } from "../binary/struct";
import { defineHeader } from "./header";
import { PROTOCOLS } from "./ip/protocols";

/**
 * Source: [RFC 768](https://datatracker.ietf.org/doc/html/rfc768)
 *
 * ```txt
 *   0      7 8     15 16    23 24    31
 *  +--------+--------+--------+--------+
 *  |     Source      |   Destination   |
 *  |      Port       |      Port       |
 *  +--------+--------+--------+--------+
 *  |                 |                 |
 *  |     Length      |    Checksum     |
 *  +--------+--------+--------+--------+
 *  |
 *  |          data octets ...
 *  +---------------- ...
 * ```
 */
export const UDP = defineHeader("UDP", {
    /** SPORT: Source Port */
    sport: UINT16,
    /** DPORT: Destination Port */
    dport: UINT16,
    /** header and data in octets */
    length: UINT16,
    csum: UINT16,
    body: SLICE,
}, {
    calcLength(udp) {
        udp.set("length", udp.size);
    },
    calcChecksum(udp) {
        udp.set("csum", 0);
        let checksum = calculateChecksum(udp.getBuffer(), udp.pseudoHeaderSum(PROTOCOLS.UDP, udp.size));
        // zero means "no checksum" in UDP
        udp.set("csum", checksum == 0 ? 0xffff : checksum);
    },
});
