import { calculateChecksum } from "../binary/checksum";
import { DEFAULT, LENGTH_FROM, SLICE, UINT16, UINT32, UINT8 } from "../binary/struct";
import { uint8_concat, uint8_padLength } from "../binary/uint8-array";
import { defineHeader } from "./header";
import { PROTOCOLS } from "./ip/protocols";

/**
 * Source: [RFC 9293](https://datatracker.ietf.org/doc/html/rfc9293)
 *
 * ```txt
 *   0                   1                   2                   3
 *   0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |          Source Port          |       Destination Port        |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |                        Sequence Number                        |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |                    Acknowledgment Number                      |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |  Data |       |C|E|U|A|P|R|S|F|                               |
 *  | Offset| Rsrvd |W|C|R|C|S|S|Y|I|            Window             |
 *  |       |       |R|E|G|K|H|T|N|N|                               |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |           Checksum            |         Urgent Pointer        |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |                           [Options]                           |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |                                                               :
 *  :                             Data                              :
 *  :                                                               |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * ```
 */
export const TCP = defineHeader("TCP", {
    sport: UINT16,
    dport: UINT16,
    seqnum: UINT32,
    acknum: UINT32,
    /** header length in 32-bit words */
    doffset: DEFAULT(UINT8(4), 5),
    reserved: UINT8(4),
    /** see {@link TCP_FLAGS} */
    flags: UINT8,
    window: UINT16,
    /** covers the pseudo header of the IP layer below */
    csum: UINT16,
    urgpnt: UINT16,
    /** `doffset` words minus the fixed 20 bytes, options are kept as raw bytes */
    options: LENGTH_FROM(SLICE, ["doffset"], ({ doffset }) => doffset * 4 - 20),
    body: SLICE,
}, {
    calcLength(tcp) {
        let options = tcp.get("options");
        let padding = uint8_padLength(options.byteLength);
        if (padding) {
            options = uint8_concat([options, new Uint8Array(padding)]);
            tcp.set("options", options);
        }
        tcp.set("doffset", 5 + options.byteLength / 4);
    },
    calcChecksum(tcp) {
        tcp.set("csum", 0);
        tcp.set("csum", calculateChecksum(tcp.getBuffer(), tcp.pseudoHeaderSum(PROTOCOLS.TCP, tcp.size)));
    },
});

export const TCP_FLAGS = {
    CWR: 0x80,
    ECE: 0x40,
    URG: 0x20,
    ACK: 0x10,
    PSH: 0x08,
    RST: 0x04,
    SYN: 0x02,
    FIN: 0x01,
} as const;
