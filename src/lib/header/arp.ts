import { DEFAULT, ENUM, SLICE, UINT16, UINT8 } from "../binary/struct";
import { IPV4_ADDRESS, MAC_ADDRESS } from "../struct-types/address";
import { defineHeader } from "./header";

export const ARP_OPCODES = {
    REQUEST: 1,
    REPLY: 2
} as const;

export type ARPOpcode = typeof ARP_OPCODES[keyof typeof ARP_OPCODES];

/**
 * Only Ethernet and IPv4 addresses, which is what `hlen` 6 and `plen` 4 announce.
 * Source <https://en.wikipedia.org/wiki/Address_Resolution_Protocol>
 */
export const ARP = defineHeader("ARP", {
    /** Hardware Type */
    htype: DEFAULT(UINT16, 1),
    /** Protocol Type */
    ptype: DEFAULT(UINT16, 0x0800),
    /** Hardware Address Length */
    hlen: DEFAULT(UINT8, 6),
    /** Protocol address length */
    plen: DEFAULT(UINT8, 4),
    /** Operation */
    oper: ENUM(UINT16, ARP_OPCODES),
    /** Sender Hardware Address */
    sha: MAC_ADDRESS,
    /** Sender Protocol Address */
    spa: IPV4_ADDRESS,
    /** Target Hardware Address */
    tha: MAC_ADDRESS,
    /** Target Protocol Address */
    tpa: IPV4_ADDRESS,
    /** padding up to the minimum frame size */
    body: SLICE,
});
