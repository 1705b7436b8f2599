import { SLICE, UINT16 } from "../../binary/struct";
import { IPV6_ADDRESS } from "../../struct-types/address";
import { defineHeader } from "../header";

/**
 * Multicast Listener Discovery, carried in the body of an ICMPv6 query (130),
 * report (131) or done (132) message.
 * Source: [RFC 2710 §3](https://datatracker.ietf.org/doc/html/rfc2710#section-3)
 *
 * ```txt
 *   0                   1                   2                   3
 *   0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |    Maximum Response Delay     |          Reserved             |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |                                                               |
 *  +                       Multicast Address                       +
 *  |                                                               |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * ```
 */
export const MLD = defineHeader("MLD", {
    /** milliseconds */
    maxRespDelay: UINT16,
    reserved: UINT16,
    mcastAddr: IPV6_ADDRESS,
    body: SLICE,
});
