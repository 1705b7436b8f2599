import { ARRAY, ENUM, LENGTH_FROM, SLICE, STRUCT, TLV, UINT8, defineTLV } from "../../binary/struct";
import { uint8_fromNumber, uint8_readUint } from "../../binary/uint8-array";
import { defineHeader } from "../header";
import { PROTOCOL } from "./protocols";

export const IPV6_OPTION_TYPES = {
    PAD1: 0,
    PADN: 1,
    ROUTER_ALERT: 5,
    JUMBO_PAYLOAD: 0xc2,
} as const;

/** Pad1 is the type byte alone */
export const IPV6_OPTION = defineTLV(ENUM(UINT8, IPV6_OPTION_TYPES), UINT8, { typeOnly: [IPV6_OPTION_TYPES.PAD1] })
    .register(IPV6_OPTION_TYPES.PADN, { toHuman: value => `${value.byteLength} bytes` })
    .register(IPV6_OPTION_TYPES.ROUTER_ALERT, {
        toHuman: value => value.byteLength == 2 ? uint8_readUint(value, 0, 2).toString() : "",
        fromHuman: input => uint8_fromNumber(Number(input), 2),
    });

const isPadding = (option: TLV) => option.get("type") == IPV6_OPTION_TYPES.PAD1 || option.get("type") == IPV6_OPTION_TYPES.PADN;

/**
 * Pads `options` so that, after the next header and length bytes, they end on an
 * 8 byte boundary. Existing trailing padding is replaced.
 * @returns the padded options
 */
export function padIPv6Options(options: TLV[]): TLV[] {
    let padded = [...options];
    while (padded.length && isPadding(padded[padded.length - 1])) {
        padded.pop();
    }

    let size = padded.reduce((sum, option) => sum + option.size, 0);
    let missing = (8 - (size + 2) % 8) % 8;

    if (missing == 1) {
        padded.push(IPV6_OPTION.create({ type: IPV6_OPTION_TYPES.PAD1 }));
    } else if (missing > 1) {
        padded.push(IPV6_OPTION.create({ type: IPV6_OPTION_TYPES.PADN, value: new Uint8Array(missing - 2) }));
    }

    return padded;
}

/**
 * Source: [RFC 8200](https://datatracker.ietf.org/doc/html/rfc8200#section-4.3)
 *
 * ```txt
 *   0                   1                   2                   3
 *   0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |  Next Header  |  Hdr Ext Len  |                               |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+                               +
 *  |                                                               |
 *  .                                                               .
 *  .                            Options                            .
 *  .                                                               .
 *  |                                                               |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 * ```
 */
export const HOP_BY_HOP = defineHeader("IPv6::HopByHop", {
    nextHeader: PROTOCOL,
    /** Length of the header in 8-octet units, not including the first 8 octets. */
    length: UINT8,
    options: LENGTH_FROM(ARRAY(STRUCT(IPV6_OPTION)), ["length"], ({ length }) => (length + 1) * 8 - 2),
    body: SLICE,
}, {
    calcLength(hbh) {
        let options = padIPv6Options(hbh.get("options"));
        let size = options.reduce((sum, option) => sum + option.size, 0);
        hbh.set("options", options);
        hbh.set("length", (size + 2) / 8 - 1);
    },
});
