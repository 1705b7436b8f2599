import { ArgumentError } from "../errors";
import { BaseAddress } from "./base";
import { IPV4Address } from "./ipv4/ipv4";
import { IPV6Address } from "./ipv6/ipv6";

type Separator = "-" | ":" | ".";

const SEPARATORS_REGEX = /[-:.]/g;

export class MACAddress extends BaseAddress {
    static ADDRESS_LENGTH = 48;

    static parse(input: string): Uint8Array {
        let hex = input.trim().replace(SEPARATORS_REGEX, "");
        if (!/^[0-9a-f]{12}$/i.test(hex)) {
            throw new ArgumentError("cannot parse MAC address: " + input);
        }
        return Uint8Array.from({ length: 6 }, (_, i) => parseInt(hex.slice(i * 2, i * 2 + 2), 16));
    }

    /**
     * Ethernet group address of a multicast IP address,
     * RFC 1112 for IPv4 (01:00:5e and the low 23 bits) and RFC 2464 for IPv6 (33:33 and the low 32 bits).
     */
    static forMulticast(group: IPV4Address | IPV6Address): MACAddress {
        if (!group.isMulticast()) {
            throw new ArgumentError(`${group} is not a multicast address`);
        }

        let low = group.buffer.subarray(group.buffer.byteLength - 4);
        if (group instanceof IPV4Address) {
            return new MACAddress(Uint8Array.of(0x01, 0x00, 0x5e, low[1] & 0x7f, low[2], low[3]));
        }
        return new MACAddress(Uint8Array.of(0x33, 0x33, ...low));
    }

    constructor(input: string | Uint8Array | MACAddress) {
        if (typeof input == "string") {
            super(MACAddress.parse(input));
        } else if (input instanceof MACAddress) {
            super(new Uint8Array(input.buffer));
        } else if (input.byteLength * 8 == MACAddress.ADDRESS_LENGTH) {
            super(new Uint8Array(input));
        } else {
            throw new ArgumentError(`failed to initialize MAC address from ${input.byteLength} bytes`);
        }
    }

    toString(separator: Separator = ":"): string {
        return Array.from(this.buffer, b => b.toString(16).padStart(2, "0")).join(separator);
    }

    /** group bit of the first octet */
    isMulticast(): boolean {
        return (this.buffer[0] & 1) == 1;
    }

    isBroadcast(): boolean {
        return this.buffer.every(b => b == 0xff);
    }
}
