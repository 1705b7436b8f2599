import { ArgumentError } from "../../errors";
import { BaseAddress } from "../base";

const HEXTET_REGEX = /^[0-9a-f]{1,4}$/;

function parseHextets(part: string, input: string): number[] {
    if (!part) return [];
    return part.split(":").map(hextet => {
        if (!HEXTET_REGEX.test(hextet)) {
            throw new ArgumentError("failed to parse IPv6 address: " + input);
        }
        return parseInt(hextet, 16);
    });
}

export class IPV6Address extends BaseAddress {
    static ADDRESS_LENGTH: number = 128;
    static parse(input: string): Uint8Array {
        let text = input.toLowerCase().trim();
        let halves = text.split("::");

        if (halves.length > 2) {
            throw new ArgumentError("failed to parse IPv6 address: " + input);
        }

        let head = parseHextets(halves[0], input), tail = parseHextets(halves[1] ?? "", input);
        let hextets: number[];

        if (halves.length == 2) {
            let missing = 8 - head.length - tail.length;
            if (missing < 1) {
                throw new ArgumentError("failed to parse IPv6 address: " + input);
            }
            hextets = [...head, ...new Array<number>(missing).fill(0), ...tail];
        } else {
            hextets = head;
        }

        if (hextets.length != 8) {
            throw new ArgumentError("failed to parse IPv6 address: " + input);
        }

        let buffer = new Uint8Array(IPV6Address.ADDRESS_LENGTH / 8);
        hextets.forEach((hextet, i) => {
            buffer[i * 2] = hextet >> 8;
            buffer[i * 2 + 1] = hextet & 0xff;
        });

        return buffer;
    }
    static validate(input: unknown): boolean {
        if (typeof input != "string") {
            return false;
        }

        try {
            IPV6Address.parse(input);
            return true;
        } catch (error) {
            if (error instanceof ArgumentError) return false;
            throw error;
        }
    }

    constructor(input: string | Uint8Array | IPV6Address) {
        if (typeof input == "string") {
            super(IPV6Address.parse(input));
        } else if (input instanceof IPV6Address) {
            super(new Uint8Array(input.buffer));
        } else if (input.length == IPV6Address.ADDRESS_LENGTH / 8) {
            super(new Uint8Array(input));
        } else {
            throw new ArgumentError("failed to initialize: " + IPV6Address.name)
        }
    }

    /**
     * (-1) No shortening;
     * (0) Remove leading zeroes;
     * (4) remove longest sequence of zeroes;
     * @param simplify
     */
    toString(simplify: -1 | 0 | 4 = 4): string {
        let hextets = new Array<number>(8);
        for (let i = 0; i < 8; i++) {
            hextets[i] = (this.buffer[i * 2] << 8) | this.buffer[i * 2 + 1];
        }

        if (simplify < 0) {
            return hextets.map(h => h.toString(16).padStart(4, "0")).join(":");
        }

        let a = hextets.map(h => h.toString(16));
        if (simplify < 4) {
            return a.join(":");
        }

        // longest run of at least two zero hextets, the first one wins a tie
        let start = -1, length = 1;
        for (let i = 0; i < 8; i++) {
            let j = i;
            while (j < 8 && hextets[j] == 0) j++;
            if (j - i > length) {
                start = i;
                length = j - i;
            }
            i = Math.max(i, j);
        }

        if (start < 0) {
            return a.join(":");
        }

        return a.slice(0, start).join(":") + "::" + a.slice(start + length).join(":");
    }

    isLinkLocal(): boolean {
        // fe80::/10
        return this.buffer[0] == 0xfe && (this.buffer[1] & 0xc0) == 0x80;
    }

    isMulticast(): boolean {
        return this.buffer[0] == 0xff;
    }
    isLoopback(): boolean {
        return this.buffer.every((n, i) => n == (i == 15 ? 1 : 0));
    }
}
