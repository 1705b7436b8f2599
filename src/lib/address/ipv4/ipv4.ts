import { ArgumentError } from "../../errors";
import { BaseAddress } from "../base";

const OCTET = "(25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)";
const DOTTED_QUAD_REGEX = new RegExp(`^${OCTET}(\\.${OCTET}){3}$`);

export class IPV4Address extends BaseAddress {
    static ADDRESS_LENGTH = 32;

    static parse(input: string): Uint8Array {
        input = input.trim();
        if (!DOTTED_QUAD_REGEX.test(input)) {
            throw new ArgumentError("failed to parse IPv4 address: " + input);
        }
        return Uint8Array.from(input.split("."), n => parseInt(n, 10));
    }

    static validate(input: unknown): boolean {
        return typeof input == "string" && DOTTED_QUAD_REGEX.test(input.trim());
    }

    constructor(input: string | Uint8Array | IPV4Address) {
        if (typeof input == "string") {
            super(IPV4Address.parse(input));
        } else if (input instanceof IPV4Address) {
            super(new Uint8Array(input.buffer));
        } else if (input.byteLength * 8 == IPV4Address.ADDRESS_LENGTH) {
            super(new Uint8Array(input));
        } else {
            throw new ArgumentError(`failed to initialize IPv4 address from ${input.byteLength} bytes`);
        }
    }

    toString(): string {
        return this.buffer.join(".");
    }

    /** 224.0.0.0/4 */
    isMulticast(): boolean {
        return (this.buffer[0] & 0xf0) == 0xe0;
    }

    /** 127.0.0.0/8 */
    isLoopback(): boolean {
        return this.buffer[0] == 127;
    }

    /** directed broadcast address of the network this address is in */
    broadcast(netmask: IPV4Address): IPV4Address {
        return new IPV4Address(this.buffer.map((b, i) => b | (~netmask.buffer[i] & 0xff)));
    }
}
