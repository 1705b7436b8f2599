import { uint8_equals } from "../binary/uint8-array";

export abstract class BaseAddress {
    static ADDRESS_LENGTH = 0;

    readonly buffer: Uint8Array;

    constructor(buffer: Uint8Array) {
        this.buffer = buffer;
    }

    abstract toString(): string;

    equals(other: BaseAddress): boolean {
        return uint8_equals(this.buffer, other.buffer);
    }

    toJSON(): { type: string; address: string } {
        return {
            type: this.constructor.name,
            address: this.toString(),
        }
    }
}

/** the static side of an address class */
export interface AddressClass<A extends BaseAddress> {
    ADDRESS_LENGTH: number;
    parse(input: string): Uint8Array;
    new(input: string | Uint8Array): A;
}
