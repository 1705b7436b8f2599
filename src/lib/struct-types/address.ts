import { AddressClass, BaseAddress } from "../address/base";
import { IPV4Address } from "../address/ipv4/ipv4";
import { IPV6Address } from "../address/ipv6/ipv6";
import { MACAddress } from "../address/mac";
import { ParseError } from "../errors";
import { StructType } from "../binary/struct/shared";

export const defineAddress = <A extends BaseAddress>(Address: AddressClass<A>): StructType<A> => {
    let byteLength = Address.ADDRESS_LENGTH / 8;

    return {
        bitLength: Address.ADDRESS_LENGTH,
        defaultValue: () => new Address(new Uint8Array(byteLength)),
        decode(buf) {
            if (buf.byteLength < byteLength) {
                throw new ParseError("too few bytes for address", byteLength, buf.byteLength);
            }
            return [new Address(buf.subarray(0, byteLength)), byteLength];
        },
        encode: value => value.buffer,
        size: () => byteLength,
        toHuman: value => value.toString(),
        fromHuman: input => new Address(input),
    }
}

export const IPV4_ADDRESS = defineAddress(IPV4Address);
export const IPV6_ADDRESS = defineAddress(IPV6Address);
export const MAC_ADDRESS = defineAddress(MACAddress);
