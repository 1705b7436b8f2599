export * from "./lib/errors";
export * from "./lib/binary/struct";
export * from "./lib/binary/checksum";
export * from "./lib/binary/uint8-array";
export * from "./lib/address/base";
export * from "./lib/address/mac";
export * from "./lib/address/ipv4/ipv4";
export * from "./lib/address/ipv6/ipv6";
export * from "./lib/struct-types/address";
export * from "./lib/header";
export * from "./lib/packet/packet";
export * from "./lib/packet/inspect";
export * from "./lib/packet/link-types";
export * from "./lib/packet/multicast";
export * from "./lib/wire/wire";
export * from "./lib/config";
export * from "./lib/pcapng";
