export * from "./shared";
export * from "./struct";
export * from "./define";
export * from "./value-types";
export * from "./more-value-types";
export * from "./array";
export * from "./tlv";
export * from "./value-types/struct";
