export * from "./constants";
export * from "./options";
export * from "./blocks";
export * from "./section";
export * from "./file";
