export * from "./compare";
export * from "./fill";
export * from "./flags";
export * from "./handleMissing";
export * from "./policy";
export * from "./summary";
