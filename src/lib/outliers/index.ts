export * from "./applyOutlierPolicy";
export * from "./detect";
export * from "./policy";
