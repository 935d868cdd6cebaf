export * from "./boolean";
export * from "./categorical";
export * from "./columnNames";
export * from "./datetime";
export * from "./fixTypes";
export * from "./numeric";
export * from "./spec";
export { toToken, type CoercionResult } from "./tokens";
