export * from "./table";
export * from "./stats";
export type * from "./types";
