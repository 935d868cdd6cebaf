export * from "./parseCsv";
export * from "./parseFile";
export * from "./parseXlsx";
export * from "./tableFromRaw";
export type * from "./types";
