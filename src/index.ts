export * from "./lib/coercion";
export * from "./lib/config";
export * from "./lib/errors";
export * from "./lib/import";
export * from "./lib/logger";
export * from "./lib/missing";
export * from "./lib/normalization";
export * from "./lib/outliers";
export * from "./lib/pipeline";
export * from "./lib/table";
