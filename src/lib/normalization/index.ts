export * from "./FeatureNormalizer";
export * from "./report";
export * from "./spec";
export * from "./yeoJohnson";
