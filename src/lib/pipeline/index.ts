export * from "./runCleaningPipeline";
