export * from "./config.types";
export * from "./config.sources";
export * from "./config";
