export * from "./connector.types";
export * from "./connector.configuration";
export * from "./connector.status";
