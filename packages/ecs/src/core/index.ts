export * from "./entity-pool";
export * from "./errors";
export * from "./types";
export * from "./world";
