export * from "./resources";
export * from "./sparse-set";
