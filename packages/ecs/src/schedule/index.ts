export * from "./game-loop";
export * from "./performance-monitor";
export * from "./scheduler";
export * from "./system";
