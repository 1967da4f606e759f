export * from "./network/codec";
export * from "./network/protocol";
export * from "./schemas/messages";
export * from "./types/error";
export * from "./types/result";
