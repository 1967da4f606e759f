export * from "./connection";
export * from "./frame";
export * from "./handshake";
export * from "./websocket-server";
