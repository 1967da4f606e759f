// Entity/Component Store
export * from "./core";
// Systems, Scheduling & Game Loop
export * from "./schedule";
// Spatial Index
export * from "./spatial";
// Storage
export * from "./storage";
