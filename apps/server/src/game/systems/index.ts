/**
 * Game Systems
 *
 * | System            | Priority |
 * |-------------------|----------|
 * | Clock             | 1000     |
 * | Cooldown          | 100      |
 * | Movement          | 90       |
 * | Combat            | 80       |
 * | Respawn           | 20       |
 * | Lifetime          | 10       |
 * | PlayerPersistence | 5        |
 */

export * from "./clock";
export * from "./combat";
export * from "./cooldown";
export * from "./lifetime";
export * from "./movement";
export * from "./player-persistence";
export * from "./respawn";
