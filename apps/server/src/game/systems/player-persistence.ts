import { defineSystem, type System } from "@ashfall/ecs";
import type { CharacterRepository } from "../../infra/repositories";
import { Player } from "../components";
import { snapshotCharacter } from "../player";
import { GameClockResource } from "../resources";

/**
 * Saves each player once per save interval. Saves run in the background;
 * a failed save is logged and retried at the next interval.
 */
export function createPlayerPersistenceSystem(repository: CharacterRepository): System {
  return defineSystem("PlayerPersistence")
    .priority(5)
    .execute((_dt, world) => {
      const now = world.resources.require(GameClockResource).elapsed;

      for (const [entity, player] of world.query(Player)) {
        if (now - player.lastSaveTime < player.saveInterval) continue;

        const record = snapshotCharacter(world, entity);
        if (!record) continue;

        player.lastSaveTime = now;
        repository.save(record).catch((error: unknown) => {
          console.error(`[Persistence] Failed to save ${record.name}:`, error);
        });
      }
    });
}
