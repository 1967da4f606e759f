import { fileURLToPath } from "node:url";
import { ConfigError, loadConfig, type ServerConfig } from "./config";
import { createGameInstance } from "./game/game-init";
import { loadPopulation } from "./game/population";
import { TileMapTerrain } from "./game/resources";
import { ScryptPasswordHasher } from "./infra/auth";
import { createDatabase, type DatabaseHandle } from "./infra/database";
import {
  type AccountStore,
  type CharacterRepository,
  InMemoryAccountStore,
  InMemoryCharacterRepository,
  PgAccountStore,
  PgCharacterRepository,
} from "./infra/repositories";
import { WebSocketServer } from "./server/ws";

const MAP_PATH = fileURLToPath(new URL("../data/starter-map.txt", import.meta.url));
const LEGEND_PATH = fileURLToPath(new URL("../data/tile-legend.json", import.meta.url));
const POPULATION_PATH = fileURLToPath(
  new URL("../data/starter-population.json", import.meta.url),
);

interface Collaborators {
  accounts: AccountStore;
  characters: CharacterRepository;
  database: DatabaseHandle | null;
}

function createCollaborators(config: ServerConfig): Collaborators {
  const hasher = new ScryptPasswordHasher();

  if (config.DATABASE_URL) {
    const database = createDatabase(config.DATABASE_URL);
    console.log("[Server] Using PostgreSQL persistence");
    return {
      accounts: new PgAccountStore(database.db, hasher),
      characters: new PgCharacterRepository(database.db),
      database,
    };
  }

  console.warn("[Server] DATABASE_URL not set, accounts and characters are kept in memory");
  return {
    accounts: new InMemoryAccountStore(hasher),
    characters: new InMemoryCharacterRepository(),
    database: null,
  };
}

async function main(): Promise<void> {
  const config = loadConfig();
  const terrain = TileMapTerrain.fromFiles(MAP_PATH, LEGEND_PATH);
  const population = loadPopulation(POPULATION_PATH);
  const { accounts, characters, database } = createCollaborators(config);

  const game = createGameInstance({ config, terrain, population, accounts, characters });
  const { gameServer } = game;

  const ws = new WebSocketServer(
    {
      host: config.HOST,
      port: config.PORT,
      handshakeTimeoutMs: config.HANDSHAKE_TIMEOUT_MS,
      idlePingMs: config.IDLE_PING_MS,
    },
    {
      onConnect: (conn) => gameServer.handleConnect(conn),
      onMessage: (conn, text) => {
        gameServer.handleMessage(conn, text).catch((error: unknown) => {
          console.error(`[Server] Unhandled error for ${conn.id}:`, error);
        });
      },
      onDisconnect: (conn) => gameServer.handleDisconnect(conn.id),
    },
  );

  await ws.listen();

  const loopDone = game.start().catch((error: unknown) => {
    console.error("[Server] Game loop crashed:", error);
    process.exitCode = 1;
  });

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    console.log(`[Server] ${signal} received, shutting down...`);

    await game.shutdown();
    await ws.close();
    await loopDone;
    await database?.close();

    const report = game.loop.performance.getReport();
    console.log(
      `[Server] Stopped after ${report.totalTicks} ticks (avg ${report.avgTickTimeMs}ms, ${report.overrunCount} overruns)`,
    );
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        console.error("[Server] Shutdown failed:", error);
        process.exitCode = 1;
      });
    });
  }
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(`[Server] ${error.message}`);
  } else {
    console.error("[Server] Failed to start:", error);
  }
  process.exit(1);
});
