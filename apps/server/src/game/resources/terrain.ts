/**
 * Terrain
 *
 * Read-only tile queries consumed by movement validation and visibility.
 * Tiles come from a text map (one character per tile) and a legend that
 * describes each character.
 */

import { readFileSync } from "node:fs";
import { type TileData, type TileMap, tileKey } from "@ashfall/contracts";
import { z } from "zod";

// =============================================================================
// Oracle Interface
// =============================================================================

export interface TileInfo {
  char: string;
  name: string;
  color: string;
  solid: boolean;
  walkable: boolean;
  blocksVision: boolean;
}

export interface TerrainOracle {
  isWalkable(x: number, y: number, z: number): boolean;
  /** Tiles outside the map block vision. */
  blocksVision(x: number, y: number, z: number): boolean;
  getTile(x: number, y: number, z: number): TileInfo | undefined;
  /** Tiles within `radius` of the center on the center's z-level. */
  getVisibleTiles(x: number, y: number, z: number, radius: number): TileMap;
}

// =============================================================================
// Legend
// =============================================================================

const TileDefinitionSchema = z.object({
  name: z.string().min(1),
  color: z.string().min(1),
  solid: z.boolean(),
  blocksVision: z.boolean(),
});

export const TileLegendSchema = z.object({
  /** Tile that counts as "nothing here"; never walkable. */
  empty: z.string().length(1),
  tiles: z.record(
    z.string().length(1, { error: "Legend keys must be single characters" }),
    TileDefinitionSchema,
  ),
});

export type TileLegend = z.infer<typeof TileLegendSchema>;

// =============================================================================
// TileMapTerrain
// =============================================================================

export interface TileMapLayer {
  z: number;
  /** Top row first; column index is x, row index is y. */
  rows: readonly string[];
}

/**
 * Terrain backed by character grids, one per z-level.
 *
 * @example
 * ```typescript
 * const terrain = new TileMapTerrain(legend, [
 *   { z: 0, rows: ["#####", "#...#", "#####"] },
 * ]);
 * terrain.isWalkable(1, 1, 0); // true
 * ```
 */
export class TileMapTerrain implements TerrainOracle {
  private readonly tiles = new Map<string, TileInfo>();
  private readonly layers = new Map<number, string[][]>();

  constructor(legend: TileLegend, layers: readonly TileMapLayer[]) {
    for (const [char, def] of Object.entries(legend.tiles)) {
      this.tiles.set(char, {
        char,
        name: def.name,
        color: def.color,
        solid: def.solid,
        walkable: !def.solid && char !== legend.empty,
        blocksVision: def.blocksVision,
      });
    }

    for (const layer of layers) {
      const grid = layer.rows.map((row) => Array.from(row));
      grid.forEach((row, y) => {
        row.forEach((char, x) => {
          if (!this.tiles.has(char)) {
            throw new Error(
              `Unknown tile "${char}" at (${x}, ${y}, ${layer.z}); add it to the legend`,
            );
          }
        });
      });
      this.layers.set(layer.z, grid);
    }
  }

  /**
   * Load a map file and its legend.
   *
   * Lines of the form `z=N` start a new layer; rows before the first such
   * line belong to z=0.
   */
  static fromFiles(mapPath: string, legendPath: string): TileMapTerrain {
    const legend = TileLegendSchema.parse(JSON.parse(readFileSync(legendPath, "utf8")));
    return new TileMapTerrain(legend, parseMapText(readFileSync(mapPath, "utf8")));
  }

  getTile(x: number, y: number, z: number): TileInfo | undefined {
    const char = this.layers.get(Math.floor(z))?.[Math.floor(y)]?.[Math.floor(x)];
    return char === undefined ? undefined : this.tiles.get(char);
  }

  isWalkable(x: number, y: number, z: number): boolean {
    return this.getTile(x, y, z)?.walkable ?? false;
  }

  blocksVision(x: number, y: number, z: number): boolean {
    return this.getTile(x, y, z)?.blocksVision ?? true;
  }

  getVisibleTiles(x: number, y: number, z: number, radius: number): TileMap {
    const cx = Math.floor(x);
    const cy = Math.floor(y);
    const cz = Math.floor(z);
    const r = Math.floor(radius);
    const visible: TileMap = {};

    for (let dx = -r; dx <= r; dx++) {
      for (let dy = -r; dy <= r; dy++) {
        if (dx * dx + dy * dy > radius * radius) continue;
        const tile = this.getTile(cx + dx, cy + dy, cz);
        if (tile) visible[tileKey(cx + dx, cy + dy, cz)] = toTileData(tile);
      }
    }
    return visible;
  }

  get levels(): number[] {
    return [...this.layers.keys()].sort((a, b) => a - b);
  }
}

export function toTileData(tile: TileInfo): TileData {
  return {
    char: tile.char,
    color: tile.color,
    walkable: tile.walkable,
    solid: tile.solid,
  };
}

export function parseMapText(text: string): TileMapLayer[] {
  const layers: TileMapLayer[] = [];
  let current: { z: number; rows: string[] } = { z: 0, rows: [] };

  for (const line of text.replace(/\r\n/g, "\n").split("\n")) {
    const header = /^z=(-?\d+)\s*$/.exec(line);
    if (header) {
      if (current.rows.length > 0) layers.push(current);
      current = { z: Number(header[1]), rows: [] };
      continue;
    }
    if (line.length > 0) current.rows.push(line);
  }
  if (current.rows.length > 0) layers.push(current);

  return layers;
}
