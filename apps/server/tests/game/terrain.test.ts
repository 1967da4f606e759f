import { describe, expect, it } from "vitest";
import { fileURLToPath } from "node:url";
import {
  parseMapText,
  type TileLegend,
  TileMapTerrain,
} from "../../src/game/resources";

const legend: TileLegend = {
  empty: " ",
  tiles: {
    " ": { name: "empty", color: "#000000", solid: false, blocksVision: false },
    ".": { name: "floor", color: "#a0a0a0", solid: false, blocksVision: false },
    "#": { name: "wall", color: "#404040", solid: true, blocksVision: true },
    "~": { name: "water", color: "#1e90ff", solid: true, blocksVision: false },
  },
};

function createTerrain(): TileMapTerrain {
  return new TileMapTerrain(legend, [
    { z: 0, rows: ["#####", "#..~#", "#. .#", "#####"] },
    { z: 1, rows: ["..", ".."] },
  ]);
}

describe("TileMapTerrain", () => {
  it("should report walkability from the legend", () => {
    const terrain = createTerrain();

    expect(terrain.isWalkable(1, 1, 0)).toBe(true);
    expect(terrain.isWalkable(0, 0, 0)).toBe(false);
    expect(terrain.isWalkable(3, 1, 0)).toBe(false);
    expect(terrain.isWalkable(2, 2, 0)).toBe(false);
  });

  it("should floor fractional coordinates", () => {
    expect(createTerrain().isWalkable(1.9, 1.2, 0.5)).toBe(true);
  });

  it("should treat everything outside the map as blocked", () => {
    const terrain = createTerrain();

    expect(terrain.getTile(50, 50, 0)).toBeUndefined();
    expect(terrain.isWalkable(-1, 0, 0)).toBe(false);
    expect(terrain.blocksVision(50, 50, 0)).toBe(true);
    expect(terrain.isWalkable(1, 1, 7)).toBe(false);
  });

  it("should separate solidity from vision blocking", () => {
    const terrain = createTerrain();

    expect(terrain.blocksVision(0, 0, 0)).toBe(true);
    expect(terrain.blocksVision(3, 1, 0)).toBe(false);
  });

  it("should list visible tiles on the center's level", () => {
    const tiles = createTerrain().getVisibleTiles(1, 1, 0, 1);

    expect(Object.keys(tiles).sort()).toEqual(["0,1,0", "1,0,0", "1,1,0", "1,2,0", "2,1,0"]);
    expect(tiles["1,1,0"]).toEqual({
      char: ".",
      color: "#a0a0a0",
      walkable: true,
      solid: false,
    });
  });

  it("should reject characters missing from the legend", () => {
    expect(() => new TileMapTerrain(legend, [{ z: 0, rows: ["#X#"] }])).toThrow(
      'Unknown tile "X" at (1, 0, 0); add it to the legend',
    );
  });

  it("should load the bundled starter map", () => {
    const terrain = TileMapTerrain.fromFiles(
      fileURLToPath(new URL("../../data/starter-map.txt", import.meta.url)),
      fileURLToPath(new URL("../../data/tile-legend.json", import.meta.url)),
    );

    expect(terrain.levels).toEqual([0]);
    expect(terrain.isWalkable(8, 8, 0)).toBe(true);
    expect(terrain.getTile(0, 0, 0)?.name).toBe("wall");
  });
});

describe("parseMapText", () => {
  it("should split layers on z headers", () => {
    expect(parseMapText("..\n..\nz=2\n##\n")).toEqual([
      { z: 0, rows: ["..", ".."] },
      { z: 2, rows: ["##"] },
    ]);
  });

  it("should accept CRLF line endings", () => {
    expect(parseMapText("z=0\r\n#.#\r\n")).toEqual([{ z: 0, rows: ["#.#"] }]);
  });
});
