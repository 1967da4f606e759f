import { beforeEach, describe, expect, it } from "vitest";
import { SpatialHashGrid } from "@ashfall/ecs";

const sorted = (entities: number[]) => [...entities].sort((a, b) => a - b);

describe("SpatialHashGrid", () => {
  let grid: SpatialHashGrid;

  beforeEach(() => {
    grid = new SpatialHashGrid(10);
  });

  it("should place entities by floored cell coordinates", () => {
    grid.insert(1, 9.9, 0, 0);
    grid.insert(2, -0.1, 0, 0);
    expect(grid.getCellForEntity(1)).toBe("0,0,0");
    expect(grid.getCellForEntity(2)).toBe("-1,0,0");
  });

  it("should treat inserting an existing entity as a move", () => {
    grid.insert(1, 5, 5, 0);
    grid.insert(1, 25, 5, 0);
    expect(grid.size).toBe(1);
    expect(grid.getCellForEntity(1)).toBe("2,0,0");
    expect(grid.stats().totalCells).toBe(1);
  });

  it("should prune emptied cells on remove", () => {
    grid.insert(1, 5, 5, 5);
    expect(grid.remove(1)).toBe(true);
    expect(grid.remove(1)).toBe(false);
    expect(grid.stats()).toEqual({
      totalEntities: 0,
      totalCells: 0,
      avgEntitiesPerCell: 0,
      maxEntitiesPerCell: 0,
      cellSize: 10,
    });
  });

  it("should keep cell membership when an update stays in the same cell", () => {
    grid.insert(1, 1, 1, 0);
    grid.insert(2, 2, 2, 0);
    grid.update(1, 3, 3, 0);
    grid.update(1, 3, 3, 0);
    expect(grid.getCellForEntity(1)).toBe("0,0,0");
    expect(grid.getPosition(1)).toEqual({ x: 3, y: 3, z: 0 });
    expect(sorted(grid.queryPoint(0, 0, 0))).toEqual([1, 2]);
  });

  it("should move entities across cells on update", () => {
    grid.insert(1, 1, 1, 0);
    grid.update(1, 15, 1, 0);
    expect(grid.queryPoint(1, 1, 0)).toEqual([]);
    expect(grid.queryPoint(15, 1, 0)).toEqual([1]);
    expect(grid.stats().totalCells).toBe(1);
  });

  it("should insert on update of an unknown entity", () => {
    grid.update(4, 1, 2, 3);
    expect(grid.has(4)).toBe(true);
  });

  describe("queries", () => {
    beforeEach(() => {
      grid.insert(1, 0, 0, 0);
      grid.insert(2, 3, 4, 0); // distance 5
      grid.insert(3, 5, 5, 0); // distance ~7.07, inside the cube of 5
      grid.insert(4, 6, 0, 0); // outside the cube of 5
      grid.insert(5, -5, 0, 5); // cube corner
      grid.insert(6, 50, 50, 50);
    });

    it("should return exactly the entities inside the cube", () => {
      expect(sorted(grid.queryRadius(0, 0, 0, 5))).toEqual([1, 2, 3, 5]);
    });

    it("should return exactly the entities inside the sphere for the precise variant", () => {
      expect(sorted(grid.queryRadiusPrecise(0, 0, 0, 5))).toEqual([1, 2]);
    });

    it("should use a supplied position lookup for the precise variant", () => {
      const lookup = (entity: number) =>
        entity === 3 ? { x: 1, y: 0, z: 0 } : undefined;
      expect(grid.queryRadiusPrecise(0, 0, 0, 5, lookup)).toEqual([3]);
    });

    it("should answer box queries", () => {
      const found = grid.queryAABB({
        minX: 2,
        minY: 0,
        minZ: 0,
        maxX: 6,
        maxY: 5,
        maxZ: 0,
      });
      expect(sorted(found)).toEqual([2, 3, 4]);
    });

    it("should find far entities with a large radius", () => {
      expect(sorted(grid.queryRadius(0, 0, 0, 1000))).toEqual([1, 2, 3, 4, 5, 6]);
    });
  });

  it("should agree with a brute-force scan after random inserts, updates and removes", () => {
    let seed = 0x2f6b;
    const random = (n: number) => {
      seed = (seed * 48271) % 2147483647;
      return seed % n;
    };
    const coord = () => random(81) - 40;
    const positions = new Map<number, { x: number; y: number; z: number }>();

    for (let step = 0; step < 500; step++) {
      const entity = random(60) + 1;
      const op = random(3);
      if (op === 2) {
        expect(grid.remove(entity)).toBe(positions.delete(entity));
        continue;
      }
      const pos = { x: coord(), y: coord(), z: random(9) - 4 };
      if (op === 0) grid.insert(entity, pos.x, pos.y, pos.z);
      else grid.update(entity, pos.x, pos.y, pos.z);
      positions.set(entity, pos);
    }

    expect(grid.size).toBe(positions.size);
    for (let q = 0; q < 40; q++) {
      const cx = coord();
      const cy = coord();
      const cz = random(9) - 4;
      const r = random(25) + 1;
      const cube: number[] = [];
      const sphere: number[] = [];
      for (const [entity, p] of positions) {
        const dx = p.x - cx;
        const dy = p.y - cy;
        const dz = p.z - cz;
        if (Math.abs(dx) <= r && Math.abs(dy) <= r && Math.abs(dz) <= r) cube.push(entity);
        if (dx * dx + dy * dy + dz * dz <= r * r) sphere.push(entity);
      }
      expect(sorted(grid.queryRadius(cx, cy, cz, r))).toEqual(sorted(cube));
      expect(sorted(grid.queryRadiusPrecise(cx, cy, cz, r))).toEqual(sorted(sphere));
    }
  });

  it("should report occupancy statistics", () => {
    grid.insert(1, 1, 1, 1);
    grid.insert(2, 2, 2, 2);
    grid.insert(3, 11, 1, 1);
    expect(grid.stats()).toEqual({
      totalEntities: 3,
      totalCells: 2,
      avgEntitiesPerCell: 1.5,
      maxEntitiesPerCell: 2,
      cellSize: 10,
    });
  });

  it("should reject a non-positive cell size", () => {
    expect(() => new SpatialHashGrid(0)).toThrow("cell size must be positive");
  });
});
