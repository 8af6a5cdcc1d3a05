import { describe, it, expect } from "vitest";
import { findPath, reachableFrom } from "../../src/domain/simulation/pathfinding/AStar";
import type {
  Coordinate,
  PassabilityGrid,
} from "../../src/domain/types/simulation/grid";
import { NoPathError } from "../../src/shared/errors";
import { manhattanDistance } from "../../src/shared/utils/mathUtils";
import { createAsciiGrid } from "../setup";

function bfsDistance(start: Coordinate, goal: Coordinate, grid: PassabilityGrid): number | null {
  const seen = new Map<string, number>([[`${start.x},${start.y}`, 0]]);
  const queue: Coordinate[] = [start];
  for (let i = 0; i < queue.length; i++) {
    const cell = queue[i];
    const distance = seen.get(`${cell.x},${cell.y}`) ?? 0;
    if (cell.x === goal.x && cell.y === goal.y) {
      return distance;
    }
    for (const [dx, dy] of [[0, -1], [1, 0], [0, 1], [-1, 0]]) {
      const next = { x: cell.x + dx, y: cell.y + dy };
      const key = `${next.x},${next.y}`;
      if (!seen.has(key) && grid.isPassable(next)) {
        seen.set(key, distance + 1);
        queue.push(next);
      }
    }
  }
  return null;
}

function expectValidPath(path: Coordinate[], grid: PassabilityGrid): void {
  for (let i = 1; i < path.length; i++) {
    expect(manhattanDistance(path[i - 1], path[i])).toBe(1);
    expect(grid.isPassable(path[i])).toBe(true);
  }
}

describe("AStar", () => {
  const open = createAsciiGrid([".....", ".....", ".....", "....."]);

  describe("findPath", () => {
    it("debe seguir la línea recta en una rejilla abierta", () => {
      expect(findPath({ x: 0, y: 0 }, { x: 2, y: 0 }, open)).toEqual([
        { x: 0, y: 0 },
        { x: 1, y: 0 },
        { x: 2, y: 0 },
      ]);
    });

    it("debe desempatar de forma determinista", () => {
      expect(findPath({ x: 0, y: 0 }, { x: 1, y: 1 }, open)).toEqual([
        { x: 0, y: 0 },
        { x: 1, y: 0 },
        { x: 1, y: 1 },
      ]);
    });

    it("debe devolver solo el origen cuando coincide con el destino", () => {
      expect(findPath({ x: 3, y: 2 }, { x: 3, y: 2 }, open)).toEqual([{ x: 3, y: 2 }]);
    });

    it("debe rodear muros", () => {
      const grid = createAsciiGrid([
        ".#...",
        ".#.#.",
        ".#.#.",
        "...#.",
      ]);
      const path = findPath({ x: 0, y: 0 }, { x: 4, y: 3 }, grid);

      expect(path).toHaveLength(14);
      expect(path[0]).toEqual({ x: 0, y: 0 });
      expect(path[path.length - 1]).toEqual({ x: 4, y: 3 });
      expectValidPath(path, grid);
    });

    it("debe coincidir con la distancia BFS", () => {
      const rows: string[] = [];
      for (let y = 0; y < 12; y++) {
        let row = "";
        for (let x = 0; x < 12; x++) {
          row += (x * 7 + y * 3) % 5 === 0 && x + y > 0 ? "#" : ".";
        }
        rows.push(row);
      }
      const grid = createAsciiGrid(rows);
      const start = { x: 0, y: 0 };

      for (let y = 0; y < 12; y++) {
        for (let x = 0; x < 12; x++) {
          const goal = { x, y };
          const expected = bfsDistance(start, goal, grid);
          if (expected === null) {
            expect(() => findPath(start, goal, grid)).toThrow(NoPathError);
            continue;
          }
          const path = findPath(start, goal, grid);
          expect(path.length - 1).toBe(expected);
          expectValidPath(path, grid);
        }
      }
    });

    it("debe lanzar NoPathError si el destino está encerrado", () => {
      const grid = createAsciiGrid([
        ".....",
        "..#..",
        ".#.#.",
        "..#..",
      ]);

      expect(() => findPath({ x: 0, y: 0 }, { x: 2, y: 2 }, grid)).toThrow(
        "No path from (0,0) to (2,2)",
      );
    });

    it("debe lanzar NoPathError si el destino está bloqueado o fuera", () => {
      const grid = createAsciiGrid(["..#"]);

      expect(() => findPath({ x: 0, y: 0 }, { x: 2, y: 0 }, grid)).toThrow(NoPathError);
      expect(() => findPath({ x: 0, y: 0 }, { x: 5, y: 0 }, grid)).toThrow(NoPathError);
    });
  });

  describe("reachableFrom", () => {
    it("debe recorrer solo la componente conexa", () => {
      const grid = createAsciiGrid([
        "..#.",
        "..#.",
      ]);

      expect(reachableFrom({ x: 0, y: 0 }, grid)).toEqual(
        new Set(["0,0", "1,0", "0,1", "1,1"]),
      );
    });

    it("debe quedar vacío fuera de la rejilla", () => {
      expect(reachableFrom({ x: -1, y: 0 }, open).size).toBe(0);
    });
  });
});
