/**
 * Shared grid math utilities for consistent calculations across the codebase.
 *
 * @module shared/utils/mathUtils
 */

import { Direction } from "../constants/GridEnums";

type Point = { x: number; y: number };

/**
 * Unit offsets per direction, x grows to the right and y grows downward.
 */
export const DIRECTION_OFFSETS: Readonly<Record<Direction, Readonly<Point>>> = {
  [Direction.UP]: { x: 0, y: -1 },
  [Direction.DOWN]: { x: 0, y: 1 },
  [Direction.LEFT]: { x: -1, y: 0 },
  [Direction.RIGHT]: { x: 1, y: 0 },
};

/**
 * Neighbour expansion order used by the pathfinder.
 */
export const NEIGHBOUR_ORDER: readonly Direction[] = [
  Direction.UP,
  Direction.RIGHT,
  Direction.DOWN,
  Direction.LEFT,
];

/**
 * Manhattan distance between two grid cells.
 */
export function manhattanDistance(a: Point, b: Point): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

/**
 * Checks whether two points address the same cell.
 */
export function samePoint(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y;
}

/**
 * Stable string key for a cell, used for set and map membership.
 */
export function pointKey(p: Point): string {
  return `${p.x},${p.y}`;
}

/**
 * Returns the neighbouring cell in the given direction.
 */
export function translate(p: Point, direction: Direction): Point {
  const offset = DIRECTION_OFFSETS[direction];
  return { x: p.x + offset.x, y: p.y + offset.y };
}

/**
 * Direction of a single grid step from `from` to `to`, or null when the two
 * cells are not 4-adjacent.
 */
export function stepDirection(from: Point, to: Point): Direction | null {
  for (const direction of NEIGHBOUR_ORDER) {
    if (samePoint(translate(from, direction), to)) {
      return direction;
    }
  }
  return null;
}
