/**
 * A* search over the 4-connected grid.
 *
 * Unit edge cost, Manhattan heuristic. The open set is ordered by f, then by
 * lower h, then by insertion order, so equal-cost alternatives always resolve
 * the same way and the output is reproducible.
 *
 * @module domain/simulation/pathfinding/AStar
 */

import { NoPathError } from "../../../shared/errors";
import { PriorityQueue } from "../../../shared/utils/PriorityQueue";
import {
  manhattanDistance,
  NEIGHBOUR_ORDER,
  pointKey,
  samePoint,
  translate,
} from "../../../shared/utils/mathUtils";
import type {
  Coordinate,
  PassabilityGrid,
} from "../../types/simulation/grid";

interface OpenNode {
  cell: Coordinate;
  g: number;
  h: number;
  /** Insertion counter, FIFO among equal f and h */
  seq: number;
}

function compareOpenNodes(a: OpenNode, b: OpenNode): number {
  return a.g + a.h - (b.g + b.h) || a.h - b.h || a.seq - b.seq;
}

function inBounds(grid: PassabilityGrid, cell: Coordinate): boolean {
  return cell.x >= 0 && cell.y >= 0 && cell.x < grid.width && cell.y < grid.height;
}

/**
 * Shortest path from `start` to `goal`, both ends included. The start cell is
 * not checked for passability since it is where the robot already stands.
 *
 * @throws NoPathError when either end is off the grid, the goal is blocked,
 * or the open set empties first
 */
export function findPath(
  start: Coordinate,
  goal: Coordinate,
  grid: PassabilityGrid,
): Coordinate[] {
  if (!inBounds(grid, start) || !inBounds(grid, goal) || !grid.isPassable(goal)) {
    throw new NoPathError(start, goal);
  }
  if (samePoint(start, goal)) {
    return [{ x: start.x, y: start.y }];
  }

  const open = new PriorityQueue<OpenNode>(compareOpenNodes);
  const gScore = new Map<string, number>();
  const cameFrom = new Map<string, Coordinate>();
  const closed = new Set<string>();
  let seq = 0;

  const origin = { x: start.x, y: start.y };
  gScore.set(pointKey(origin), 0);
  open.push({ cell: origin, g: 0, h: manhattanDistance(origin, goal), seq: seq++ });

  let current = open.pop();
  while (current) {
    const currentKey = pointKey(current.cell);
    if (!closed.has(currentKey)) {
      if (samePoint(current.cell, goal)) {
        return rebuildPath(cameFrom, current.cell);
      }
      closed.add(currentKey);

      for (const direction of NEIGHBOUR_ORDER) {
        const next = translate(current.cell, direction);
        const nextKey = pointKey(next);
        if (closed.has(nextKey) || !inBounds(grid, next) || !grid.isPassable(next)) {
          continue;
        }
        const tentative = current.g + 1;
        if (tentative < (gScore.get(nextKey) ?? Infinity)) {
          gScore.set(nextKey, tentative);
          cameFrom.set(nextKey, current.cell);
          open.push({
            cell: next,
            g: tentative,
            h: manhattanDistance(next, goal),
            seq: seq++,
          });
        }
      }
    }
    current = open.pop();
  }

  throw new NoPathError(start, goal);
}

function rebuildPath(
  cameFrom: Map<string, Coordinate>,
  end: Coordinate,
): Coordinate[] {
  const path = [end];
  let step = cameFrom.get(pointKey(end));
  while (step) {
    path.push(step);
    step = cameFrom.get(pointKey(step));
  }
  return path.reverse();
}

/**
 * Cells reachable from `start` by 4-connected steps over passable cells.
 * Keys are `pointKey` strings.
 */
export function reachableFrom(
  start: Coordinate,
  grid: PassabilityGrid,
): Set<string> {
  const seen = new Set<string>();
  if (!inBounds(grid, start)) {
    return seen;
  }
  const queue: Coordinate[] = [{ x: start.x, y: start.y }];
  seen.add(pointKey(start));

  for (let i = 0; i < queue.length; i++) {
    for (const direction of NEIGHBOUR_ORDER) {
      const next = translate(queue[i], direction);
      const key = pointKey(next);
      if (!seen.has(key) && inBounds(grid, next) && grid.isPassable(next)) {
        seen.add(key);
        queue.push(next);
      }
    }
  }
  return seen;
}
