/**
 * Delivery-sequence optimisation.
 *
 * Up to five destinations every visiting order is evaluated exhaustively
 * (at most 5! = 120 tours); above that a greedy nearest-neighbour tour is
 * built instead, a bounded approximation rather than an optimum.
 *
 * @module domain/simulation/pathfinding/SequenceOptimizer
 */

import { LegKind } from "../../../shared/constants/GridEnums";
import { pointKey } from "../../../shared/utils/mathUtils";
import type {
  Coordinate,
  PassabilityGrid,
} from "../../types/simulation/grid";
import type { PathLeg } from "../../types/simulation/knowledge";
import { findPath } from "./AStar";

export const EXHAUSTIVE_SEARCH_LIMIT = 5;

export interface SequenceOptions {
  /** Point the robot heads back to afterwards; its leg counts toward the cost compared between tours */
  returnTo?: Coordinate;
}

export interface SequenceResult {
  /** Indices into the input destinations, in visiting order */
  order: number[];
  /** Delivery legs only, first cell is `start` */
  path: Coordinate[];
  legs: PathLeg[];
  /** Cells in `path` to traverse */
  cost: number;
  /** `cost` plus the return leg when `returnTo` is given */
  tourCost: number;
}

/**
 * Memoises `findPath` per ordered cell pair for one optimisation call.
 */
class LegCache {
  private readonly paths = new Map<string, Coordinate[]>();

  constructor(private readonly grid: PassabilityGrid) {}

  path(from: Coordinate, to: Coordinate): Coordinate[] {
    const key = `${pointKey(from)}->${pointKey(to)}`;
    const cached = this.paths.get(key);
    if (cached) {
      return cached;
    }
    const path = findPath(from, to, this.grid);
    this.paths.set(key, path);
    return path;
  }

  cost(from: Coordinate, to: Coordinate): number {
    return this.path(from, to).length - 1;
  }
}

/**
 * Lexicographic permutations of `0..n-1`, identity first.
 */
export function* permutations(n: number): Generator<number[]> {
  const current: number[] = [];
  const used = new Array<boolean>(n).fill(false);

  function* extend(): Generator<number[]> {
    if (current.length === n) {
      yield [...current];
      return;
    }
    for (let i = 0; i < n; i++) {
      if (used[i]) continue;
      used[i] = true;
      current.push(i);
      yield* extend();
      current.pop();
      used[i] = false;
    }
  }

  yield* extend();
}

function tourCost(
  start: Coordinate,
  destinations: readonly Coordinate[],
  order: readonly number[],
  cache: LegCache,
  returnTo: Coordinate | undefined,
): number {
  let total = 0;
  let position = start;
  for (const index of order) {
    total += cache.cost(position, destinations[index]);
    position = destinations[index];
  }
  if (returnTo) {
    total += cache.cost(position, returnTo);
  }
  return total;
}

function exhaustiveOrder(
  start: Coordinate,
  destinations: readonly Coordinate[],
  cache: LegCache,
  returnTo: Coordinate | undefined,
): number[] {
  let best: number[] = [];
  let bestCost = Infinity;
  for (const order of permutations(destinations.length)) {
    const cost = tourCost(start, destinations, order, cache, returnTo);
    if (cost < bestCost) {
      bestCost = cost;
      best = order;
    }
  }
  return best;
}

function nearestNeighbourOrder(
  start: Coordinate,
  destinations: readonly Coordinate[],
  cache: LegCache,
): number[] {
  const order: number[] = [];
  const unvisited = destinations.map((_, index) => index);
  let position = start;

  while (unvisited.length > 0) {
    let nearestSlot = 0;
    let nearestCost = Infinity;
    unvisited.forEach((index, slot) => {
      const cost = cache.cost(position, destinations[index]);
      if (cost < nearestCost) {
        nearestCost = cost;
        nearestSlot = slot;
      }
    });
    const [chosen] = unvisited.splice(nearestSlot, 1);
    order.push(chosen);
    position = destinations[chosen];
  }
  return order;
}

/**
 * Concatenates the legs of a visiting order into one path, tagging each leg.
 */
function buildRoute(
  start: Coordinate,
  destinations: readonly Coordinate[],
  order: readonly number[],
  cache: LegCache,
): { path: Coordinate[]; legs: PathLeg[] } {
  const path: Coordinate[] = [{ x: start.x, y: start.y }];
  const legs: PathLeg[] = [];
  let position = start;

  for (const index of order) {
    const target = destinations[index];
    const segment = cache.path(position, target);
    const startIndex = path.length - 1;
    path.push(...segment.slice(1).map((cell) => ({ x: cell.x, y: cell.y })));
    legs.push({
      kind: LegKind.DELIVERY,
      startIndex,
      endIndex: path.length - 1,
      target: { x: target.x, y: target.y },
    });
    position = target;
  }
  return { path, legs };
}

/**
 * Orders `destinations` to minimise travel from `start`.
 *
 * Exhaustive search keeps the first minimum in lexicographic order of input
 * indices, so ties go to the order closest to the input order. Nearest
 * neighbour breaks ties by input order too.
 *
 * @throws NoPathError when any required leg, including the return leg, is unreachable
 */
export function optimizeSequence(
  start: Coordinate,
  destinations: readonly Coordinate[],
  grid: PassabilityGrid,
  options: SequenceOptions = {},
): SequenceResult {
  const cache = new LegCache(grid);
  const { returnTo } = options;

  // Connectivity is symmetric, so one leg per destination from the start
  // proves every leg between them exists.
  for (const destination of destinations) {
    cache.path(start, destination);
  }

  const order =
    destinations.length <= EXHAUSTIVE_SEARCH_LIMIT
      ? exhaustiveOrder(start, destinations, cache, returnTo)
      : nearestNeighbourOrder(start, destinations, cache);

  const { path, legs } = buildRoute(start, destinations, order, cache);
  const cost = path.length - 1;
  const last = order.length > 0 ? destinations[order[order.length - 1]] : start;

  return {
    order,
    path,
    legs,
    cost,
    tourCost: returnTo ? cost + cache.cost(last, returnTo) : cost,
  };
}

/**
 * Single Return leg from `start` to `base`.
 *
 * @throws NoPathError when the base cannot be reached
 */
export function planReturn(
  start: Coordinate,
  base: Coordinate,
  grid: PassabilityGrid,
): { path: Coordinate[]; legs: PathLeg[]; cost: number } {
  const path = findPath(start, base, grid);
  return {
    path,
    legs: [
      {
        kind: LegKind.RETURN,
        startIndex: 0,
        endIndex: path.length - 1,
        target: { x: base.x, y: base.y },
      },
    ],
    cost: path.length - 1,
  };
}
