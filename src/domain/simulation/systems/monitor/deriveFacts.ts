import { MissionState, OrderStatus } from "@/shared/constants/MissionEnums";
import { pointKey, samePoint } from "@/shared/utils/mathUtils";
import type {
  Coordinate,
  EnvironmentSnapshot,
} from "../../../types/simulation/grid";
import type {
  KnowledgeSnapshot,
  OrderSnapshot,
} from "../../../types/simulation/knowledge";
import type { MonitorFacts, ObstacleDelta } from "../../../types/simulation/mape";
import { GridView } from "../../../world/GridView";
import { reachableFrom } from "../../pathfinding/AStar";

export interface FactsResult {
  facts: MonitorFacts;
  /** Dynamic obstacle keys to diff the next sample against */
  baseline: ObstacleBaseline | null;
}

/** Dynamic obstacles of the last sample, keyed by `pointKey` */
export type ObstacleBaseline = ReadonlyMap<string, Coordinate>;

export function neutralFacts(): MonitorFacts {
  return {
    initialized: false,
    missionState: MissionState.IDLE,
    pathBlocked: false,
    offPath: false,
    obstacleDelta: { added: [], removed: [] },
    pendingCount: 0,
    elapsedSinceFirstPending: 0,
    robotStuck: false,
    pathViable: false,
    allDelivered: false,
    robotAtBase: false,
    capacity: 0,
    missionTimeoutMs: 0,
  };
}

export function pendingOrders(
  knowledge: KnowledgeSnapshot,
): readonly OrderSnapshot[] {
  return knowledge.orders.filter((order) => order.status === OrderStatus.PENDING);
}

/**
 * Ms since the collection window opened: the later of the oldest pending
 * order and the last mission start. 0 without pending orders.
 */
export function collectionElapsed(
  knowledge: KnowledgeSnapshot,
  now: number,
): number {
  const pending = pendingOrders(knowledge);
  if (pending.length === 0) {
    return 0;
  }
  const oldest = Math.min(...pending.map((order) => order.createdAt));
  const windowStart = Math.max(oldest, knowledge.lastMissionStartedAt ?? 0);
  return Math.max(0, now - windowStart);
}

/**
 * Mission orders still on board, in plan order when a plan lists them.
 */
export function remainingMissionOrders(
  knowledge: KnowledgeSnapshot,
): OrderSnapshot[] {
  const byId = new Map(knowledge.orders.map((order) => [order.id, order]));
  const sequence = [
    ...(knowledge.plan?.destinations ?? []),
    ...knowledge.missionOrderIds,
  ];
  const seen = new Set<string>();
  const remaining: OrderSnapshot[] = [];
  for (const id of sequence) {
    const order = byId.get(id);
    if (
      order &&
      !seen.has(id) &&
      knowledge.missionOrderIds.includes(id) &&
      order.status === OrderStatus.LOADED
    ) {
      seen.add(id);
      remaining.push(order);
    }
  }
  return remaining;
}

/**
 * Cells the mission in `state` still has to reach.
 */
function requiredTargets(
  knowledge: KnowledgeSnapshot,
  state: MissionState | null,
): readonly Coordinate[] {
  switch (state) {
    case MissionState.ACTIVE: {
      const remaining = remainingMissionOrders(knowledge);
      return remaining.length > 0
        ? remaining.map((order) => order.destination)
        : [knowledge.baseLocation];
    }
    case MissionState.RETURNING:
      return [knowledge.baseLocation];
    case MissionState.COLLECTING:
      return pendingOrders(knowledge)
        .slice(0, knowledge.capacity)
        .map((order) => order.destination);
    default:
      return [];
  }
}

function obstacleDelta(
  previous: ObstacleBaseline | null,
  current: ObstacleBaseline,
): ObstacleDelta {
  if (!previous) {
    return { added: [], removed: [] };
  }
  const added: Coordinate[] = [];
  const removed: Coordinate[] = [];
  for (const [key, cell] of current) {
    if (!previous.has(key)) added.push({ ...cell });
  }
  for (const [key, cell] of previous) {
    if (!current.has(key)) removed.push({ ...cell });
  }
  return { added, removed };
}

/**
 * Checks the current leg from the next cell to its end against the grid.
 */
function isPathBlocked(knowledge: KnowledgeSnapshot, grid: GridView): boolean {
  const plan = knowledge.plan;
  if (!plan || knowledge.planIndex >= plan.path.length) {
    return false;
  }
  const leg = plan.legs.find(
    (candidate) =>
      candidate.startIndex < knowledge.planIndex &&
      knowledge.planIndex <= candidate.endIndex,
  );
  const end = leg ? leg.endIndex : plan.path.length - 1;
  return plan.path
    .slice(knowledge.planIndex, end + 1)
    .some((cell) => !grid.isPassable(cell));
}

function isOffPath(
  knowledge: KnowledgeSnapshot,
  robotPosition: Coordinate,
): boolean {
  const plan = knowledge.plan;
  if (!plan || knowledge.planIndex === 0) {
    return false;
  }
  const expected = plan.path[knowledge.planIndex - 1];
  return !expected || !samePoint(expected, robotPosition);
}

/**
 * Derives one tick's facts from a Knowledge and an Environment sample.
 *
 * The obstacle delta is taken against the previous sample's dynamic
 * obstacles; the first sample only records the baseline.
 */
export function deriveFacts(
  knowledge: KnowledgeSnapshot | null,
  environment: EnvironmentSnapshot | null,
  baseline: ObstacleBaseline | null,
  now: number,
): FactsResult {
  if (!knowledge || !environment) {
    return { facts: neutralFacts(), baseline };
  }

  const grid = new GridView(environment);
  const obstacles = new Map(
    environment.dynamicObstacles.map((cell): [string, Coordinate] => [
      pointKey(cell),
      { x: cell.x, y: cell.y },
    ]),
  );
  const robot = environment.robot.position;
  const state = knowledge.missionState;
  const moving =
    state === MissionState.ACTIVE || state === MissionState.RETURNING;

  const pending = pendingOrders(knowledge);
  const elapsedSinceFirstPending = collectionElapsed(knowledge, now);

  const targetState = state === MissionState.STUCK ? knowledge.stuckFrom : state;
  const targets = requiredTargets(knowledge, targetState);
  const reachable =
    moving || state === MissionState.STUCK
      ? reachableFrom(robot, grid)
      : new Set<string>();
  const allReachable = targets.every((cell) => reachable.has(pointKey(cell)));

  const missionOrders = knowledge.orders.filter((order) =>
    knowledge.missionOrderIds.includes(order.id),
  );

  return {
    facts: {
      initialized: true,
      missionState: state,
      pathBlocked: moving && isPathBlocked(knowledge, grid),
      offPath: moving && isOffPath(knowledge, robot),
      obstacleDelta: obstacleDelta(baseline, obstacles),
      pendingCount: pending.length,
      elapsedSinceFirstPending,
      robotStuck: moving && !allReachable,
      pathViable: state === MissionState.STUCK && allReachable,
      allDelivered:
        missionOrders.length > 0 &&
        missionOrders.every((order) => order.status === OrderStatus.DELIVERED),
      robotAtBase: samePoint(robot, knowledge.baseLocation),
      capacity: knowledge.capacity,
      missionTimeoutMs: knowledge.missionTimeoutMs,
    },
    baseline: obstacles,
  };
}
