import { MissionState, OrderStatus } from "@/shared/constants/MissionEnums";
import type {
  DashboardView,
  SequenceMarker,
} from "@/shared/types/commands/MissionCommand";
import { pointKey } from "@/shared/utils/mathUtils";
import type {
  Coordinate,
  EnvironmentSnapshot,
} from "../../../types/simulation/grid";
import type { KnowledgeSnapshot } from "../../../types/simulation/knowledge";
import type { ExecuteReport } from "../../../types/simulation/mape";
import { createInitialMetrics } from "../../systems/knowledge/defaultKnowledge";
import { collectionElapsed } from "../../systems/monitor/deriveFacts";

export interface ViewSources {
  tick: number;
  now: number;
  knowledge: KnowledgeSnapshot | null;
  environment: EnvironmentSnapshot | null;
  lastReport: { tick: number; report: ExecuteReport } | null;
}

const copyCells = (cells: readonly Coordinate[]): Coordinate[] =>
  cells.map((cell) => ({ x: cell.x, y: cell.y }));

/**
 * Houses numbered by their position among the plan's undelivered stops.
 * Several orders for one house share the first position they reach.
 */
export function deliverySequence(knowledge: KnowledgeSnapshot): SequenceMarker[] {
  const plan = knowledge.plan;
  if (!plan) {
    return [];
  }
  const byId = new Map(knowledge.orders.map((order) => [order.id, order]));
  const markers = new Map<string, SequenceMarker>();
  let position = 0;

  for (const id of plan.destinations) {
    const order = byId.get(id);
    if (!order || order.status === OrderStatus.DELIVERED) {
      continue;
    }
    const key = pointKey(order.destination);
    const existing = markers.get(key);
    if (existing) {
      existing.orderIds.push(id);
      continue;
    }
    position += 1;
    markers.set(key, {
      house: { x: order.destination.x, y: order.destination.y },
      position,
      orderIds: [id],
    });
  }
  return Array.from(markers.values());
}

export function countdownSeconds(
  knowledge: KnowledgeSnapshot,
  now: number,
): number | null {
  if (knowledge.missionState !== MissionState.COLLECTING) {
    return null;
  }
  const remaining = knowledge.missionTimeoutMs - collectionElapsed(knowledge, now);
  return Math.max(0, Math.ceil(remaining / 1000));
}

/**
 * Flattens the latest samples into what the dashboard draws.
 */
export function buildDashboardView(sources: ViewSources): DashboardView {
  const { knowledge, environment, lastReport } = sources;

  return {
    tick: sources.tick,
    updatedAt: sources.now,
    grid: {
      width: environment?.width ?? 0,
      height: environment?.height ?? 0,
      base: environment
        ? { x: environment.base.x, y: environment.base.y }
        : { x: 0, y: 0 },
      baseFootprint: copyCells(environment?.baseFootprint ?? []),
      houses: copyCells(environment?.houses ?? []),
      staticObstacles: copyCells(environment?.staticObstacles ?? []),
      dynamicObstacles: copyCells(environment?.dynamicObstacles ?? []),
    },
    robot: environment
      ? {
          position: { ...environment.robot.position },
          status: environment.robot.status,
          carried: [...environment.robot.carried],
          capacity: environment.robot.capacity,
        }
      : null,
    orders: knowledge?.orders ?? [],
    orderMarkers: copyCells(environment?.orderMarkers ?? []),
    plan: knowledge?.plan
      ? {
          destinations: [...knowledge.plan.destinations],
          path: copyCells(knowledge.plan.path),
          legs: knowledge.plan.legs.map((leg) => ({
            kind: leg.kind,
            startIndex: leg.startIndex,
            endIndex: leg.endIndex,
          })),
          cost: knowledge.plan.cost,
          planIndex: knowledge.planIndex,
        }
      : null,
    sequence: knowledge ? deliverySequence(knowledge) : [],
    missionState: knowledge?.missionState ?? MissionState.IDLE,
    stuckFrom: knowledge?.stuckFrom ?? null,
    countdownSeconds: knowledge ? countdownSeconds(knowledge, sources.now) : null,
    metrics: knowledge ? { ...knowledge.metrics } : createInitialMetrics(),
    lastDecision: lastReport
      ? {
          tick: lastReport.tick,
          decision: lastReport.report.decision,
          outcome: lastReport.report.outcome,
        }
      : null,
  };
}
