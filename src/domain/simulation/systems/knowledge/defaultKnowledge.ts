import { MissionState } from "../../../../shared/constants/MissionEnums";
import type { Coordinate } from "../../../types/simulation/grid";
import type {
  KnowledgeState,
  MissionMetrics,
} from "../../../types/simulation/knowledge";

/**
 * Read-only inputs the store is created with.
 */
export interface KnowledgeSettings {
  baseLocation: Coordinate;
  capacity: number;
  missionTimeoutMs: number;
  /** Cells that accept orders */
  houses: Coordinate[];
}

export function createInitialMetrics(): MissionMetrics {
  return {
    totalDeliveries: 0,
    totalDistance: 0,
    replanCount: 0,
    averageDeliveryTime: 0,
  };
}

/**
 * Creates a fresh Knowledge state: no orders, no plan, mission Idle.
 */
export function createInitialKnowledge(
  settings: Omit<KnowledgeSettings, "houses">,
): KnowledgeState {
  return {
    baseLocation: { x: settings.baseLocation.x, y: settings.baseLocation.y },
    capacity: settings.capacity,
    missionTimeoutMs: settings.missionTimeoutMs,
    orders: [],
    carried: [],
    plan: null,
    planIndex: 0,
    missionState: MissionState.IDLE,
    stuckFrom: null,
    missionOrderIds: [],
    lastMissionStartedAt: null,
    metrics: createInitialMetrics(),
    revision: 0,
  };
}
