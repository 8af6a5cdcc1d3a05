import type {
  MissionState,
  OrderStatus,
} from "../../../shared/constants/MissionEnums";
import type { LegKind } from "../../../shared/constants/GridEnums";
import type { DeepReadonly } from "../../../shared/types/utils";
import type { Coordinate } from "./grid";

export interface Order {
  id: string;
  destination: Coordinate;
  status: OrderStatus;
  /** Epoch ms */
  createdAt: number;
  loadedAt: number | null;
  deliveredAt: number | null;
}

/**
 * Contiguous path segment. Indices are inclusive positions in `MissionPlan.path`.
 */
export interface PathLeg {
  kind: LegKind;
  startIndex: number;
  endIndex: number;
  target: Coordinate;
}

export interface MissionPlan {
  /** Order ids in visiting order; empty for a pure return route */
  destinations: string[];
  /** First cell is the robot's cell when the plan was computed */
  path: Coordinate[];
  legs: PathLeg[];
  /** Cells to traverse, `path.length - 1` */
  cost: number;
  computedAt: number;
}

export interface MissionMetrics {
  totalDeliveries: number;
  totalDistance: number;
  replanCount: number;
  /** Running mean in seconds, from order creation to delivery */
  averageDeliveryTime: number;
}

export interface KnowledgeState {
  baseLocation: Coordinate;
  capacity: number;
  missionTimeoutMs: number;
  orders: Order[];
  carried: string[];
  plan: MissionPlan | null;
  /** Index in `plan.path` of the next cell to enter */
  planIndex: number;
  missionState: MissionState;
  /** State restored on Resume */
  stuckFrom: MissionState | null;
  missionOrderIds: string[];
  lastMissionStartedAt: number | null;
  metrics: MissionMetrics;
  revision: number;
}

export type KnowledgeField = Exclude<keyof KnowledgeState, "revision">;

export type KnowledgePatch = Partial<Pick<KnowledgeState, KnowledgeField>>;

export type KnowledgeSnapshot = DeepReadonly<KnowledgeState>;

export type OrderSnapshot = DeepReadonly<Order>;
export type PlanSnapshot = DeepReadonly<MissionPlan>;
