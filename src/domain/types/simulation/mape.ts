import type {
  AdaptationDecision,
  ExecuteOutcome,
  MissionState,
  PlanResultKind,
} from "../../../shared/constants/MissionEnums";
import type { Coordinate, EnvironmentSnapshot } from "./grid";
import type { KnowledgeSnapshot, MissionPlan } from "./knowledge";

export interface ObstacleDelta {
  added: Coordinate[];
  removed: Coordinate[];
}

/**
 * Facts derived by Monitor from one Knowledge and one Environment sample.
 */
export interface MonitorFacts {
  /** False when either sample was missing; every other field is then neutral */
  initialized: boolean;
  missionState: MissionState;
  /** The current leg crosses a cell that is now impassable */
  pathBlocked: boolean;
  /** The robot is not where its plan says it should be */
  offPath: boolean;
  obstacleDelta: ObstacleDelta;
  pendingCount: number;
  /** Ms since the collection window opened, 0 without pending orders */
  elapsedSinceFirstPending: number;
  /** Active or Returning and a required target is unreachable */
  robotStuck: boolean;
  /** Every target the stuck mission needs is reachable again */
  pathViable: boolean;
  allDelivered: boolean;
  robotAtBase: boolean;
  capacity: number;
  missionTimeoutMs: number;
}

/**
 * Samples a decision was derived from. Travels with the decision so Plan
 * works on the same view Monitor saw.
 */
export interface SampleContext {
  knowledge: KnowledgeSnapshot | null;
  environment: EnvironmentSnapshot | null;
}

export interface RouteResult {
  kind: PlanResultKind.ROUTE;
  decision: AdaptationDecision;
  plan: MissionPlan;
  /** Pending orders Execute loads before departure (StartMission only) */
  loadOrderIds: string[];
  /** Replan counter bump requested from Execute */
  countsAsReplan: boolean;
}

export interface StateResult {
  kind: PlanResultKind.STATE;
  decision: AdaptationDecision;
  missionState: MissionState;
  reason: string;
}

export interface NoPlanResult {
  kind: PlanResultKind.NONE;
  decision: AdaptationDecision;
}

export type PlanOutput = RouteResult | StateResult | NoPlanResult;

export interface ExecuteReport {
  decision: AdaptationDecision;
  outcome: ExecuteOutcome;
  missionState: MissionState;
  position: Coordinate | null;
  deliveredOrderIds: string[];
  error?: string;
}
