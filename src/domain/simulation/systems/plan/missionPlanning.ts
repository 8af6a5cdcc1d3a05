import {
  AdaptationDecision,
  MissionState,
  PlanResultKind,
} from "@/shared/constants/MissionEnums";
import { NoPathError } from "@/shared/errors";
import type { Coordinate } from "../../../types/simulation/grid";
import type {
  KnowledgeSnapshot,
  MissionPlan,
} from "../../../types/simulation/knowledge";
import type {
  PlanOutput,
  RouteResult,
  SampleContext,
  StateResult,
} from "../../../types/simulation/mape";
import { GridView } from "../../../world/GridView";
import { optimizeSequence, planReturn } from "../../pathfinding/SequenceOptimizer";
import { pendingOrders, remainingMissionOrders } from "../monitor/deriveFacts";

interface RouteRequest {
  knowledge: KnowledgeSnapshot;
  start: Coordinate;
  grid: GridView;
  now: number;
}

function deliveryPlan(
  request: RouteRequest,
  orders: ReadonlyArray<{ id: string; destination: Coordinate }>,
): MissionPlan {
  const { knowledge, start, grid, now } = request;
  const sequence = optimizeSequence(
    start,
    orders.map((order) => order.destination),
    grid,
    { returnTo: knowledge.baseLocation },
  );
  return {
    destinations: sequence.order.map((index) => orders[index].id),
    path: sequence.path,
    legs: sequence.legs,
    cost: sequence.cost,
    computedAt: now,
  };
}

function returnPlan(request: RouteRequest): MissionPlan {
  const route = planReturn(request.start, request.knowledge.baseLocation, request.grid);
  return {
    destinations: [],
    path: route.path,
    legs: route.legs,
    cost: route.cost,
    computedAt: request.now,
  };
}

function route(
  decision: AdaptationDecision,
  plan: MissionPlan,
  loadOrderIds: string[] = [],
  countsAsReplan = false,
): RouteResult {
  return {
    kind: PlanResultKind.ROUTE,
    decision,
    plan,
    loadOrderIds,
    countsAsReplan,
  };
}

function stateChange(
  decision: AdaptationDecision,
  missionState: MissionState,
  reason: string,
): StateResult {
  return { kind: PlanResultKind.STATE, decision, missionState, reason };
}

/**
 * Turns a decision into a plan result using the samples the decision was
 * derived from. An unreachable route becomes an EnterStuck state result.
 */
export function planForDecision(
  decision: AdaptationDecision,
  context: SampleContext,
  now: number,
): PlanOutput {
  const { knowledge, environment } = context;
  if (!knowledge || !environment) {
    return { kind: PlanResultKind.NONE, decision };
  }

  const request: RouteRequest = {
    knowledge,
    start: environment.robot.position,
    grid: new GridView(environment),
    now,
  };

  try {
    switch (decision) {
      case AdaptationDecision.START_MISSION: {
        const batch = pendingOrders(knowledge).slice(0, knowledge.capacity);
        if (batch.length === 0) {
          return { kind: PlanResultKind.NONE, decision };
        }
        return route(
          decision,
          deliveryPlan(request, batch),
          batch.map((order) => order.id),
        );
      }

      case AdaptationDecision.REPLAN: {
        const remaining = remainingMissionOrders(knowledge);
        const plan =
          knowledge.missionState === MissionState.RETURNING || remaining.length === 0
            ? returnPlan(request)
            : deliveryPlan(request, remaining);
        return route(decision, plan, [], true);
      }

      case AdaptationDecision.BEGIN_RETURN:
        return route(decision, returnPlan(request));

      case AdaptationDecision.ENTER_STUCK:
        return stateChange(decision, MissionState.STUCK, "required target unreachable");

      case AdaptationDecision.RESUME:
        return stateChange(
          decision,
          knowledge.stuckFrom ?? MissionState.IDLE,
          "route reachable again",
        );

      case AdaptationDecision.COMPLETE_MISSION:
      case AdaptationDecision.NO_ACTION:
        return { kind: PlanResultKind.NONE, decision };
    }
  } catch (error) {
    if (error instanceof NoPathError) {
      return stateChange(AdaptationDecision.ENTER_STUCK, MissionState.STUCK, error.message);
    }
    throw error;
  }
}
