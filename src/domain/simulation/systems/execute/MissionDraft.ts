import { isDeepStrictEqual } from "node:util";
import { MissionState, OrderStatus } from "@/shared/constants/MissionEnums";
import { samePoint } from "@/shared/utils/mathUtils";
import type { Coordinate } from "../../../types/simulation/grid";
import type {
  KnowledgePatch,
  KnowledgeSnapshot,
  KnowledgeState,
  MissionPlan,
  Order,
  PlanSnapshot,
} from "../../../types/simulation/knowledge";
import { KNOWLEDGE_FIELDS } from "../knowledge/patchValidation";

function thawPlan(plan: PlanSnapshot | null): MissionPlan | null {
  if (!plan) {
    return null;
  }
  return {
    destinations: [...plan.destinations],
    path: plan.path.map((cell) => ({ x: cell.x, y: cell.y })),
    legs: plan.legs.map((leg) => ({ ...leg, target: { ...leg.target } })),
    cost: plan.cost,
    computedAt: plan.computedAt,
  };
}

function thaw(snapshot: KnowledgeSnapshot): KnowledgeState {
  return {
    baseLocation: { ...snapshot.baseLocation },
    capacity: snapshot.capacity,
    missionTimeoutMs: snapshot.missionTimeoutMs,
    orders: snapshot.orders.map((order) => ({
      ...order,
      destination: { ...order.destination },
    })),
    carried: [...snapshot.carried],
    plan: thawPlan(snapshot.plan),
    planIndex: snapshot.planIndex,
    missionState: snapshot.missionState,
    stuckFrom: snapshot.stuckFrom,
    missionOrderIds: [...snapshot.missionOrderIds],
    lastMissionStartedAt: snapshot.lastMissionStartedAt,
    metrics: { ...snapshot.metrics },
    revision: snapshot.revision,
  };
}

/**
 * Working copy of Knowledge for one Execute tick. Mutations accumulate here
 * and leave as a single patch holding only the fields that changed.
 */
export class MissionDraft {
  public readonly state: KnowledgeState;

  constructor(private readonly origin: KnowledgeSnapshot) {
    this.state = thaw(origin);
  }

  public get missionState(): MissionState {
    return this.state.missionState;
  }

  public get isMoving(): boolean {
    return (
      this.state.missionState === MissionState.ACTIVE ||
      this.state.missionState === MissionState.RETURNING
    );
  }

  public hasPending(): boolean {
    return this.state.orders.some((order) => order.status === OrderStatus.PENDING);
  }

  /**
   * Next cell of the plan, or null when the plan is exhausted.
   */
  public nextCell(): Coordinate | null {
    const plan = this.state.plan;
    if (!plan || this.state.planIndex >= plan.path.length) {
      return null;
    }
    return plan.path[this.state.planIndex];
  }

  public adoptPlan(plan: MissionPlan): void {
    this.state.plan = plan;
    this.state.planIndex = 1;
  }

  public loadMission(orderIds: readonly string[], carried: readonly string[], now: number): void {
    for (const order of this.state.orders) {
      if (orderIds.includes(order.id)) {
        order.status = OrderStatus.LOADED;
        order.loadedAt = now;
      }
    }
    this.state.carried = [...carried];
    this.state.missionOrderIds = [...orderIds];
    this.state.missionState = MissionState.ACTIVE;
    this.state.stuckFrom = null;
    this.state.lastMissionStartedAt = now;
  }

  public recordStep(): void {
    this.state.planIndex += 1;
    this.state.metrics.totalDistance += 1;
  }

  /**
   * Loaded mission orders addressed to `cell`.
   */
  public deliverableAt(cell: Coordinate): Order[] {
    return this.state.orders.filter(
      (order) =>
        order.status === OrderStatus.LOADED &&
        this.state.missionOrderIds.includes(order.id) &&
        samePoint(order.destination, cell),
    );
  }

  public markDelivered(orderId: string, carried: readonly string[], now: number): void {
    const order = this.state.orders.find((candidate) => candidate.id === orderId);
    if (!order) {
      return;
    }
    order.status = OrderStatus.DELIVERED;
    order.deliveredAt = now;
    this.state.carried = [...carried];

    const metrics = this.state.metrics;
    const seconds = Math.max(0, now - order.createdAt) / 1000;
    metrics.totalDeliveries += 1;
    metrics.averageDeliveryTime +=
      (seconds - metrics.averageDeliveryTime) / metrics.totalDeliveries;
  }

  public enterStuck(): void {
    if (this.state.missionState !== MissionState.STUCK) {
      this.state.stuckFrom = this.state.missionState;
      this.state.missionState = MissionState.STUCK;
    }
  }

  public resume(target: MissionState): void {
    this.state.missionState =
      target === MissionState.STUCK ? MissionState.IDLE : target;
    this.state.stuckFrom = null;
  }

  public completeMission(): void {
    this.state.plan = null;
    this.state.planIndex = 0;
    this.state.carried = [];
    this.state.missionOrderIds = [];
    this.state.stuckFrom = null;
    this.state.missionState = this.hasPending()
      ? MissionState.COLLECTING
      : MissionState.IDLE;
  }

  /**
   * Fields that differ from the snapshot the draft started from.
   */
  public toPatch(): KnowledgePatch {
    const patch: KnowledgePatch = {};
    for (const field of KNOWLEDGE_FIELDS) {
      if (!isDeepStrictEqual(this.state[field], this.origin[field])) {
        assignField(patch, this.state, field);
      }
    }
    return patch;
  }
}

function assignField<K extends keyof KnowledgePatch>(
  patch: KnowledgePatch,
  state: KnowledgeState,
  field: K,
): void {
  patch[field] = state[field];
}
