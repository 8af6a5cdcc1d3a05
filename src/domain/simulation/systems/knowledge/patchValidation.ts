/**
 * Field-level validation of Knowledge patches.
 *
 * A patch arrives as untrusted data. Every field is checked before anything
 * is applied; the result is either a typed patch or a ValidationError that
 * lists every issue found.
 *
 * @module domain/simulation/systems/knowledge/patchValidation
 */

import { LegKind } from "../../../../shared/constants/GridEnums";
import {
  MissionState,
  OrderStatus,
} from "../../../../shared/constants/MissionEnums";
import { ValidationError } from "../../../../shared/errors";
import { isEnumValue, isRecord } from "../../../../shared/types/utils";
import type { Coordinate } from "../../../types/simulation/grid";
import type {
  KnowledgeField,
  KnowledgePatch,
  KnowledgeSnapshot,
  MissionMetrics,
  MissionPlan,
  Order,
  PathLeg,
} from "../../../types/simulation/knowledge";

export const KNOWLEDGE_FIELDS: readonly KnowledgeField[] = [
  "baseLocation",
  "capacity",
  "missionTimeoutMs",
  "orders",
  "carried",
  "plan",
  "planIndex",
  "missionState",
  "stuckFrom",
  "missionOrderIds",
  "lastMissionStartedAt",
  "metrics",
];

function isKnowledgeField(key: string): key is KnowledgeField {
  return KNOWLEDGE_FIELDS.some((field) => field === key);
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function isPositiveInteger(value: unknown): value is number {
  return isNonNegativeInteger(value) && value > 0;
}

function isTimestamp(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value >= 0;
}

function isNullableTimestamp(value: unknown): value is number | null {
  return value === null || isTimestamp(value);
}

export function isCoordinate(value: unknown): value is Coordinate {
  return (
    isRecord(value) &&
    isNonNegativeInteger(value.x) &&
    isNonNegativeInteger(value.y)
  );
}

function isStringList(value: unknown): value is string[] {
  return (
    Array.isArray(value) &&
    value.every((item) => typeof item === "string" && item.length > 0)
  );
}

function isOrder(value: unknown): value is Order {
  return (
    isRecord(value) &&
    typeof value.id === "string" &&
    value.id.length > 0 &&
    isCoordinate(value.destination) &&
    isEnumValue(OrderStatus, value.status) &&
    isTimestamp(value.createdAt) &&
    isNullableTimestamp(value.loadedAt) &&
    isNullableTimestamp(value.deliveredAt)
  );
}

function isOrderList(value: unknown): value is Order[] {
  return Array.isArray(value) && value.every(isOrder);
}

function isLeg(value: unknown): value is PathLeg {
  return (
    isRecord(value) &&
    isEnumValue(LegKind, value.kind) &&
    isNonNegativeInteger(value.startIndex) &&
    isNonNegativeInteger(value.endIndex) &&
    value.endIndex >= value.startIndex &&
    isCoordinate(value.target)
  );
}

function isPlan(value: unknown): value is MissionPlan {
  return (
    isRecord(value) &&
    isStringList(value.destinations) &&
    Array.isArray(value.path) &&
    value.path.length > 0 &&
    value.path.every(isCoordinate) &&
    Array.isArray(value.legs) &&
    value.legs.every(isLeg) &&
    isNonNegativeInteger(value.cost) &&
    isTimestamp(value.computedAt)
  );
}

function isNullablePlan(value: unknown): value is MissionPlan | null {
  return value === null || isPlan(value);
}

function isMetrics(value: unknown): value is MissionMetrics {
  return (
    isRecord(value) &&
    isNonNegativeInteger(value.totalDeliveries) &&
    isNonNegativeInteger(value.totalDistance) &&
    isNonNegativeInteger(value.replanCount) &&
    isTimestamp(value.averageDeliveryTime)
  );
}

function isMissionState(value: unknown): value is MissionState {
  return isEnumValue(MissionState, value);
}

function isNullableMissionState(value: unknown): value is MissionState | null {
  return value === null || isMissionState(value);
}

function take<T>(
  raw: Record<string, unknown>,
  field: KnowledgeField,
  guard: (value: unknown) => value is T,
  expected: string,
  assign: (value: T) => void,
  issues: string[],
): void {
  if (!(field in raw)) {
    return;
  }
  const value = raw[field];
  if (guard(value)) {
    assign(structuredClone(value));
  } else {
    issues.push(`${field}: expected ${expected}`);
  }
}

function hasDuplicates(values: readonly string[]): boolean {
  return new Set(values).size !== values.length;
}

/**
 * Checks that counters only move forward and the plan cursor stays on the path.
 */
function crossFieldIssues(
  patch: KnowledgePatch,
  current: KnowledgeSnapshot,
): string[] {
  const issues: string[] = [];
  const capacity = patch.capacity ?? current.capacity;
  const carried = patch.carried ?? current.carried;

  if (carried.length > capacity) {
    issues.push(
      `carried: ${carried.length} order(s) exceed capacity ${capacity}`,
    );
  }
  if (patch.carried && hasDuplicates(patch.carried)) {
    issues.push("carried: duplicate order ids");
  }
  if (patch.orders && hasDuplicates(patch.orders.map((order) => order.id))) {
    issues.push("orders: duplicate order ids");
  }
  if (patch.stuckFrom === MissionState.STUCK) {
    issues.push("stuckFrom: cannot be stuck");
  }

  const plan = patch.plan !== undefined ? patch.plan : current.plan;
  const planIndex = patch.planIndex ?? current.planIndex;
  if (
    (patch.plan !== undefined || patch.planIndex !== undefined) &&
    planIndex > (plan ? plan.path.length : 0)
  ) {
    issues.push(`planIndex: ${planIndex} is past the end of the plan`);
  }

  if (patch.metrics) {
    const before = current.metrics;
    const after = patch.metrics;
    if (
      after.totalDeliveries < before.totalDeliveries ||
      after.totalDistance < before.totalDistance ||
      after.replanCount < before.replanCount
    ) {
      issues.push("metrics: counters never decrease outside a reset");
    }
  }

  return issues;
}

/**
 * Validates raw patch data against the current state.
 *
 * @throws ValidationError listing every issue; nothing is applied
 */
export function parseKnowledgePatch(
  raw: unknown,
  current: KnowledgeSnapshot,
): KnowledgePatch {
  if (!isRecord(raw)) {
    throw new ValidationError("Knowledge patch must be an object of fields");
  }

  const issues: string[] = [];
  for (const key of Object.keys(raw)) {
    if (key === "revision") {
      issues.push("revision: managed by the store");
    } else if (!isKnowledgeField(key)) {
      issues.push(`${key}: unknown field`);
    }
  }

  const patch: KnowledgePatch = {};
  take(raw, "baseLocation", isCoordinate, "a cell", (v) => { patch.baseLocation = v; }, issues);
  take(raw, "capacity", isPositiveInteger, "a positive integer", (v) => { patch.capacity = v; }, issues);
  take(raw, "missionTimeoutMs", isPositiveInteger, "a positive integer", (v) => { patch.missionTimeoutMs = v; }, issues);
  take(raw, "orders", isOrderList, "a list of orders", (v) => { patch.orders = v; }, issues);
  take(raw, "carried", isStringList, "a list of order ids", (v) => { patch.carried = v; }, issues);
  take(raw, "plan", isNullablePlan, "a plan or null", (v) => { patch.plan = v; }, issues);
  take(raw, "planIndex", isNonNegativeInteger, "a non-negative integer", (v) => { patch.planIndex = v; }, issues);
  take(raw, "missionState", isMissionState, "a mission state", (v) => { patch.missionState = v; }, issues);
  take(raw, "stuckFrom", isNullableMissionState, "a mission state or null", (v) => { patch.stuckFrom = v; }, issues);
  take(raw, "missionOrderIds", isStringList, "a list of order ids", (v) => { patch.missionOrderIds = v; }, issues);
  take(raw, "lastMissionStartedAt", isNullableTimestamp, "a timestamp or null", (v) => { patch.lastMissionStartedAt = v; }, issues);
  take(raw, "metrics", isMetrics, "mission metrics", (v) => { patch.metrics = v; }, issues);

  if (issues.length === 0) {
    issues.push(...crossFieldIssues(patch, current));
  }
  if (issues.length > 0) {
    throw new ValidationError(`Rejected knowledge patch: ${issues.join("; ")}`, issues);
  }
  return patch;
}
