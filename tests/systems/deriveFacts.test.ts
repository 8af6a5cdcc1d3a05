import { describe, it, expect, beforeEach } from "vitest";
import {
  deriveFacts,
  remainingMissionOrders,
} from "../../src/domain/simulation/systems/monitor/deriveFacts";
import type { KnowledgeState } from "../../src/domain/types/simulation/knowledge";
import { GridWorld } from "../../src/domain/world/GridWorld";
import { LegKind } from "../../src/shared/constants/GridEnums";
import { MissionState, OrderStatus } from "../../src/shared/constants/MissionEnums";
import { createOpenLayout, createTestKnowledge, createTestOrder } from "../setup";

function activeKnowledge(overrides: Partial<KnowledgeState> = {}): KnowledgeState {
  return createTestKnowledge({
    missionState: MissionState.ACTIVE,
    orders: [createTestOrder("ORD_001", { x: 3, y: 1 }, OrderStatus.LOADED)],
    carried: ["ORD_001"],
    missionOrderIds: ["ORD_001"],
    plan: {
      destinations: ["ORD_001"],
      path: [{ x: 1, y: 1 }, { x: 2, y: 1 }, { x: 3, y: 1 }],
      legs: [{ kind: LegKind.DELIVERY, startIndex: 0, endIndex: 2, target: { x: 3, y: 1 } }],
      cost: 2,
      computedAt: 0,
    },
    planIndex: 1,
    ...overrides,
  });
}

describe("deriveFacts", () => {
  let world: GridWorld;

  beforeEach(() => {
    world = new GridWorld(createOpenLayout([{ x: 3, y: 1 }, { x: 10, y: 3 }]), 2);
  });

  it("debe producir hechos neutros sin muestras", () => {
    const { facts, baseline } = deriveFacts(null, world.snapshot(), null, 0);

    expect(facts.initialized).toBe(false);
    expect(baseline).toBeNull();
  });

  it("debe medir la ventana desde el pedido pendiente más antiguo", () => {
    const knowledge = createTestKnowledge({
      missionState: MissionState.COLLECTING,
      orders: [
        createTestOrder("ORD_001", { x: 3, y: 1 }, OrderStatus.PENDING, 2000),
        createTestOrder("ORD_002", { x: 10, y: 3 }, OrderStatus.PENDING, 1000),
      ],
    });

    const { facts } = deriveFacts(knowledge, world.snapshot(), null, 6000);

    expect(facts.pendingCount).toBe(2);
    expect(facts.elapsedSinceFirstPending).toBe(5000);
    expect(facts.robotAtBase).toBe(true);
  });

  it("la ventana debe empezar tras el último inicio de misión", () => {
    const knowledge = createTestKnowledge({
      missionState: MissionState.COLLECTING,
      orders: [createTestOrder("ORD_001", { x: 3, y: 1 }, OrderStatus.PENDING, 1000)],
      lastMissionStartedAt: 3000,
    });

    expect(deriveFacts(knowledge, world.snapshot(), null, 6000).facts.elapsedSinceFirstPending).toBe(
      3000,
    );
  });

  it("debe calcular el delta de obstáculos contra la muestra anterior", () => {
    const knowledge = createTestKnowledge();
    const first = deriveFacts(knowledge, world.snapshot(), null, 0);
    expect(first.facts.obstacleDelta).toEqual({ added: [], removed: [] });

    world.toggleObstacle({ x: 7, y: 7 });
    const second = deriveFacts(knowledge, world.snapshot(), first.baseline, 0);
    expect(second.facts.obstacleDelta).toEqual({ added: [{ x: 7, y: 7 }], removed: [] });

    world.toggleObstacle({ x: 7, y: 7 });
    const third = deriveFacts(knowledge, world.snapshot(), second.baseline, 0);
    expect(third.facts.obstacleDelta).toEqual({ added: [], removed: [{ x: 7, y: 7 }] });
  });

  it("debe seguir el plan sin incidencias", () => {
    const { facts } = deriveFacts(activeKnowledge(), world.snapshot(), null, 0);

    expect(facts.pathBlocked).toBe(false);
    expect(facts.offPath).toBe(false);
    expect(facts.robotStuck).toBe(false);
  });

  it("debe detectar un tramo bloqueado que aún tiene rodeo", () => {
    world.toggleObstacle({ x: 2, y: 1 });

    const { facts } = deriveFacts(activeKnowledge(), world.snapshot(), null, 0);

    expect(facts.pathBlocked).toBe(true);
    expect(facts.robotStuck).toBe(false);
  });

  it("debe detectar que el robot se salió del plan", () => {
    const { facts } = deriveFacts(activeKnowledge({ planIndex: 2 }), world.snapshot(), null, 0);

    expect(facts.offPath).toBe(true);
  });

  it("debe detectar un destino encerrado y su reapertura", () => {
    for (const cell of [{ x: 3, y: 0 }, { x: 4, y: 1 }, { x: 3, y: 2 }, { x: 2, y: 1 }]) {
      world.toggleObstacle(cell);
    }

    const active = deriveFacts(activeKnowledge(), world.snapshot(), null, 0).facts;
    expect(active.robotStuck).toBe(true);
    expect(active.pathViable).toBe(false);

    const stuck = activeKnowledge({
      missionState: MissionState.STUCK,
      stuckFrom: MissionState.ACTIVE,
    });
    expect(deriveFacts(stuck, world.snapshot(), null, 0).facts.pathViable).toBe(false);

    world.toggleObstacle({ x: 2, y: 1 });
    const reopened = deriveFacts(stuck, world.snapshot(), null, 0).facts;
    expect(reopened.robotStuck).toBe(false);
    expect(reopened.pathViable).toBe(true);
  });

  it("debe marcar la misión como entregada", () => {
    const knowledge = activeKnowledge({
      orders: [createTestOrder("ORD_001", { x: 3, y: 1 }, OrderStatus.DELIVERED)],
      carried: [],
    });

    expect(deriveFacts(knowledge, world.snapshot(), null, 0).facts.allDelivered).toBe(true);
  });

  describe("remainingMissionOrders", () => {
    it("debe listar los pedidos a bordo en el orden del plan", () => {
      const knowledge = activeKnowledge({
        orders: [
          createTestOrder("ORD_001", { x: 3, y: 1 }, OrderStatus.LOADED),
          createTestOrder("ORD_002", { x: 10, y: 3 }, OrderStatus.LOADED),
          createTestOrder("ORD_003", { x: 10, y: 3 }, OrderStatus.DELIVERED),
        ],
        missionOrderIds: ["ORD_001", "ORD_002", "ORD_003"],
        plan: {
          destinations: ["ORD_002", "ORD_003", "ORD_001"],
          path: [{ x: 1, y: 1 }],
          legs: [],
          cost: 0,
          computedAt: 0,
        },
        planIndex: 0,
      });

      expect(remainingMissionOrders(knowledge).map((order) => order.id)).toEqual([
        "ORD_002",
        "ORD_001",
      ]);
    });
  });
});
