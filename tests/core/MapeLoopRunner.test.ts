import { describe, it, expect, afterEach } from "vitest";
import { createContainer } from "../../src/config/container";
import { TYPES } from "../../src/config/Types";
import type { MessageBus } from "../../src/domain/simulation/bus/MessageBus";
import { MapeLoopRunner } from "../../src/domain/simulation/core/MapeLoopRunner";
import type { Coordinate } from "../../src/domain/types/simulation/grid";
import type { ExecuteReport } from "../../src/domain/types/simulation/mape";
import { MissionCommandType } from "../../src/shared/constants/CommandEnums";
import { TerrainKind } from "../../src/shared/constants/GridEnums";
import {
  AdaptationDecision,
  MissionState,
  OrderStatus,
} from "../../src/shared/constants/MissionEnums";
import { isMissionError } from "../../src/shared/errors";
import { RandomUtils } from "../../src/shared/utils/RandomUtils";
import {
  createOpenLayout,
  createTestConfig,
  restoreRealTimers,
  setupFakeTimers,
} from "../setup";

function createRunner(capacity: number, houses: Coordinate[]): MapeLoopRunner {
  const container = createContainer({
    config: createTestConfig({ ROBOT_CAPACITY: String(capacity) }),
    layout: createOpenLayout(houses),
  });
  const runner = container.get<MapeLoopRunner>(TYPES.MapeLoopRunner);
  runner.initialize();
  return runner;
}

const addOrder = (destination: Coordinate) =>
  ({ type: MissionCommandType.ADD_ORDER, destination }) as const;
const toggle = (cell: Coordinate) =>
  ({ type: MissionCommandType.TOGGLE_OBSTACLE, cell }) as const;

async function runTicks(runner: MapeLoopRunner, count: number): Promise<Array<ExecuteReport | null>> {
  const reports: Array<ExecuteReport | null> = [];
  for (let i = 0; i < count; i++) {
    reports.push(await runner.tick());
  }
  return reports;
}

describe("MapeLoopRunner", () => {
  afterEach(() => {
    restoreRealTimers();
  });

  describe("submit", () => {
    it("debe rechazar comandos antes de inicializar", () => {
      const container = createContainer({
        config: createTestConfig(),
        layout: createOpenLayout([{ x: 6, y: 1 }]),
      });
      const runner = container.get<MapeLoopRunner>(TYPES.MapeLoopRunner);

      expect(() => runner.submit(addOrder({ x: 6, y: 1 }))).toThrow(
        "Mission loop is not initialized",
      );
    });

    it("debe aplicar un pedido al momento y abrir la recogida", () => {
      const runner = createRunner(2, [{ x: 6, y: 1 }]);

      expect(runner.submit(addOrder({ x: 6, y: 1 }))).toEqual({
        type: MissionCommandType.ADD_ORDER,
        applied: true,
        orderId: "ORD_001",
      });
      expect(runner.getKnowledge()?.missionState).toBe(MissionState.COLLECTING);
      expect(runner.getEnvironment()?.orderMarkers).toEqual([{ x: 6, y: 1 }]);
    });

    it("debe rechazar destinos que no son casas", () => {
      const runner = createRunner(2, [{ x: 6, y: 1 }]);

      expect(() => runner.submit(addOrder({ x: 5, y: 5 }))).toThrow(
        "Invalid cell (5,5): not a delivery house",
      );
    });

    it("no debe prometer terreno para un cambio de obstáculo en cola", async () => {
      const runner = createRunner(2, [{ x: 6, y: 1 }]);

      const pending = runner.tick();
      expect(runner.submit(toggle({ x: 5, y: 5 }))).toEqual({
        type: MissionCommandType.TOGGLE_OBSTACLE,
        applied: false,
      });
      await pending;
      await runner.tick();

      expect(runner.getEnvironment()?.dynamicObstacles).toEqual([{ x: 5, y: 5 }]);
    });

    it("debe informar el terreno resultante de un cambio de obstáculo", () => {
      const runner = createRunner(2, [{ x: 6, y: 1 }]);

      expect(runner.submit(toggle({ x: 5, y: 5 })).terrain).toBe(TerrainKind.DYNAMIC_OBSTACLE);
      expect(runner.submit(toggle({ x: 5, y: 5 })).terrain).toBe(TerrainKind.ROAD);
      expect(() => runner.submit(toggle({ x: 6, y: 1 }))).toThrow(
        "Invalid cell (6,1): a delivery house",
      );
    });
  });

  it("debe completar una misión de dos entregas y volver a la base", async () => {
    const runner = createRunner(2, [{ x: 10, y: 3 }, { x: 15, y: 10 }]);
    runner.submit(addOrder({ x: 10, y: 3 }));
    runner.submit(addOrder({ x: 15, y: 10 }));

    const reports = await runTicks(runner, 48);

    expect(reports[0]?.decision).toBe(AdaptationDecision.START_MISSION);
    expect(reports[11]?.deliveredOrderIds).toEqual(["ORD_001"]);
    expect(reports[23]?.deliveredOrderIds).toEqual(["ORD_002"]);
    expect(reports[24]?.decision).toBe(AdaptationDecision.BEGIN_RETURN);
    expect(reports[46]?.position).toEqual({ x: 1, y: 1 });
    expect(reports[47]?.decision).toBe(AdaptationDecision.COMPLETE_MISSION);
    expect(
      reports
        .map((report) => report?.decision)
        .filter((decision) => decision === AdaptationDecision.REPLAN),
    ).toEqual([]);

    const knowledge = runner.getKnowledge();
    expect(knowledge?.missionState).toBe(MissionState.IDLE);
    expect(knowledge?.plan).toBeNull();
    expect(knowledge?.orders.map((order) => order.status)).toEqual([
      OrderStatus.DELIVERED,
      OrderStatus.DELIVERED,
    ]);
    expect(knowledge?.metrics.totalDeliveries).toBe(2);
    expect(knowledge?.metrics.totalDistance).toBe(46);
    expect(knowledge?.metrics.replanCount).toBe(0);
    expect(runner.getEnvironment()?.robot.carried).toEqual([]);
  });

  it("debe replanificar cuando un obstáculo corta la ruta", async () => {
    const runner = createRunner(1, [{ x: 6, y: 1 }]);
    runner.submit(addOrder({ x: 6, y: 1 }));
    await runTicks(runner, 2);
    expect(runner.getEnvironment()?.robot.position).toEqual({ x: 2, y: 1 });

    runner.submit(toggle({ x: 4, y: 1 }));
    const report = await runner.tick();

    expect(report?.decision).toBe(AdaptationDecision.REPLAN);
    const plan = runner.getKnowledge()?.plan;
    expect(plan?.path[0]).toEqual({ x: 2, y: 1 });
    expect(plan?.path).not.toContainEqual({ x: 4, y: 1 });
    expect(plan?.cost).toBe(6);
    expect(runner.getKnowledge()?.metrics.replanCount).toBe(1);
    expect(runner.getEnvironment()?.robot.position).toEqual({ x: 3, y: 1 });
  });

  it("debe aprovechar un atajo cuando se retira un obstáculo", async () => {
    const runner = createRunner(1, [{ x: 6, y: 1 }]);
    runner.submit(toggle({ x: 4, y: 1 }));
    runner.submit(addOrder({ x: 6, y: 1 }));
    await runTicks(runner, 2);
    expect(runner.getKnowledge()?.plan?.cost).toBe(7);

    runner.submit(toggle({ x: 4, y: 1 }));
    const report = await runner.tick();

    expect(report?.decision).toBe(AdaptationDecision.REPLAN);
    expect(runner.getKnowledge()?.plan?.cost).toBe(4);
    expect(runner.getEnvironment()?.robot.position).toEqual({ x: 3, y: 1 });
  });

  it("debe atascarse con el destino encerrado y reanudar al abrirse", async () => {
    const runner = createRunner(1, [{ x: 6, y: 1 }]);
    runner.submit(addOrder({ x: 6, y: 1 }));
    await runner.tick();
    for (const cell of [{ x: 6, y: 0 }, { x: 7, y: 1 }, { x: 6, y: 2 }, { x: 5, y: 1 }]) {
      runner.submit(toggle(cell));
    }

    expect((await runner.tick())?.decision).toBe(AdaptationDecision.ENTER_STUCK);
    expect(runner.getKnowledge()?.missionState).toBe(MissionState.STUCK);
    expect(runner.getKnowledge()?.stuckFrom).toBe(MissionState.ACTIVE);

    expect((await runner.tick())?.decision).toBe(AdaptationDecision.NO_ACTION);

    runner.submit(toggle({ x: 5, y: 1 }));
    expect((await runner.tick())?.decision).toBe(AdaptationDecision.RESUME);
    expect(runner.getKnowledge()?.missionState).toBe(MissionState.ACTIVE);
    expect(runner.getKnowledge()?.stuckFrom).toBeNull();
    expect(runner.getEnvironment()?.robot.position).toEqual({ x: 2, y: 1 });
  });

  it("debe atascarse al volver con la base encerrada y reanudar el regreso", async () => {
    const runner = createRunner(1, [{ x: 6, y: 1 }]);
    runner.submit(addOrder({ x: 6, y: 1 }));
    const reports = await runTicks(runner, 7);
    expect(reports[5]?.deliveredOrderIds).toEqual(["ORD_001"]);
    expect(reports[6]?.decision).toBe(AdaptationDecision.BEGIN_RETURN);
    expect(runner.getKnowledge()?.missionState).toBe(MissionState.RETURNING);
    expect(runner.getEnvironment()?.robot.position).toEqual({ x: 5, y: 1 });

    for (const cell of [{ x: 2, y: 0 }, { x: 2, y: 1 }, { x: 0, y: 2 }, { x: 1, y: 2 }]) {
      runner.submit(toggle(cell));
    }

    expect((await runner.tick())?.decision).toBe(AdaptationDecision.ENTER_STUCK);
    expect(runner.getKnowledge()?.missionState).toBe(MissionState.STUCK);
    expect(runner.getKnowledge()?.stuckFrom).toBe(MissionState.RETURNING);
    expect((await runner.tick())?.decision).toBe(AdaptationDecision.NO_ACTION);

    runner.submit(toggle({ x: 2, y: 1 }));
    expect((await runner.tick())?.decision).toBe(AdaptationDecision.RESUME);
    expect(runner.getKnowledge()?.missionState).toBe(MissionState.RETURNING);
    expect(runner.getKnowledge()?.stuckFrom).toBeNull();
    expect(runner.getEnvironment()?.robot.position).toEqual({ x: 4, y: 1 });

    const rest = await runTicks(runner, 4);
    expect(rest[3]?.decision).toBe(AdaptationDecision.COMPLETE_MISSION);
    expect(runner.getKnowledge()?.missionState).toBe(MissionState.IDLE);
  });

  it("debe descartar un pedido del bus cuyo destino no es una casa", async () => {
    const container = createContainer({
      config: createTestConfig({ ROBOT_CAPACITY: "1" }),
      layout: createOpenLayout([{ x: 6, y: 1 }]),
    });
    const runner = container.get<MapeLoopRunner>(TYPES.MapeLoopRunner);
    const bus = container.get<MessageBus>(TYPES.MessageBus);
    runner.initialize();

    bus.publish("user.add_order", {
      tick: 0,
      timestamp: 0,
      orderId: "X1",
      destination: { x: 5, y: 5 },
    });
    bus.flush();

    expect(runner.getKnowledge()?.orders).toEqual([]);
    const reports = await runTicks(runner, 3);
    expect(reports.map((report) => report?.decision)).toEqual([
      AdaptationDecision.NO_ACTION,
      AdaptationDecision.NO_ACTION,
      AdaptationDecision.NO_ACTION,
    ]);
    expect(runner.getKnowledge()?.missionState).toBe(MissionState.IDLE);
  });

  it("dispose debe desconectar todos los componentes del bus", () => {
    const container = createContainer({
      config: createTestConfig(),
      layout: createOpenLayout([{ x: 6, y: 1 }]),
    });
    const runner = container.get<MapeLoopRunner>(TYPES.MapeLoopRunner);
    const bus = container.get<MessageBus>(TYPES.MessageBus);
    runner.initialize();
    expect(bus.getStats().handlerCounts["monitor.request"]).toBeGreaterThan(0);

    runner.dispose();

    expect(Object.values(bus.getStats().handlerCounts).every((count) => count === 0)).toBe(true);
    expect(() => runner.submit(addOrder({ x: 6, y: 1 }))).toThrow(
      "Mission loop is not initialized",
    );
  });

  it("debe iniciar la misión al llenar la capacidad", async () => {
    const runner = createRunner(3, [{ x: 6, y: 1 }, { x: 10, y: 3 }, { x: 15, y: 10 }]);
    runner.submit(addOrder({ x: 6, y: 1 }));
    runner.submit(addOrder({ x: 10, y: 3 }));
    runner.submit(addOrder({ x: 15, y: 10 }));

    const report = await runner.tick();

    expect(report?.decision).toBe(AdaptationDecision.START_MISSION);
    expect(runner.getEnvironment()?.robot.carried).toHaveLength(3);
  });

  it("debe iniciar la misión al vencer la ventana de recogida", async () => {
    setupFakeTimers(0);
    const runner = createRunner(3, [{ x: 6, y: 1 }]);
    runner.submit(addOrder({ x: 6, y: 1 }));

    expect((await runner.tick())?.decision).toBe(AdaptationDecision.NO_ACTION);
    expect(runner.getView().countdownSeconds).toBe(30);

    setupFakeTimers(30000);
    expect((await runner.tick())?.decision).toBe(AdaptationDecision.START_MISSION);
  });

  it("un reset en cola debe descartar los comandos anteriores", async () => {
    const runner = createRunner(2, [{ x: 10, y: 3 }, { x: 15, y: 10 }]);

    const pending = runner.tick();
    expect(runner.submit(addOrder({ x: 10, y: 3 }))).toEqual({
      type: MissionCommandType.ADD_ORDER,
      applied: false,
      orderId: "ORD_001",
    });
    runner.submit({ type: MissionCommandType.RESET });
    expect(runner.submit(addOrder({ x: 15, y: 10 })).orderId).toBe("ORD_001");
    await pending;

    await runner.tick();

    expect(runner.getKnowledge()?.orders.map((order) => [order.id, order.destination])).toEqual([
      ["ORD_001", { x: 15, y: 10 }],
    ]);
    expect(runner.getStats().droppedCommands).toBe(1);
  });

  it("debe omitir un disparo mientras un tick sigue en curso", async () => {
    const runner = createRunner(2, [{ x: 6, y: 1 }]);

    const first = runner.tick();
    expect(await runner.tick()).toBeNull();
    await first;

    expect(runner.getStats().skipped).toBe(1);
    expect(runner.getStats().ticks).toBe(1);
  });

  it("debe volver al estado inicial tras un reset", async () => {
    const runner = createRunner(1, [{ x: 6, y: 1 }]);
    runner.submit(addOrder({ x: 6, y: 1 }));
    runner.submit(toggle({ x: 5, y: 5 }));
    await runTicks(runner, 3);

    runner.submit({ type: MissionCommandType.RESET });

    const view = runner.getView();
    expect(view.missionState).toBe(MissionState.IDLE);
    expect(view.orders).toEqual([]);
    expect(view.grid.dynamicObstacles).toEqual([]);
    expect(view.robot?.position).toEqual({ x: 1, y: 1 });
    expect(view.metrics.totalDistance).toBe(0);
    expect(view.lastDecision).toBeNull();
  });

  it("la carga nunca debe superar la capacidad", async () => {
    RandomUtils.seed("capacity-invariant");
    const houses = [{ x: 6, y: 1 }, { x: 10, y: 3 }, { x: 15, y: 10 }, { x: 4, y: 12 }];
    const runner = createRunner(2, houses);

    for (let i = 0; i < 150; i++) {
      if (RandomUtils.chance(0.3)) {
        const house = RandomUtils.element(houses);
        if (house) runner.submit(addOrder(house));
      }
      if (RandomUtils.chance(0.2)) {
        try {
          runner.submit(toggle({ x: RandomUtils.intRange(0, 21), y: RandomUtils.intRange(0, 14) }));
        } catch (error) {
          if (!isMissionError(error)) throw error;
        }
      }
      expect(await runner.tick()).not.toBeNull();

      const carried = runner.getEnvironment()?.robot.carried ?? [];
      expect(carried.length).toBeLessThanOrEqual(2);
      expect(runner.getKnowledge()?.carried.length ?? 0).toBeLessThanOrEqual(2);
    }
  });
});
