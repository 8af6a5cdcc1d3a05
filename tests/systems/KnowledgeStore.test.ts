import { describe, it, expect, beforeEach, vi } from "vitest";
import { KnowledgeStore } from "../../src/domain/simulation/systems/knowledge/KnowledgeStore";
import { MissionState, OrderStatus } from "../../src/shared/constants/MissionEnums";
import { InvalidCellError, ValidationError } from "../../src/shared/errors";

describe("KnowledgeStore", () => {
  let store: KnowledgeStore;

  beforeEach(() => {
    store = new KnowledgeStore();
    store.initialize({
      baseLocation: { x: 1, y: 1 },
      capacity: 2,
      missionTimeoutMs: 30000,
      houses: [{ x: 4, y: 4 }],
    });
  });

  it("debe devolver null antes de inicializar", () => {
    const fresh = new KnowledgeStore();

    expect(fresh.snapshot()).toBeNull();
    expect(fresh.isInitialized()).toBe(false);
    expect(() => fresh.applyUpdate({ planIndex: 0 })).toThrow("Knowledge is not initialized");
  });

  it("debe arrancar en Idle con revisión 0", () => {
    const snapshot = store.snapshot();

    expect(snapshot?.missionState).toBe(MissionState.IDLE);
    expect(snapshot?.revision).toBe(0);
    expect(snapshot?.orders).toEqual([]);
  });

  it("debe entregar instantáneas congeladas", () => {
    const snapshot = store.snapshot();

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot?.metrics)).toBe(true);
  });

  describe("applyUpdate", () => {
    it("debe aplicar campos y avanzar la revisión", () => {
      const change = store.applyUpdate({ missionState: MissionState.COLLECTING });

      expect(change.changed).toBe(true);
      expect(change.fields).toEqual(["missionState"]);
      expect(change.snapshot.revision).toBe(1);
    });

    it("debe ser idempotente", () => {
      store.applyUpdate({ missionState: MissionState.COLLECTING });
      const second = store.applyUpdate({ missionState: MissionState.COLLECTING });

      expect(second.changed).toBe(false);
      expect(second.fields).toEqual([]);
      expect(store.snapshot()?.revision).toBe(1);
    });

    it("debe rechazar la revisión y campos desconocidos", () => {
      try {
        store.applyUpdate({ revision: 9, speed: 3 });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        expect(error instanceof ValidationError && error.issues).toEqual([
          "revision: managed by the store",
          "speed: unknown field",
        ]);
      }
    });

    it("debe rechazar cargas por encima de la capacidad sin cambiar nada", () => {
      expect(() => store.applyUpdate({ carried: ["a", "b", "c"], planIndex: 0 })).toThrow(
        "Rejected knowledge patch: carried: 3 order(s) exceed capacity 2",
      );
      expect(store.snapshot()?.revision).toBe(0);
    });

    it("debe rechazar métricas que retroceden", () => {
      store.applyUpdate({
        metrics: { totalDeliveries: 2, totalDistance: 10, replanCount: 0, averageDeliveryTime: 4 },
      });

      expect(() =>
        store.applyUpdate({
          metrics: { totalDeliveries: 1, totalDistance: 10, replanCount: 0, averageDeliveryTime: 4 },
        }),
      ).toThrow("metrics: counters never decrease outside a reset");
    });

    it("debe rechazar tipos incorrectos", () => {
      expect(() => store.applyUpdate({ missionState: "flying" })).toThrow(
        "missionState: expected a mission state",
      );
      expect(() => store.applyUpdate("nope")).toThrow(
        "Knowledge patch must be an object of fields",
      );
    });

    it("debe rechazar un índice fuera del plan", () => {
      expect(() => store.applyUpdate({ planIndex: 1 })).toThrow(
        "planIndex: 1 is past the end of the plan",
      );
    });
  });

  describe("addOrder", () => {
    it("debe añadir un pedido pendiente", () => {
      const change = store.addOrder({ id: "ORD_001", destination: { x: 4, y: 4 }, createdAt: 100 });

      expect(change.snapshot.orders).toEqual([
        {
          id: "ORD_001",
          destination: { x: 4, y: 4 },
          status: OrderStatus.PENDING,
          createdAt: 100,
          loadedAt: null,
          deliveredAt: null,
        },
      ]);
    });

    it("debe rechazar identificadores repetidos", () => {
      store.addOrder({ id: "ORD_001", destination: { x: 4, y: 4 }, createdAt: 100 });

      expect(() =>
        store.addOrder({ id: "ORD_001", destination: { x: 4, y: 4 }, createdAt: 200 }),
      ).toThrow("Order ORD_001 already exists");
    });

    it("debe rechazar un destino que no es una casa sin tocar el estado", () => {
      const before = store.snapshot();

      expect(() =>
        store.addOrder({ id: "ORD_001", destination: { x: 5, y: 5 }, createdAt: 100 }),
      ).toThrow(InvalidCellError);
      expect(() =>
        store.addOrder({ id: "ORD_001", destination: { x: 5, y: 5 }, createdAt: 100 }),
      ).toThrow("Invalid cell (5,5): not a delivery house");
      expect(store.snapshot()).toBe(before);
    });
  });

  it("reset debe restaurar el estado inicial con una revisión nueva", () => {
    store.addOrder({ id: "ORD_001", destination: { x: 4, y: 4 }, createdAt: 100 });
    store.applyUpdate({
      metrics: { totalDeliveries: 1, totalDistance: 5, replanCount: 1, averageDeliveryTime: 2 },
    });

    const snapshot = store.reset();

    expect(snapshot.orders).toEqual([]);
    expect(snapshot.metrics.totalDeliveries).toBe(0);
    expect(snapshot.revision).toBe(3);
  });

  it("debe notificar a los suscriptores", () => {
    const listener = vi.fn();
    const unsubscribe = store.subscribe(listener);

    store.applyUpdate({ missionState: MissionState.COLLECTING });
    unsubscribe();
    store.applyUpdate({ missionState: MissionState.IDLE });

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0][0].fields).toEqual(["missionState"]);
  });
});
