import { describe, it, expect, beforeEach } from "vitest";
import { GridWorld } from "../../src/domain/world/GridWorld";
import { Direction, TerrainKind } from "../../src/shared/constants/GridEnums";
import { RobotStatus } from "../../src/shared/constants/MissionEnums";
import {
  BlockedError,
  CapacityExceededError,
  InvalidCellError,
  ValidationError,
} from "../../src/shared/errors";
import { createOpenLayout } from "../setup";

describe("GridWorld", () => {
  let world: GridWorld;

  beforeEach(() => {
    world = new GridWorld(
      createOpenLayout([{ x: 3, y: 1 }, { x: 10, y: 3 }], [{ x: 5, y: 5 }]),
      2,
    );
  });

  describe("terrainAt", () => {
    it("debe clasificar cada celda", () => {
      expect(world.terrainAt({ x: 0, y: 0 })).toBe(TerrainKind.BASE);
      expect(world.terrainAt({ x: 1, y: 1 })).toBe(TerrainKind.BASE);
      expect(world.terrainAt({ x: 10, y: 3 })).toBe(TerrainKind.HOUSE);
      expect(world.terrainAt({ x: 5, y: 5 })).toBe(TerrainKind.STATIC_OBSTACLE);
      expect(world.terrainAt({ x: 7, y: 7 })).toBe(TerrainKind.ROAD);
      expect(world.terrainAt({ x: 22, y: 0 })).toBeNull();
    });

    it("debe rechazar casas sobre obstáculos", () => {
      expect(
        () => new GridWorld(createOpenLayout([{ x: 5, y: 5 }], [{ x: 5, y: 5 }]), 2),
      ).toThrow(
        "Invalid grid layout: house (5,5) is outside the grid, on the base or on an obstacle",
      );
    });
  });

  describe("toggleObstacle", () => {
    it("debe alternar un obstáculo dinámico", () => {
      expect(world.toggleObstacle({ x: 7, y: 7 })).toBe(TerrainKind.DYNAMIC_OBSTACLE);
      expect(world.isPassable({ x: 7, y: 7 })).toBe(false);
      expect(world.toggleObstacle({ x: 7, y: 7 })).toBe(TerrainKind.ROAD);
      expect(world.isPassable({ x: 7, y: 7 })).toBe(true);
    });

    it("debe proteger casas, base, robot, obstáculos estáticos y bordes", () => {
      expect(() => world.toggleObstacle({ x: 10, y: 3 })).toThrow(
        "Invalid cell (10,3): a delivery house",
      );
      expect(() => world.toggleObstacle({ x: 0, y: 0 })).toThrow(
        "Invalid cell (0,0): part of the base",
      );
      expect(() => world.toggleObstacle({ x: 1, y: 1 })).toThrow(
        "Invalid cell (1,1): occupied by the robot",
      );
      expect(() => world.toggleObstacle({ x: 5, y: 5 })).toThrow(
        "Invalid cell (5,5): a static obstacle",
      );
      expect(() => world.toggleObstacle({ x: -1, y: 0 })).toThrow(InvalidCellError);
    });
  });

  describe("moveRobotOneStep", () => {
    it("debe mover el robot y marcarlo en movimiento", () => {
      const robot = world.moveRobotOneStep(Direction.RIGHT);

      expect(robot.position).toEqual({ x: 2, y: 1 });
      expect(robot.status).toBe(RobotStatus.MOVING);
    });

    it("debe lanzar BlockedError sin mover el robot", () => {
      world.toggleObstacle({ x: 2, y: 1 });

      expect(() => world.moveRobotOneStep(Direction.RIGHT)).toThrow(BlockedError);
      expect(world.getRobot().position).toEqual({ x: 1, y: 1 });
    });

    it("debe bloquear la salida de la rejilla", () => {
      world.moveRobotOneStep(Direction.UP);

      expect(() => world.moveRobotOneStep(Direction.UP)).toThrow(
        "Move from (1,0) to (1,-1) is blocked",
      );
    });
  });

  describe("loadOrders", () => {
    it("debe cargar pedidos conocidos", () => {
      world.markOrderLocation("ORD_001", { x: 10, y: 3 });

      expect(world.loadOrders(["ORD_001"]).carried).toEqual(["ORD_001"]);
    });

    it("debe rechazar todo si se supera la capacidad", () => {
      world.markOrderLocation("ORD_001", { x: 10, y: 3 });
      world.markOrderLocation("ORD_002", { x: 10, y: 3 });
      world.markOrderLocation("ORD_003", { x: 3, y: 1 });

      expect(() => world.loadOrders(["ORD_001", "ORD_002", "ORD_003"])).toThrow(
        "Loading 3 order(s) would exceed capacity 2",
      );
      expect(() => world.loadOrders(["ORD_001", "ORD_002", "ORD_003"])).toThrow(
        CapacityExceededError,
      );
      expect(world.getRobot().carried).toEqual([]);
    });

    it("debe rechazar pedidos desconocidos", () => {
      expect(() => world.loadOrders(["ORD_404"])).toThrow("Unknown orders: ORD_404");
    });

    it("debe rechazar destinos que no son casas", () => {
      expect(() => world.markOrderLocation("ORD_001", { x: 7, y: 7 })).toThrow(
        ValidationError,
      );
    });
  });

  describe("deliverOrder", () => {
    beforeEach(() => {
      world.markOrderLocation("ORD_001", { x: 3, y: 1 });
      world.loadOrders(["ORD_001"]);
    });

    it("debe rechazar la entrega fuera de la casa", () => {
      expect(() => world.deliverOrder("ORD_001")).toThrow(
        "Order ORD_001 belongs to (3,1), robot is at (1,1)",
      );
    });

    it("debe entregar en la casa destino", () => {
      world.moveRobotOneStep(Direction.RIGHT);
      world.moveRobotOneStep(Direction.RIGHT);

      expect(world.deliverOrder("ORD_001").carried).toEqual([]);
      expect(world.snapshot().orderMarkers).toEqual([]);
    });
  });

  describe("snapshot", () => {
    it("debe congelar la copia y agrupar marcadores por casa", () => {
      world.markOrderLocation("ORD_001", { x: 10, y: 3 });
      world.markOrderLocation("ORD_002", { x: 10, y: 3 });
      const snapshot = world.snapshot();

      expect(snapshot.orderMarkers).toEqual([{ x: 10, y: 3 }]);
      expect(snapshot.baseFootprint).toHaveLength(4);
      expect(Object.isFrozen(snapshot.robot.position)).toBe(true);
    });

    it("debe aumentar la revisión con cada cambio", () => {
      const before = world.snapshot().revision;
      world.toggleObstacle({ x: 7, y: 7 });
      world.setRobotStatus(RobotStatus.STUCK);
      world.setRobotStatus(RobotStatus.STUCK);

      expect(world.snapshot().revision).toBe(before + 2);
    });
  });

  describe("reset", () => {
    it("debe restaurar el estado inicial", () => {
      world.toggleObstacle({ x: 7, y: 7 });
      world.markOrderLocation("ORD_001", { x: 10, y: 3 });
      world.loadOrders(["ORD_001"]);
      world.moveRobotOneStep(Direction.RIGHT);

      world.reset();
      const snapshot = world.snapshot();

      expect(snapshot.dynamicObstacles).toEqual([]);
      expect(snapshot.orderMarkers).toEqual([]);
      expect(snapshot.robot).toEqual({
        position: { x: 1, y: 1 },
        carried: [],
        capacity: 2,
        status: RobotStatus.IDLE,
      });
    });
  });
});
