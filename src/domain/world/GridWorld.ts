/**
 * Grid and robot model.
 *
 * Holds cell occupancy, the robot's position and carried set, and the houses
 * with outstanding orders. Pure data plus mutators: no mission logic lives
 * here, callers decide when to move, load or deliver.
 *
 * @module domain/world/GridWorld
 */

import { Direction, TerrainKind } from "../../shared/constants/GridEnums";
import { RobotStatus } from "../../shared/constants/MissionEnums";
import {
  BlockedError,
  CapacityExceededError,
  ValidationError,
} from "../../shared/errors";
import { pointKey, samePoint, translate } from "../../shared/utils/mathUtils";
import { frozenClone } from "../../shared/utils/objectUtils";
import type {
  Coordinate,
  EnvironmentSnapshot,
  GridLayout,
  RobotState,
  TerrainGrid,
} from "../types/simulation/grid";
import {
  assertToggleAllowed,
  baseFootprint,
  isObstacle,
  toggledTerrain,
} from "./terrainRules";

export class GridWorld implements TerrainGrid {
  public readonly width: number;
  public readonly height: number;
  public readonly base: Coordinate;

  private readonly footprint: Coordinate[];
  private readonly baseCells = new Set<string>();
  private readonly houseCells = new Map<string, Coordinate>();
  private readonly staticCells = new Map<string, Coordinate>();
  private dynamicCells = new Map<string, Coordinate>();
  private orderLocations = new Map<string, Coordinate>();
  private robot: RobotState;
  private revision = 0;

  constructor(
    layout: GridLayout,
    private readonly capacity: number,
  ) {
    this.width = layout.width;
    this.height = layout.height;
    this.base = { ...layout.base };
    this.footprint = baseFootprint(layout.base);

    const issues: string[] = [];
    if (!this.inBounds(layout.base)) {
      issues.push(`base (${layout.base.x},${layout.base.y}) is outside the grid`);
    }
    for (const cell of this.footprint) {
      this.baseCells.add(pointKey(cell));
    }
    for (const cell of layout.staticObstacles) {
      if (!this.inBounds(cell) || this.baseCells.has(pointKey(cell))) {
        issues.push(`static obstacle (${cell.x},${cell.y}) is outside the grid or on the base`);
        continue;
      }
      this.staticCells.set(pointKey(cell), { ...cell });
    }
    for (const cell of layout.houses) {
      const key = pointKey(cell);
      if (
        !this.inBounds(cell) ||
        this.baseCells.has(key) ||
        this.staticCells.has(key)
      ) {
        issues.push(`house (${cell.x},${cell.y}) is outside the grid, on the base or on an obstacle`);
        continue;
      }
      this.houseCells.set(key, { ...cell });
    }
    if (issues.length > 0) {
      throw new ValidationError(`Invalid grid layout: ${issues[0]}`, issues);
    }

    this.robot = this.initialRobot();
  }

  private initialRobot(): RobotState {
    return {
      position: { ...this.base },
      carried: [],
      capacity: this.capacity,
      status: RobotStatus.IDLE,
    };
  }

  public inBounds(cell: Coordinate): boolean {
    return (
      Number.isInteger(cell.x) &&
      Number.isInteger(cell.y) &&
      cell.x >= 0 &&
      cell.y >= 0 &&
      cell.x < this.width &&
      cell.y < this.height
    );
  }

  public terrainAt(cell: Coordinate): TerrainKind | null {
    if (!this.inBounds(cell)) {
      return null;
    }
    const key = pointKey(cell);
    if (this.staticCells.has(key)) return TerrainKind.STATIC_OBSTACLE;
    if (this.dynamicCells.has(key)) return TerrainKind.DYNAMIC_OBSTACLE;
    if (this.baseCells.has(key)) return TerrainKind.BASE;
    if (this.houseCells.has(key)) return TerrainKind.HOUSE;
    return TerrainKind.ROAD;
  }

  public isPassable(cell: Coordinate): boolean {
    const terrain = this.terrainAt(cell);
    return terrain !== null && !isObstacle(terrain);
  }

  public isHouse(cell: Coordinate): boolean {
    return this.houseCells.has(pointKey(cell));
  }

  public getRobot(): RobotState {
    return {
      ...this.robot,
      position: { ...this.robot.position },
      carried: [...this.robot.carried],
    };
  }

  /**
   * Flips dynamic obstacle presence on a cell.
   * @returns the terrain the cell holds afterwards
   */
  public toggleObstacle(cell: Coordinate): TerrainKind {
    assertToggleAllowed(this, this.robot.position, cell);

    const next = toggledTerrain(this.terrainAt(cell));
    const key = pointKey(cell);
    if (next === TerrainKind.DYNAMIC_OBSTACLE) {
      this.dynamicCells.set(key, { x: cell.x, y: cell.y });
    } else {
      this.dynamicCells.delete(key);
    }
    this.revision++;
    return next;
  }

  public moveRobotOneStep(direction: Direction): RobotState {
    const from = this.robot.position;
    const target = translate(from, direction);
    if (!this.isPassable(target)) {
      throw new BlockedError(from, target);
    }
    this.robot.position = target;
    this.robot.status = RobotStatus.MOVING;
    this.revision++;
    return this.getRobot();
  }

  public setRobotStatus(status: RobotStatus): void {
    if (this.robot.status !== status) {
      this.robot.status = status;
      this.revision++;
    }
  }

  /**
   * Records where an order is headed so its house shows as pending.
   */
  public markOrderLocation(orderId: string, destination: Coordinate): void {
    if (!this.isHouse(destination)) {
      throw new ValidationError(
        `Order ${orderId} destination (${destination.x},${destination.y}) is not a house`,
      );
    }
    this.orderLocations.set(orderId, { x: destination.x, y: destination.y });
    this.revision++;
  }

  /**
   * Puts orders on board. All or nothing: fails without change when any id is
   * unknown or the carried set would exceed capacity.
   */
  public loadOrders(orderIds: readonly string[]): RobotState {
    const incoming = orderIds.filter((id) => !this.robot.carried.includes(id));
    const unknown = incoming.filter((id) => !this.orderLocations.has(id));
    if (unknown.length > 0) {
      throw new ValidationError(`Unknown orders: ${unknown.join(", ")}`);
    }
    if (this.robot.carried.length + incoming.length > this.capacity) {
      throw new CapacityExceededError(incoming.length, this.capacity);
    }
    this.robot.carried.push(...incoming);
    this.revision++;
    return this.getRobot();
  }

  /**
   * Drops an order at the robot's current cell.
   */
  public deliverOrder(orderId: string): RobotState {
    const destination = this.orderLocations.get(orderId);
    if (!this.robot.carried.includes(orderId) || !destination) {
      throw new ValidationError(`Order ${orderId} is not on board`);
    }
    if (!samePoint(destination, this.robot.position)) {
      throw new ValidationError(
        `Order ${orderId} belongs to (${destination.x},${destination.y}), robot is at (${this.robot.position.x},${this.robot.position.y})`,
      );
    }
    this.robot.carried = this.robot.carried.filter((id) => id !== orderId);
    this.orderLocations.delete(orderId);
    this.revision++;
    return this.getRobot();
  }

  /**
   * Restores the layout the world was created with: no dynamic obstacles,
   * no orders, robot empty at base.
   */
  public reset(): void {
    this.dynamicCells = new Map();
    this.orderLocations = new Map();
    this.robot = this.initialRobot();
    this.revision++;
  }

  public snapshot(): EnvironmentSnapshot {
    const markers = new Map<string, Coordinate>();
    for (const location of this.orderLocations.values()) {
      markers.set(pointKey(location), location);
    }

    return frozenClone({
      width: this.width,
      height: this.height,
      base: this.base,
      baseFootprint: this.footprint,
      houses: Array.from(this.houseCells.values()),
      staticObstacles: Array.from(this.staticCells.values()),
      dynamicObstacles: Array.from(this.dynamicCells.values()),
      orderMarkers: Array.from(markers.values()),
      robot: this.robot,
      revision: this.revision,
    });
  }
}
