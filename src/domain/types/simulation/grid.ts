import type { RobotStatus } from "../../../shared/constants/MissionEnums";
import type { TerrainKind } from "../../../shared/constants/GridEnums";
import type { DeepReadonly } from "../../../shared/types/utils";

/**
 * Grid cell address. `x` is the column, `y` the row, origin top-left.
 */
export interface Coordinate {
  x: number;
  y: number;
}

/**
 * Immutable part of a world: dimensions, base and houses, plus the static
 * obstacle set.
 */
export interface GridLayout {
  width: number;
  height: number;
  base: Coordinate;
  houses: Coordinate[];
  staticObstacles: Coordinate[];
}

export interface RobotState {
  position: Coordinate;
  /** Order ids on board */
  carried: string[];
  capacity: number;
  status: RobotStatus;
}

/**
 * Minimal read surface the pathfinder needs.
 */
export interface PassabilityGrid {
  readonly width: number;
  readonly height: number;
  isPassable(cell: Coordinate): boolean;
}

/**
 * Read surface shared by the live world and snapshot views.
 */
export interface TerrainGrid extends PassabilityGrid {
  inBounds(cell: Coordinate): boolean;
  terrainAt(cell: Coordinate): TerrainKind | null;
}

export interface EnvironmentState {
  width: number;
  height: number;
  base: Coordinate;
  baseFootprint: Coordinate[];
  houses: Coordinate[];
  staticObstacles: Coordinate[];
  dynamicObstacles: Coordinate[];
  /** Houses with at least one outstanding order */
  orderMarkers: Coordinate[];
  robot: RobotState;
  revision: number;
}

export type EnvironmentSnapshot = DeepReadonly<EnvironmentState>;
