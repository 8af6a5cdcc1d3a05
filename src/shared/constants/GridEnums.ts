/**
 * Grid terrain and movement enumerations.
 *
 * @module shared/constants/GridEnums
 */

/**
 * Terrain kinds a grid cell can hold.
 */
export enum TerrainKind {
  ROAD = "road",
  STATIC_OBSTACLE = "static_obstacle",
  DYNAMIC_OBSTACLE = "dynamic_obstacle",
  BASE = "base",
  HOUSE = "house",
}

/**
 * 4-connected movement directions.
 */
export enum Direction {
  UP = "up",
  DOWN = "down",
  LEFT = "left",
  RIGHT = "right",
}

/**
 * Tag of a contiguous path segment.
 */
export enum LegKind {
  DELIVERY = "delivery",
  RETURN = "return",
}
