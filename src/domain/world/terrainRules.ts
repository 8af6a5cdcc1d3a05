/**
 * Cell rules shared by the live world and read-only snapshot views.
 *
 * @module domain/world/terrainRules
 */

import { TerrainKind } from "../../shared/constants/GridEnums";
import { InvalidCellError } from "../../shared/errors";
import { samePoint } from "../../shared/utils/mathUtils";
import type { Coordinate, TerrainGrid } from "../types/simulation/grid";

/**
 * The 2x2 base region: the base cell plus its neighbours up and to the left,
 * shifted inward when the base sits on the top or left edge.
 */
export function baseFootprint(base: Coordinate): Coordinate[] {
  const x0 = base.x > 0 ? base.x - 1 : base.x;
  const y0 = base.y > 0 ? base.y - 1 : base.y;
  return [
    { x: x0, y: y0 },
    { x: x0 + 1, y: y0 },
    { x: x0, y: y0 + 1 },
    { x: x0 + 1, y: y0 + 1 },
  ];
}

export function isObstacle(terrain: TerrainKind | null): boolean {
  return (
    terrain === TerrainKind.STATIC_OBSTACLE ||
    terrain === TerrainKind.DYNAMIC_OBSTACLE
  );
}

/**
 * Throws InvalidCellError when a dynamic obstacle may not be toggled on the
 * cell. Removing an existing dynamic obstacle is always allowed.
 */
export function assertToggleAllowed(
  grid: TerrainGrid,
  robotPosition: Coordinate,
  cell: Coordinate,
): void {
  if (!grid.inBounds(cell)) {
    throw new InvalidCellError(cell, "outside the grid");
  }

  const terrain = grid.terrainAt(cell);
  if (terrain === TerrainKind.DYNAMIC_OBSTACLE) {
    return;
  }
  if (samePoint(cell, robotPosition)) {
    throw new InvalidCellError(cell, "occupied by the robot");
  }
  switch (terrain) {
    case TerrainKind.BASE:
      throw new InvalidCellError(cell, "part of the base");
    case TerrainKind.HOUSE:
      throw new InvalidCellError(cell, "a delivery house");
    case TerrainKind.STATIC_OBSTACLE:
      throw new InvalidCellError(cell, "a static obstacle");
    default:
      return;
  }
}

/**
 * Terrain a cell holds after a permitted toggle.
 */
export function toggledTerrain(current: TerrainKind | null): TerrainKind {
  return current === TerrainKind.DYNAMIC_OBSTACLE
    ? TerrainKind.ROAD
    : TerrainKind.DYNAMIC_OBSTACLE;
}
