import { TerrainKind } from "../../shared/constants/GridEnums";
import { pointKey } from "../../shared/utils/mathUtils";
import type {
  Coordinate,
  EnvironmentSnapshot,
  TerrainGrid,
} from "../types/simulation/grid";
import { isObstacle } from "./terrainRules";

/**
 * Read-only terrain lookup over an environment snapshot. Used by the loop
 * stages, which never hold the live world.
 */
export class GridView implements TerrainGrid {
  public readonly width: number;
  public readonly height: number;
  private readonly terrain = new Map<string, TerrainKind>();

  constructor(snapshot: EnvironmentSnapshot) {
    this.width = snapshot.width;
    this.height = snapshot.height;

    for (const cell of snapshot.baseFootprint) {
      this.terrain.set(pointKey(cell), TerrainKind.BASE);
    }
    for (const cell of snapshot.houses) {
      this.terrain.set(pointKey(cell), TerrainKind.HOUSE);
    }
    for (const cell of snapshot.dynamicObstacles) {
      this.terrain.set(pointKey(cell), TerrainKind.DYNAMIC_OBSTACLE);
    }
    for (const cell of snapshot.staticObstacles) {
      this.terrain.set(pointKey(cell), TerrainKind.STATIC_OBSTACLE);
    }
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
    return this.terrain.get(pointKey(cell)) ?? TerrainKind.ROAD;
  }

  public isPassable(cell: Coordinate): boolean {
    const terrain = this.terrainAt(cell);
    return terrain !== null && !isObstacle(terrain);
  }
}
