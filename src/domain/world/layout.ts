/**
 * Grid layout loading.
 *
 * The default neighbourhood (houses and static obstacles) ships as JSON; the
 * configured grid size and base override it, and anything the override
 * pushes out of bounds or onto the base is dropped with a warning.
 *
 * @module domain/world/layout
 */

import defaultLayoutJson from "../data/defaultLayout.json";
import { logger } from "../../infrastructure/utils/logger";
import { LogCategory } from "../../shared/constants/LogEnums";
import { ValidationError } from "../../shared/errors";
import { isRecord } from "../../shared/types/utils";
import { pointKey } from "../../shared/utils/mathUtils";
import type { Coordinate, GridLayout } from "../types/simulation/grid";
import { baseFootprint } from "./terrainRules";

function isCoordinate(value: unknown): value is Coordinate {
  return (
    isRecord(value) &&
    Number.isInteger(value.x) &&
    Number.isInteger(value.y)
  );
}

function readCoordinateList(value: unknown, field: string): Coordinate[] {
  if (!Array.isArray(value) || !value.every(isCoordinate)) {
    throw new ValidationError(`Layout field "${field}" must be a list of {x, y} cells`);
  }
  return value.map((cell) => ({ x: cell.x, y: cell.y }));
}

/**
 * Validates untrusted layout data.
 */
export function parseGridLayout(raw: unknown): GridLayout {
  if (!isRecord(raw)) {
    throw new ValidationError("Layout must be an object");
  }
  const { width, height, base } = raw;
  if (
    typeof width !== "number" ||
    typeof height !== "number" ||
    !Number.isInteger(width) ||
    !Number.isInteger(height) ||
    width < 2 ||
    height < 2
  ) {
    throw new ValidationError("Layout width and height must be integers >= 2");
  }
  if (!isCoordinate(base)) {
    throw new ValidationError("Layout base must be an {x, y} cell");
  }
  return {
    width,
    height,
    base: { x: base.x, y: base.y },
    houses: readCoordinateList(raw.houses, "houses"),
    staticObstacles: readCoordinateList(raw.staticObstacles, "staticObstacles"),
  };
}

export const DEFAULT_LAYOUT: GridLayout = parseGridLayout(defaultLayoutJson);

/**
 * Fits a layout to the configured dimensions and base.
 */
export function fitLayout(
  layout: GridLayout,
  dimensions: { width: number; height: number; base: Coordinate },
): GridLayout {
  const { width, height, base } = dimensions;
  const reserved = new Set(baseFootprint(base).map(pointKey));
  const fits = (cell: Coordinate): boolean =>
    cell.x >= 0 &&
    cell.y >= 0 &&
    cell.x < width &&
    cell.y < height &&
    !reserved.has(pointKey(cell));

  const staticObstacles = layout.staticObstacles.filter(fits);
  const blocked = new Set(staticObstacles.map(pointKey));
  const houses = layout.houses.filter(
    (cell) => fits(cell) && !blocked.has(pointKey(cell)),
  );

  const dropped =
    layout.houses.length -
    houses.length +
    (layout.staticObstacles.length - staticObstacles.length);
  if (dropped > 0) {
    logger.warn(
      `🗺️ Layout: dropped ${dropped} cell(s) that do not fit a ${width}x${height} grid with base (${base.x},${base.y})`,
      LogCategory.ENVIRONMENT,
    );
  }

  return { width, height, base: { ...base }, houses, staticObstacles };
}
