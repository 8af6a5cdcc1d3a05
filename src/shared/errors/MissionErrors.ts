/**
 * Error taxonomy of the mission core.
 *
 * None of these is fatal to the process: NoPathError becomes Stuck state,
 * BlockedError is recovered by the next planning cycle, and the validation
 * errors are rejected at the boundary with state unchanged.
 *
 * @module shared/errors/MissionErrors
 */

type Point = { x: number; y: number };

export type MissionErrorCode =
  | "VALIDATION_ERROR"
  | "BLOCKED"
  | "NO_PATH"
  | "INVALID_CELL";

export class MissionError extends Error {
  name = "MissionError";

  constructor(
    message: string,
    public readonly code: MissionErrorCode,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
  }
}

/**
 * Malformed Knowledge patch or user input.
 */
export class ValidationError extends MissionError {
  name = "ValidationError";

  constructor(
    message: string,
    public readonly issues: string[] = [message],
  ) {
    super(message, "VALIDATION_ERROR", { issues });
  }
}

/**
 * Carried set would grow past the robot's capacity.
 */
export class CapacityExceededError extends ValidationError {
  name = "CapacityExceededError";

  constructor(
    public readonly requested: number,
    public readonly capacity: number,
  ) {
    super(`Loading ${requested} order(s) would exceed capacity ${capacity}`);
  }
}

/**
 * A single robot step into an impassable or out-of-bounds cell.
 */
export class BlockedError extends MissionError {
  name = "BlockedError";

  constructor(
    public readonly from: Point,
    public readonly target: Point,
  ) {
    super(
      `Move from (${from.x},${from.y}) to (${target.x},${target.y}) is blocked`,
      "BLOCKED",
      { from, target },
    );
  }
}

/**
 * No feasible route between two cells.
 */
export class NoPathError extends MissionError {
  name = "NoPathError";

  constructor(
    public readonly start: Point,
    public readonly goal: Point,
  ) {
    super(
      `No path from (${start.x},${start.y}) to (${goal.x},${goal.y})`,
      "NO_PATH",
      { start, goal },
    );
  }
}

/**
 * Illegal obstacle toggle or order destination.
 */
export class InvalidCellError extends MissionError {
  name = "InvalidCellError";

  constructor(
    public readonly cell: Point,
    public readonly reason: string,
  ) {
    super(`Invalid cell (${cell.x},${cell.y}): ${reason}`, "INVALID_CELL", {
      cell,
      reason,
    });
  }
}

export function isMissionError(error: unknown): error is MissionError {
  return error instanceof MissionError;
}
