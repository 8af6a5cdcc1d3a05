import { MissionCommandType } from "../../constants/CommandEnums";
import type { LegKind, TerrainKind } from "../../constants/GridEnums";
import type {
  AdaptationDecision,
  ExecuteOutcome,
  MissionState,
  RobotStatus,
} from "../../constants/MissionEnums";
import { ValidationError } from "../../errors";
import { isRecord } from "../utils";
import type { Coordinate } from "../../../domain/types/simulation/grid";
import type {
  MissionMetrics,
  OrderSnapshot,
} from "../../../domain/types/simulation/knowledge";

export interface AddOrderCommand {
  type: MissionCommandType.ADD_ORDER;
  destination: Coordinate;
}

export interface ToggleObstacleCommand {
  type: MissionCommandType.TOGGLE_OBSTACLE;
  cell: Coordinate;
}

export interface ResetCommand {
  type: MissionCommandType.RESET;
}

export type MissionCommand =
  | AddOrderCommand
  | ToggleObstacleCommand
  | ResetCommand;

/**
 * What the runner answers when it accepts a command.
 */
export interface CommandReceipt {
  type: MissionCommandType;
  /** Applied right away, or buffered until the running tick ends */
  applied: boolean;
  orderId?: string;
  terrain?: TerrainKind;
}

function readCell(raw: Record<string, unknown>): Coordinate {
  const source = isRecord(raw.payload) ? raw.payload : raw;
  const { x, y } = source;
  if (
    typeof x !== "number" ||
    typeof y !== "number" ||
    !Number.isInteger(x) ||
    !Number.isInteger(y)
  ) {
    throw new ValidationError("Cell must be integer x and y");
  }
  return { x, y };
}

/**
 * Reads a client command. Cells may be given inline or under `payload`.
 *
 * @throws ValidationError on unknown types or malformed cells
 */
export function parseMissionCommand(raw: unknown): MissionCommand {
  if (!isRecord(raw)) {
    throw new ValidationError("Command must be an object");
  }
  switch (raw.type) {
    case MissionCommandType.ADD_ORDER:
      return { type: MissionCommandType.ADD_ORDER, destination: readCell(raw) };
    case MissionCommandType.TOGGLE_OBSTACLE:
      return { type: MissionCommandType.TOGGLE_OBSTACLE, cell: readCell(raw) };
    case MissionCommandType.RESET:
      return { type: MissionCommandType.RESET };
    default:
      throw new ValidationError(`Unknown command type: ${String(raw.type)}`);
  }
}

// ============================================================================
// DASHBOARD VIEW
// ============================================================================

export interface SequenceMarker {
  house: Coordinate;
  /** 1-based position among undelivered plan destinations */
  position: number;
  orderIds: string[];
}

export interface DashboardView {
  tick: number;
  updatedAt: number;
  grid: {
    width: number;
    height: number;
    base: Coordinate;
    baseFootprint: Coordinate[];
    houses: Coordinate[];
    staticObstacles: Coordinate[];
    dynamicObstacles: Coordinate[];
  };
  robot: {
    position: Coordinate;
    status: RobotStatus;
    carried: string[];
    capacity: number;
  } | null;
  orders: readonly OrderSnapshot[];
  orderMarkers: Coordinate[];
  plan: {
    destinations: string[];
    path: Coordinate[];
    legs: Array<{ kind: LegKind; startIndex: number; endIndex: number }>;
    cost: number;
    planIndex: number;
  } | null;
  sequence: SequenceMarker[];
  missionState: MissionState;
  stuckFrom: MissionState | null;
  /** Seconds until the collection window forces a start, only while collecting */
  countdownSeconds: number | null;
  metrics: MissionMetrics;
  lastDecision: {
    tick: number;
    decision: AdaptationDecision;
    outcome: ExecuteOutcome;
  } | null;
}
