import { inject, injectable } from "inversify";
import { TYPES } from "../../config/Types";
import {
  MapeLoopRunner,
  type LoopStats,
} from "../../domain/simulation/core/MapeLoopRunner";
import type { MissionMetrics } from "../../domain/types/simulation/knowledge";
import { MissionCommandType } from "../../shared/constants/CommandEnums";
import { HttpStatusCode } from "../../shared/constants/HttpStatusCodes";
import { LogCategory, LogLevel } from "../../shared/constants/LogEnums";
import { MissionState } from "../../shared/constants/MissionEnums";
import { ResponseStatus } from "../../shared/constants/ResponseEnums";
import { isMissionError } from "../../shared/errors";
import { parseMissionCommand } from "../../shared/types/commands/MissionCommand";
import { isEnumValue, isRecord } from "../../shared/types/utils";
import { logger, type LogFilter } from "../utils/logger";

/**
 * The slice of an express request the controller reads.
 */
export interface ControllerRequest {
  body?: unknown;
  query: Record<string, unknown>;
}

/**
 * The slice of an express response the controller writes.
 */
export interface ControllerResponse {
  status(code: number): ControllerResponse;
  json(body: unknown): unknown;
  type(contentType: string): unknown;
  send(body: string): unknown;
}

const LOG_QUERY_LIMITS = {
  DEFAULT: 200,
  MAX: 2000,
} as const;

function readList<T extends Record<string, string>>(
  enumObject: T,
  raw: unknown,
): Array<T[keyof T]> | undefined {
  if (typeof raw !== "string" || raw === "") {
    return undefined;
  }
  const values: Array<T[keyof T]> = [];
  for (const part of raw.split(",")) {
    const value = part.trim().toLowerCase();
    if (isEnumValue(enumObject, value)) {
      values.push(value);
    }
  }
  return values;
}

function readPositiveInt(raw: unknown): number | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const value = Number(raw);
  return Number.isInteger(value) && value >= 0 ? value : undefined;
}

/**
 * Reads `level`, `category`, `sinceTick`, `contains` and `limit` from a
 * query string. Unknown levels and categories are ignored.
 */
export function parseLogFilter(query: Record<string, unknown>): LogFilter {
  const limit = readPositiveInt(query.limit) ?? LOG_QUERY_LIMITS.DEFAULT;
  return {
    levels: readList(LogLevel, query.level),
    categories: readList(LogCategory, query.category),
    sinceTick: readPositiveInt(query.sinceTick),
    messageContains:
      typeof query.contains === "string" ? query.contains : undefined,
    limit: Math.min(Math.max(limit, 1), LOG_QUERY_LIMITS.MAX),
  };
}

/**
 * Prometheus text exposition (format 0.0.4) of mission and loop metrics.
 */
export function toPrometheus(
  metrics: MissionMetrics,
  stats: LoopStats,
  missionState: MissionState,
  tick: number,
): string {
  const lines: string[] = [];
  const gauge = (name: string, help: string, value: number): void => {
    lines.push(`# HELP ${name} ${help}`);
    lines.push(`# TYPE ${name} gauge`);
    lines.push(`${name} ${value}`);
  };
  const counter = (name: string, help: string, value: number): void => {
    lines.push(`# HELP ${name} ${help}`);
    lines.push(`# TYPE ${name} counter`);
    lines.push(`${name} ${value}`);
  };

  counter("mission_deliveries_total", "Orders delivered", metrics.totalDeliveries);
  counter("mission_distance_cells_total", "Cells travelled by the robot", metrics.totalDistance);
  counter("mission_replans_total", "Routes recomputed mid-mission", metrics.replanCount);
  gauge(
    "mission_average_delivery_seconds",
    "Mean time from order creation to delivery",
    metrics.averageDeliveryTime,
  );

  lines.push("# HELP mission_state Current mission state (1 for the active state)");
  lines.push("# TYPE mission_state gauge");
  for (const state of Object.values(MissionState)) {
    lines.push(`mission_state{state="${state}"} ${state === missionState ? 1 : 0}`);
  }

  gauge("loop_tick", "Last tick number", tick);
  counter("loop_ticks_total", "Completed ticks", stats.ticks);
  counter("loop_tick_timeouts_total", "Ticks that ended without a report", stats.timeouts);
  counter("loop_ticks_skipped_total", "Triggers skipped while a tick was running", stats.skipped);
  gauge("loop_tick_duration_ms", "Duration of the last tick", stats.lastTickMs);
  gauge("loop_tick_duration_avg_ms", "Mean tick duration", stats.avgTickMs);
  gauge("loop_buffered_commands", "User commands waiting for the next tick", stats.bufferedCommands);
  counter("loop_dropped_commands_total", "User commands discarded", stats.droppedCommands);

  return lines.join("\n") + "\n";
}

/**
 * HTTP surface of the mission loop.
 *
 * Commands go through `MapeLoopRunner.submit`, which validates them against
 * the latest environment sample; domain rejections answer 400, anything else
 * 500 with a logged entry.
 */
@injectable()
export class MissionController {
  constructor(
    @inject(TYPES.MapeLoopRunner) private readonly runner: MapeLoopRunner,
  ) {}

  health(_req: ControllerRequest, res: ControllerResponse): void {
    res.json({
      status: ResponseStatus.OK,
      tick: this.runner.getTickCounter(),
      tickInFlight: this.runner.isTickInFlight(),
    });
  }

  getState(_req: ControllerRequest, res: ControllerResponse): void {
    res.json(this.runner.getView());
  }

  getMetrics(_req: ControllerRequest, res: ControllerResponse): void {
    res.json(this.runner.getView().metrics);
  }

  addOrder(req: ControllerRequest, res: ControllerResponse): void {
    this.handleCommand(req, res, MissionCommandType.ADD_ORDER, HttpStatusCode.ACCEPTED);
  }

  toggleObstacle(req: ControllerRequest, res: ControllerResponse): void {
    this.handleCommand(req, res, MissionCommandType.TOGGLE_OBSTACLE, HttpStatusCode.OK);
  }

  reset(req: ControllerRequest, res: ControllerResponse): void {
    this.handleCommand(req, res, MissionCommandType.RESET, HttpStatusCode.ACCEPTED);
  }

  getLogs(req: ControllerRequest, res: ControllerResponse): void {
    const logs = logger.queryLogs(parseLogFilter(req.query));
    res.json({ logs, count: logs.length });
  }

  prometheus(_req: ControllerRequest, res: ControllerResponse): void {
    const view = this.runner.getView();
    res.type("text/plain; version=0.0.4; charset=utf-8");
    res.send(
      toPrometheus(
        view.metrics,
        this.runner.getStats(),
        view.missionState,
        view.tick,
      ),
    );
  }

  private handleCommand(
    req: ControllerRequest,
    res: ControllerResponse,
    type: MissionCommandType,
    successStatus: HttpStatusCode,
  ): void {
    try {
      const body = isRecord(req.body) ? req.body : {};
      const receipt = this.runner.submit(parseMissionCommand({ ...body, type }));
      res.status(successStatus).json({
        status: receipt.applied ? ResponseStatus.OK : ResponseStatus.QUEUED,
        ...(receipt.orderId !== undefined && { orderId: receipt.orderId }),
        ...(receipt.terrain !== undefined && { terrain: receipt.terrain }),
      });
    } catch (error) {
      if (isMissionError(error)) {
        logger.info(`Rejected ${type}: ${error.message}`, LogCategory.TRANSPORT);
        res.status(HttpStatusCode.BAD_REQUEST).json({
          status: ResponseStatus.ERROR,
          code: error.code,
          error: error.message,
        });
        return;
      }
      logger.error(`Failed to process ${type}`, LogCategory.TRANSPORT, {
        error: error instanceof Error ? error.message : String(error),
      });
      res
        .status(HttpStatusCode.INTERNAL_SERVER_ERROR)
        .json({ status: ResponseStatus.ERROR, error: "Failed to process command" });
    }
  }
}
