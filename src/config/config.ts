import path from "path";
import { LogLevel } from "../shared/constants/LogEnums";
import { isEnumValue } from "../shared/types/utils";

/**
 * Application configuration loaded from environment variables.
 *
 * Grid, robot and loop settings are read once at startup and treated as
 * read-only inputs by the control loop.
 *
 * @module config
 */

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(
      `Invalid ${name}: expected an integer >= ${min}, received "${raw}"`,
    );
  }
  return value;
}

function readLogLevel(env: Env): LogLevel {
  const raw = env.LOG_LEVEL?.toLowerCase();
  if (raw === undefined || raw === "") {
    return LogLevel.INFO;
  }
  if (!isEnumValue(LogLevel, raw)) {
    throw new Error(
      `Invalid LOG_LEVEL "${env.LOG_LEVEL}". Expected one of: ${Object.values(LogLevel).join(", ")}`,
    );
  }
  return raw;
}

/**
 * Application configuration object.
 *
 * @property PORT - HTTP server port (default: 8080)
 * @property GRID - Grid dimensions and base coordinate
 * @property ROBOT - Carrying capacity and mission timeout
 * @property LOOP - Tick pacing and command buffering
 * @property LOG - Log threshold and optional JSONL directory
 */
export interface AppConfig {
  PORT: number;
  HOST: string;
  CORS_ORIGIN: string[] | "*";
  GRID: {
    WIDTH: number;
    HEIGHT: number;
    BASE: { x: number; y: number };
  };
  ROBOT: {
    CAPACITY: number;
    MISSION_TIMEOUT_MS: number;
  };
  LOOP: {
    TICK_INTERVAL_MS: number;
    TICK_TIMEOUT_MS: number;
    MAX_COMMAND_QUEUE: number;
  };
  LOG: {
    LEVEL: LogLevel;
    DIR: string | null;
  };
}

/**
 * Builds the configuration from an environment map, throwing on any value
 * that cannot be used.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const width = readInt(env, "GRID_WIDTH", 22, 2);
  const height = readInt(env, "GRID_HEIGHT", 15, 2);
  const base = {
    x: readInt(env, "BASE_X", 1),
    y: readInt(env, "BASE_Y", 1),
  };

  if (base.x >= width || base.y >= height) {
    throw new Error(
      `Base (${base.x},${base.y}) lies outside the ${width}x${height} grid`,
    );
  }

  return {
    PORT: readInt(env, "PORT", 8080),
    HOST: env.HOST || "0.0.0.0",
    CORS_ORIGIN: env.CORS_ORIGIN
      ? env.CORS_ORIGIN.split(",").map((origin) => origin.trim())
      : "*",
    GRID: { WIDTH: width, HEIGHT: height, BASE: base },
    ROBOT: {
      CAPACITY: readInt(env, "ROBOT_CAPACITY", 3, 1),
      MISSION_TIMEOUT_MS: readInt(env, "MISSION_TIMEOUT_MS", 30_000, 1),
    },
    LOOP: {
      TICK_INTERVAL_MS: readInt(env, "TICK_INTERVAL_MS", 400, 10),
      TICK_TIMEOUT_MS: readInt(env, "TICK_TIMEOUT_MS", 2000, 10),
      MAX_COMMAND_QUEUE: readInt(env, "MAX_COMMAND_QUEUE", 200, 1),
    },
    LOG: {
      LEVEL: readLogLevel(env),
      DIR: env.LOG_DIR ? path.resolve(env.LOG_DIR) : null,
    },
  };
}

export const CONFIG: Readonly<AppConfig> = Object.freeze(loadConfig());
