/**
 * Levels and categories accepted by the logger and by `GET /api/logs`.
 *
 * @module shared/constants/LogEnums
 */

export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
}

/** Component that wrote the entry; one per loop stage plus plumbing. */
export enum LogCategory {
  /** Loop runner and tick pacing */
  LOOP = "loop",
  /** Monitor stage */
  MONITOR = "monitor",
  /** Analyze stage */
  ANALYZE = "analyze",
  /** Plan stage and pathfinding */
  PLAN = "plan",
  /** Execute stage and mission lifecycle */
  EXECUTE = "execute",
  /** Knowledge store */
  KNOWLEDGE = "knowledge",
  /** Grid world and robot model */
  ENVIRONMENT = "environment",
  /** Message bus */
  BUS = "bus",
  /** HTTP and WebSocket transport */
  TRANSPORT = "transport",
  /** General/uncategorized logs */
  GENERAL = "general",
}
