/* eslint-disable no-console */
import * as fs from "fs";
import * as path from "path";
import { RandomUtils } from "@/shared/utils/RandomUtils";
import { isEnumValue } from "@/shared/types/utils";

/**
 * Logging utility for the mission backend.
 *
 * Features:
 * - Console output with colored levels, filtered by LOG_LEVEL
 * - Bounded memory buffer queried by the logs endpoint
 * - Category-based logging per control loop stage
 * - Tick context so entries line up with loop iterations
 * - Throttling to prevent log spam
 * - Optional JSON Lines file sink when LOG_DIR is set
 */

import { LogLevel, LogCategory } from "../../shared/constants/LogEnums";

/**
 * Log entry with category and tick context.
 */
export interface LogEntry {
  /** Unique identifier for this log entry */
  id: string;
  /** Log severity level */
  level: LogLevel;
  /** Log category/subsystem */
  category: LogCategory;
  /** Human-readable message */
  message: string;
  /** ISO timestamp */
  timestamp: string;
  /** Unix timestamp for sorting/filtering */
  timestampMs: number;
  /** Loop tick when the entry was created */
  tick: number;
  /** Additional structured data */
  data?: unknown;
}

/**
 * Aggregated counters for analysis.
 */
interface LogMetrics {
  byLevel: Record<LogLevel, number>;
  byCategory: Record<LogCategory, number>;
  totalCount: number;
  droppedByThrottle: number;
}

/**
 * Filter options for log queries.
 */
export interface LogFilter {
  levels?: LogLevel[];
  categories?: LogCategory[];
  /** Inclusive lower bound on the loop tick */
  sinceTick?: number;
  /** Text search in message */
  messageContains?: string;
  /** Maximum results, newest kept */
  limit?: number;
}

interface LoggerConfig {
  level: LogLevel;
  console: boolean;
  maxMemoryLogs: number;
  logDir: string | null;
  throttleWindowMs: number;
  maxThrottleCount: number;
  writeIntervalMs: number;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

function parseLevel(raw: string | undefined): LogLevel {
  const value = raw?.toLowerCase();
  return isEnumValue(LogLevel, value) ? value : LogLevel.INFO;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: parseLevel(process.env.LOG_LEVEL),
  console: process.env.LOG_CONSOLE !== "false",
  maxMemoryLogs: Number(process.env.LOG_MAX_MEMORY ?? 2000),
  logDir: process.env.LOG_DIR ? path.resolve(process.env.LOG_DIR) : null,
  throttleWindowMs: Number(process.env.LOG_THROTTLE_WINDOW_MS ?? 5000),
  maxThrottleCount: Number(process.env.LOG_MAX_THROTTLE_COUNT ?? 5),
  writeIntervalMs: Number(process.env.LOG_WRITE_INTERVAL_MS ?? 5000),
};

function generateLogId(): string {
  return `${Date.now()}-${RandomUtils.float().toString(36).substring(2, 9)}`;
}

function getDateString(): string {
  return new Date().toISOString().split("T")[0];
}

function emptyLevelCounts(): Record<LogLevel, number> {
  return {
    [LogLevel.DEBUG]: 0,
    [LogLevel.INFO]: 0,
    [LogLevel.WARN]: 0,
    [LogLevel.ERROR]: 0,
  };
}

function emptyCategoryCounts(): Record<LogCategory, number> {
  return {
    [LogCategory.LOOP]: 0,
    [LogCategory.MONITOR]: 0,
    [LogCategory.ANALYZE]: 0,
    [LogCategory.PLAN]: 0,
    [LogCategory.EXECUTE]: 0,
    [LogCategory.KNOWLEDGE]: 0,
    [LogCategory.ENVIRONMENT]: 0,
    [LogCategory.BUS]: 0,
    [LogCategory.TRANSPORT]: 0,
    [LogCategory.GENERAL]: 0,
  };
}

/**
 * Logger class with memory buffering and an optional file sink.
 * Console: levels at or above the threshold, with colors
 * Memory: levels at or above the threshold, ring-buffered
 * Files: JSONL, rotated daily, only when a log directory is configured
 */
export class Logger {
  private config: LoggerConfig;
  private memoryBuffer: LogEntry[] = [];
  private pendingWrites: LogEntry[] = [];
  private throttleMap = new Map<string, { count: number; lastTime: number }>();
  private writeInterval?: NodeJS.Timeout;
  private writePromise: Promise<void> = Promise.resolve();
  private metrics: LogMetrics;
  private currentTick = 0;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.metrics = this.initMetrics();

    if (this.config.logDir) {
      this.ensureLogDir(this.config.logDir);
      this.writeInterval = setInterval(() => {
        this.scheduleWrite();
      }, this.config.writeIntervalMs);
      this.writeInterval.unref();
    }
  }

  private initMetrics(): LogMetrics {
    return {
      byLevel: emptyLevelCounts(),
      byCategory: emptyCategoryCounts(),
      totalCount: 0,
      droppedByThrottle: 0,
    };
  }

  private ensureLogDir(dir: string): void {
    try {
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    } catch (error) {
      console.warn(
        `Failed to create log directory ${dir}:`,
        error instanceof Error ? error.message : String(error),
      );
      this.config.logDir = null;
    }
  }

  private formatConsoleMessage(
    level: LogLevel,
    category: LogCategory,
    message: string,
  ): string {
    const levelColors: Record<LogLevel, string> = {
      [LogLevel.DEBUG]: "\x1b[36m",
      [LogLevel.INFO]: "\x1b[32m",
      [LogLevel.WARN]: "\x1b[33m",
      [LogLevel.ERROR]: "\x1b[31m",
    };
    const reset = "\x1b[0m";
    return `${levelColors[level]}[${new Date().toISOString()}] [${level.toUpperCase()}] [${category}] [tick ${this.currentTick}]${reset} ${message}`;
  }

  private shouldThrottle(message: string): boolean {
    const now = Date.now();
    const key = message.substring(0, 100);
    const entry = this.throttleMap.get(key);

    if (!entry) {
      this.throttleMap.set(key, { count: 1, lastTime: now });
      return false;
    }

    if (now - entry.lastTime > this.config.throttleWindowMs) {
      entry.count = 1;
      entry.lastTime = now;
      return false;
    }

    entry.count++;
    return entry.count > this.config.maxThrottleCount;
  }

  private addToMemory(entry: LogEntry): void {
    this.memoryBuffer.push(entry);
    if (this.memoryBuffer.length > this.config.maxMemoryLogs) {
      this.memoryBuffer.splice(
        0,
        this.memoryBuffer.length - this.config.maxMemoryLogs,
      );
    }
    if (this.config.logDir) {
      this.pendingWrites.push(entry);
    }

    this.metrics.byLevel[entry.level]++;
    this.metrics.byCategory[entry.category]++;
    this.metrics.totalCount++;
  }

  private scheduleWrite(): void {
    this.writePromise = this.writePromise.then(() => this.writePending());
  }

  private async writePending(): Promise<void> {
    const dir = this.config.logDir;
    if (!dir || this.pendingWrites.length === 0) return;

    const batch = this.pendingWrites;
    this.pendingWrites = [];
    const filePath = path.join(dir, `logs-${getDateString()}.jsonl`);

    try {
      const lines = batch.map((entry) => JSON.stringify(entry)).join("\n");
      await fs.promises.appendFile(filePath, lines + "\n", "utf-8");
    } catch (error) {
      this.pendingWrites = [...batch, ...this.pendingWrites].slice(
        -this.config.maxMemoryLogs,
      );
      console.error("Failed to write logs:", {
        error: error instanceof Error ? error.message : String(error),
        filePath,
      });
    }
  }

  private resolveCategory(categoryOrData: unknown): LogCategory | null {
    return isEnumValue(LogCategory, categoryOrData) ? categoryOrData : null;
  }

  /**
   * Set the current loop tick for log context.
   */
  setTick(tick: number): void {
    this.currentTick = tick;
  }

  /**
   * Changes the level threshold at runtime.
   */
  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.config.level];
  }

  /**
   * Log with explicit category.
   */
  log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    data?: unknown,
  ): void {
    if (!this.isLevelEnabled(level)) return;
    if (level !== LogLevel.ERROR && this.shouldThrottle(message)) {
      this.metrics.droppedByThrottle++;
      return;
    }

    const now = Date.now();
    this.addToMemory({
      id: generateLogId(),
      level,
      category,
      message,
      timestamp: new Date(now).toISOString(),
      timestampMs: now,
      tick: this.currentTick,
      data,
    });

    if (!this.config.console) return;

    const consoleMsg = this.formatConsoleMessage(level, category, message);
    switch (level) {
      case LogLevel.DEBUG:
        console.log(consoleMsg, data ?? "");
        break;
      case LogLevel.INFO:
        console.info(consoleMsg, data ?? "");
        break;
      case LogLevel.WARN:
        console.warn(consoleMsg, data ?? "");
        break;
      case LogLevel.ERROR:
        console.error(consoleMsg, data ?? "");
        break;
    }
  }

  private dispatch(
    level: LogLevel,
    message: string,
    categoryOrData: unknown,
    data: unknown,
  ): void {
    const category = this.resolveCategory(categoryOrData);
    if (category) {
      this.log(level, category, message, data);
    } else {
      this.log(level, LogCategory.GENERAL, message, categoryOrData);
    }
  }

  debug(
    message: string,
    categoryOrData?: LogCategory | unknown,
    data?: unknown,
  ): void {
    this.dispatch(LogLevel.DEBUG, message, categoryOrData, data);
  }

  info(
    message: string,
    categoryOrData?: LogCategory | unknown,
    data?: unknown,
  ): void {
    this.dispatch(LogLevel.INFO, message, categoryOrData, data);
  }

  warn(
    message: string,
    categoryOrData?: LogCategory | unknown,
    data?: unknown,
  ): void {
    this.dispatch(LogLevel.WARN, message, categoryOrData, data);
  }

  error(
    message: string,
    categoryOrData?: LogCategory | unknown,
    data?: unknown,
  ): void {
    this.dispatch(LogLevel.ERROR, message, categoryOrData, data);
  }

  /**
   * Get current aggregated metrics.
   */
  getMetrics(): LogMetrics {
    return {
      byLevel: { ...this.metrics.byLevel },
      byCategory: { ...this.metrics.byCategory },
      totalCount: this.metrics.totalCount,
      droppedByThrottle: this.metrics.droppedByThrottle,
    };
  }

  /**
   * Query logs from memory buffer with filters.
   */
  queryLogs(filter: LogFilter = {}): LogEntry[] {
    const { levels, categories, sinceTick, messageContains, limit } = filter;
    let results = [...this.memoryBuffer];

    if (levels?.length) {
      results = results.filter((e) => levels.includes(e.level));
    }
    if (categories?.length) {
      results = results.filter((e) => categories.includes(e.category));
    }
    if (sinceTick !== undefined) {
      results = results.filter((e) => e.tick >= sinceTick);
    }
    if (messageContains) {
      const search = messageContains.toLowerCase();
      results = results.filter((e) => e.message.toLowerCase().includes(search));
    }
    if (limit) {
      results = results.slice(-limit);
    }

    return results;
  }

  /**
   * Drops buffered entries and counters.
   */
  clear(): void {
    this.memoryBuffer = [];
    this.throttleMap.clear();
    this.metrics = this.initMetrics();
  }

  /**
   * Force immediate write of pending entries to the file sink.
   */
  async flush(): Promise<void> {
    this.scheduleWrite();
    await this.writePromise;
  }

  /**
   * Stops the periodic writer and flushes what is left.
   */
  async destroy(): Promise<void> {
    if (this.writeInterval) {
      clearInterval(this.writeInterval);
      this.writeInterval = undefined;
    }
    await this.flush();
  }
}

export const logger = new Logger();

export { LogLevel, LogCategory } from "../../shared/constants/LogEnums";
