/* eslint-disable no-console */
import * as fs from "fs";
import * as path from "path";
import { RandomUtils } from "@/shared/utils/RandomUtils";

/**
 * Logging utility for the maze simulation.
 *
 * Features:
 * - Console output with colored levels, filtered by a minimum level
 * - Memory buffer of every entry regardless of console level
 * - Category-based logging for subsystem identification
 * - Iteration context attached to each entry
 * - Aggregated metrics per category/level
 * - Throttling to prevent log spam
 * - Optional JSON Lines file output on flush
 */

import {
  LogLevel,
  LogCategory,
  LOG_LEVEL_SEVERITY,
} from "../../shared/constants/LogEnums";

/**
 * Log entry with category and iteration context.
 */
export interface LogEntry {
  /** Unique identifier for this log entry */
  id: string;
  level: LogLevel;
  category: LogCategory;
  message: string;
  /** ISO timestamp */
  timestamp: string;
  /** Unix timestamp for sorting/filtering */
  timestampMs: number;
  /** Simulation iteration when the log was created */
  tick: number;
  /** Additional structured data */
  data?: unknown;
}

interface LogMetrics {
  byLevel: Record<LogLevel, number>;
  byCategory: Record<LogCategory, number>;
  totalCount: number;
}

/**
 * Filter options for log queries.
 */
export interface LogFilter {
  levels?: LogLevel[];
  categories?: LogCategory[];
  /** Text search in message */
  messageContains?: string;
  /** Maximum results, newest kept */
  limit?: number;
}

export interface LoggerConfig {
  maxMemoryLogs: number;
  /** Entries below this level are kept in memory but not printed */
  consoleLevel: LogLevel;
  /** Directory for JSONL output; file output is disabled when unset */
  logDir?: string;
  throttleWindowMs: number;
  maxThrottleCount: number;
}

/**
 * Parses a level name, falling back when the value is not a known level.
 */
export function parseLogLevel(
  value: string | undefined,
  fallback: LogLevel,
): LogLevel {
  const normalized = value?.trim().toLowerCase();
  const match = Object.values(LogLevel).find((level) => level === normalized);
  return match ?? fallback;
}

const DEFAULT_CONFIG: LoggerConfig = {
  maxMemoryLogs: 5000,
  consoleLevel: parseLogLevel(process.env.LOG_LEVEL, LogLevel.WARN),
  logDir: process.env.LOG_DIR ? path.resolve(process.env.LOG_DIR) : undefined,
  throttleWindowMs: Number(process.env.LOG_THROTTLE_WINDOW_MS ?? 5000),
  maxThrottleCount: Number(process.env.LOG_MAX_THROTTLE_COUNT ?? 20),
};

function generateLogId(): string {
  return `${Date.now()}-${RandomUtils.float().toString(36).substring(2, 9)}`;
}

/**
 * Get current date string for file naming (YYYY-MM-DD).
 */
function getDateString(): string {
  return new Date().toISOString().split("T")[0];
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "\x1b[36m",
  [LogLevel.INFO]: "\x1b[32m",
  [LogLevel.WARN]: "\x1b[33m",
  [LogLevel.ERROR]: "\x1b[31m",
};

/**
 * Logger class with memory buffering and analysis support.
 * Console: levels at or above consoleLevel, with colors
 * Memory: all levels with full metadata
 * Files: appended as JSON Lines on flush when logDir is set
 */
export class Logger {
  private config: LoggerConfig;
  private memoryBuffer: LogEntry[] = [];
  private pendingWrite: LogEntry[] = [];
  private throttleMap = new Map<string, { count: number; lastTime: number }>();
  private lastThrottlePrune = 0;
  private metrics: LogMetrics;
  private currentTick = 0;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.metrics = this.initMetrics();
  }

  private initMetrics(): LogMetrics {
    return {
      byLevel: {
        [LogLevel.DEBUG]: 0,
        [LogLevel.INFO]: 0,
        [LogLevel.WARN]: 0,
        [LogLevel.ERROR]: 0,
      },
      byCategory: {
        [LogCategory.SIMULATION]: 0,
        [LogCategory.DRIVES]: 0,
        [LogCategory.PATHFINDING]: 0,
        [LogCategory.GRAPH]: 0,
        [LogCategory.CLI]: 0,
        [LogCategory.GENERAL]: 0,
      },
      totalCount: 0,
    };
  }

  private getLogFilePath(logDir: string): string {
    return path.join(logDir, `logs-${getDateString()}.jsonl`);
  }

  private formatConsoleMessage(
    level: LogLevel,
    category: LogCategory,
    message: string,
    timestamp: string,
  ): string {
    const reset = "\x1b[0m";
    return `${LEVEL_COLORS[level]}[${timestamp}] [${level.toUpperCase()}] [${category}]${reset} ${message}`;
  }

  private pruneThrottleMap(now: number): void {
    if (now - this.lastThrottlePrune <= this.config.throttleWindowMs) return;
    this.lastThrottlePrune = now;
    for (const [key, entry] of this.throttleMap) {
      if (now - entry.lastTime > this.config.throttleWindowMs) {
        this.throttleMap.delete(key);
      }
    }
  }

  private shouldThrottle(message: string): boolean {
    const now = Date.now();
    this.pruneThrottleMap(now);
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
      this.memoryBuffer.shift();
    }
    if (this.config.logDir) {
      this.pendingWrite.push(entry);
    }

    this.metrics.byLevel[entry.level]++;
    this.metrics.byCategory[entry.category]++;
    this.metrics.totalCount++;
  }

  /**
   * Set the current simulation iteration for log context.
   */
  setTick(tick: number): void {
    this.currentTick = tick;
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
    if (this.shouldThrottle(message)) return;

    const now = Date.now();
    const entry: LogEntry = {
      id: generateLogId(),
      level,
      category,
      message,
      timestamp: new Date(now).toISOString(),
      timestampMs: now,
      tick: this.currentTick,
      data,
    };
    this.addToMemory(entry);

    if (LOG_LEVEL_SEVERITY[level] < LOG_LEVEL_SEVERITY[this.config.consoleLevel]) {
      return;
    }

    const consoleMsg = this.formatConsoleMessage(
      level,
      category,
      message,
      entry.timestamp,
    );
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

  debug(message: string, category: LogCategory = LogCategory.GENERAL, data?: unknown): void {
    this.log(LogLevel.DEBUG, category, message, data);
  }

  info(message: string, category: LogCategory = LogCategory.GENERAL, data?: unknown): void {
    this.log(LogLevel.INFO, category, message, data);
  }

  warn(message: string, category: LogCategory = LogCategory.GENERAL, data?: unknown): void {
    this.log(LogLevel.WARN, category, message, data);
  }

  error(message: string, category: LogCategory = LogCategory.GENERAL, data?: unknown): void {
    this.log(LogLevel.ERROR, category, message, data);
  }

  getMetrics(): LogMetrics {
    return {
      byLevel: { ...this.metrics.byLevel },
      byCategory: { ...this.metrics.byCategory },
      totalCount: this.metrics.totalCount,
    };
  }

  /**
   * Number of message prefixes currently tracked for throttling.
   */
  getThrottledKeyCount(): number {
    return this.throttleMap.size;
  }

  /**
   * Query logs from memory buffer with filters.
   */
  queryLogs(filter: LogFilter = {}): LogEntry[] {
    const { levels, categories, messageContains, limit } = filter;
    let results = [...this.memoryBuffer];

    if (levels?.length) {
      results = results.filter((e) => levels.includes(e.level));
    }
    if (categories?.length) {
      results = results.filter((e) => categories.includes(e.category));
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
   * Appends entries logged since the last flush to the log file.
   * Does nothing when no log directory is configured.
   */
  async flush(): Promise<void> {
    const logDir = this.config.logDir;
    if (!logDir || this.pendingWrite.length === 0) return;

    const logsToWrite = this.pendingWrite;
    this.pendingWrite = [];

    try {
      await fs.promises.mkdir(logDir, { recursive: true });
      const lines = logsToWrite.map((log) => JSON.stringify(log)).join("\n");
      await fs.promises.appendFile(
        this.getLogFilePath(logDir),
        lines + "\n",
        "utf-8",
      );
    } catch (error) {
      this.pendingWrite = [...logsToWrite, ...this.pendingWrite];
      console.error(
        "Failed to write logs:",
        error instanceof Error ? error.message : String(error),
      );
    }
  }

  /**
   * Retrieves recent logs from memory buffer.
   */
  getRecentLogs(count: number = 100): LogEntry[] {
    return this.memoryBuffer.slice(-count);
  }

  /**
   * Clears the memory buffer and metrics.
   */
  reset(): void {
    this.memoryBuffer = [];
    this.pendingWrite = [];
    this.throttleMap.clear();
    this.lastThrottlePrune = 0;
    this.metrics = this.initMetrics();
    this.currentTick = 0;
  }
}

export const logger = new Logger();

export { LogLevel, LogCategory } from "../../shared/constants/LogEnums";
