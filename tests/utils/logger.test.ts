import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, readFile, readdir, rm } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import {
  Logger,
  LogCategory,
  LogLevel,
  parseLogLevel,
} from "../../src/infrastructure/utils/logger.js";

describe("Logger", () => {
  let logger: Logger;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    logger = new Logger({ consoleLevel: LogLevel.WARN, maxThrottleCount: 3 });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("debe guardar en memoria todos los niveles pero imprimir solo desde el mínimo", () => {
    logger.debug("searching", LogCategory.PATHFINDING);
    logger.info("loaded", LogCategory.GRAPH);
    logger.warn("heavy graph", LogCategory.GRAPH);

    expect(logger.getRecentLogs().map((e) => e.message)).toEqual([
      "searching",
      "loaded",
      "heavy graph",
    ]);
    expect(console.log).not.toHaveBeenCalled();
    expect(console.info).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("debe usar la categoría general por defecto", () => {
    logger.error("boom");
    expect(logger.getRecentLogs(1)[0].category).toBe(LogCategory.GENERAL);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it("debe adjuntar la iteración actual", () => {
    logger.setTick(7);
    logger.info("step", LogCategory.SIMULATION, { distance: 4 });
    expect(logger.getRecentLogs(1)[0]).toMatchObject({
      tick: 7,
      level: LogLevel.INFO,
      data: { distance: 4 },
    });
  });

  it("debe filtrar por nivel, categoría y texto", () => {
    logger.info("route E -> F", LogCategory.PATHFINDING);
    logger.info("drives ready", LogCategory.DRIVES);
    logger.warn("route blocked", LogCategory.PATHFINDING);

    expect(
      logger.queryLogs({ categories: [LogCategory.PATHFINDING] }),
    ).toHaveLength(2);
    expect(
      logger.queryLogs({ levels: [LogLevel.WARN] }).map((e) => e.message),
    ).toEqual(["route blocked"]);
    expect(
      logger.queryLogs({ messageContains: "ROUTE", limit: 1 }).map((e) => e.message),
    ).toEqual(["route blocked"]);
  });

  it("debe descartar claves de limitación vencidas", () => {
    vi.useFakeTimers();
    try {
      vi.setSystemTime(10_000);
      const windowed = new Logger({
        consoleLevel: LogLevel.ERROR,
        throttleWindowMs: 1000,
      });
      windowed.info("Iteration 1", LogCategory.SIMULATION);
      windowed.info("Iteration 2", LogCategory.SIMULATION);
      expect(windowed.getThrottledKeyCount()).toBe(2);

      vi.setSystemTime(12_000);
      windowed.info("Iteration 3", LogCategory.SIMULATION);
      expect(windowed.getThrottledKeyCount()).toBe(1);
    } finally {
      vi.useRealTimers();
    }
  });

  it("debe limitar mensajes repetidos", () => {
    for (let i = 0; i < 5; i++) {
      logger.info("same message", LogCategory.SIMULATION);
    }
    expect(logger.getRecentLogs()).toHaveLength(3);
  });

  it("debe contar entradas por nivel y categoría", () => {
    logger.info("a", LogCategory.DRIVES);
    logger.warn("b", LogCategory.DRIVES);
    const metrics = logger.getMetrics();
    expect(metrics.totalCount).toBe(2);
    expect(metrics.byCategory[LogCategory.DRIVES]).toBe(2);
    expect(metrics.byLevel[LogLevel.WARN]).toBe(1);
  });

  it("debe vaciar memoria y métricas con reset", () => {
    logger.info("a", LogCategory.DRIVES);
    logger.reset();
    expect(logger.getRecentLogs()).toEqual([]);
    expect(logger.getMetrics().totalCount).toBe(0);
  });

  describe("flush", () => {
    let logDir: string;

    beforeEach(async () => {
      logDir = await mkdtemp(path.join(tmpdir(), "rat-logs-"));
    });

    afterEach(async () => {
      await rm(logDir, { recursive: true, force: true });
    });

    it("debe escribir las entradas pendientes como JSON Lines", async () => {
      const fileLogger = new Logger({ logDir, consoleLevel: LogLevel.ERROR });
      fileLogger.info("first", LogCategory.GRAPH);
      fileLogger.info("second", LogCategory.GRAPH);
      await fileLogger.flush();
      await fileLogger.flush();

      const files = await readdir(logDir);
      expect(files).toHaveLength(1);
      const lines = (await readFile(path.join(logDir, files[0]), "utf-8"))
        .trim()
        .split("\n");
      expect(lines.map((line) => JSON.parse(line).message)).toEqual([
        "first",
        "second",
      ]);
    });

    it("no debe escribir nada sin directorio configurado", async () => {
      logger.info("memory only", LogCategory.GRAPH);
      await logger.flush();
      expect(await readdir(logDir)).toEqual([]);
    });
  });
});

describe("parseLogLevel", () => {
  it("debe reconocer niveles sin importar mayúsculas", () => {
    expect(parseLogLevel("DEBUG", LogLevel.WARN)).toBe(LogLevel.DEBUG);
    expect(parseLogLevel(" info ", LogLevel.WARN)).toBe(LogLevel.INFO);
  });

  it("debe usar el valor por defecto con niveles desconocidos", () => {
    expect(parseLogLevel("verbose", LogLevel.WARN)).toBe(LogLevel.WARN);
    expect(parseLogLevel(undefined, LogLevel.ERROR)).toBe(LogLevel.ERROR);
  });
});
