import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  formatLogLine,
  getLogDir,
  getLogFilePath,
  initLogger,
  restoreConsole,
} from "./logger.js";

describe("formatLogLine", () => {
  const at = new Date("2024-01-02T03:04:05.678Z");

  it("prefixes the time and padded level", () => {
    expect(formatLogLine("WARN", ["x", 1], at)).toBe("[03:04:05.678] [WARN ] x 1\n");
    expect(formatLogLine("ERROR", ["failed"], at)).toBe("[03:04:05.678] [ERROR] failed\n");
  });

  it("serializes objects as JSON", () => {
    expect(formatLogLine("INFO", ["state", { arm: "A", n: 2 }], at)).toBe(
      '[03:04:05.678] [INFO ] state {"arm":"A","n":2}\n'
    );
  });

  it("includes the stack for errors", () => {
    const error = new Error("bad");
    expect(formatLogLine("ERROR", [error], at)).toBe(
      `[03:04:05.678] [ERROR] bad\n${error.stack}\n`
    );
  });
});

describe("getLogDir", () => {
  it("places logs under the configured data directory", () => {
    expect(getLogDir("/srv/bandits")).toBe(join("/srv/bandits", "logs"));
  });

  it("defaults to the bundled data directory", () => {
    expect(getLogDir().endsWith(join("data", "logs"))).toBe(true);
  });
});

describe("initLogger", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "logs-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    restoreConsole();
    await rm(dir, { recursive: true, force: true });
  });

  it("mirrors console output to a dated log file", async () => {
    const logDir = join(dir, "logs");
    const path = initLogger(logDir);

    console.log("[Simulation] step", 3);
    console.warn("careful");

    const date = new Date().toISOString().split("T")[0];
    expect(path).toBe(join(logDir, `review-bandits-${date}.log`));
    expect(getLogFilePath()).toBe(path);

    const lines = (await readFile(path, "utf-8")).split("\n");
    expect(lines.some((line) => line.endsWith("] [INFO ] [Simulation] step 3"))).toBe(true);
    expect(lines.some((line) => line.endsWith("] [WARN ] careful"))).toBe(true);
    expect(lines.some((line) => line.startsWith("  Session Started: "))).toBe(true);
  });

  it("still forwards output to the original console", () => {
    const original = console.log;
    initLogger(dir);

    console.log("hello");

    expect(original).toHaveBeenCalledWith("hello");
  });

  it("restores the console and stops writing", () => {
    const original = console.log;
    initLogger(dir);
    expect(console.log).not.toBe(original);

    restoreConsole();

    expect(console.log).toBe(original);
    expect(getLogFilePath()).toBeNull();
  });
});
