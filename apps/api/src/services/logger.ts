/**
 * File-Based Logger
 *
 * Mirrors all console output to a log file so long experiments keep a full
 * step-by-step record even when the terminal truncates.
 *
 * Usage: Call `initLogger()` at the start of an entry script.
 * Logs are written to: <data dir>/logs/review-bandits-YYYY-MM-DD.log
 */

import { mkdirSync, appendFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { getDataDir } from "../storage/base.js";

type ConsoleMethod = (...args: unknown[]) => void;

let logFilePath: string | null = null;
let originals: { log: ConsoleMethod; error: ConsoleMethod; warn: ConsoleMethod } | null = null;

/**
 * Log directory under the data directory (DATA_DIR when set).
 */
export function getLogDir(dataDir?: string): string {
  return join(getDataDir(dataDir), "logs");
}

/**
 * Initialize file-based logging.
 * Hooks into console.log, console.error, console.warn and mirrors output to a file.
 * Calling it again switches to the new directory.
 */
export function initLogger(logDir: string = getLogDir()): string {
  restoreConsole();

  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const date = new Date().toISOString().split("T")[0];
  const path = join(logDir, `review-bandits-${date}.log`);
  logFilePath = path;

  const saved = {
    log: console.log,
    error: console.error,
    warn: console.warn,
  };
  originals = saved;

  console.log = (...args: unknown[]) => {
    saved.log.apply(console, args);
    writeToFile("INFO", args);
  };

  console.error = (...args: unknown[]) => {
    saved.error.apply(console, args);
    writeToFile("ERROR", args);
  };

  console.warn = (...args: unknown[]) => {
    saved.warn.apply(console, args);
    writeToFile("WARN", args);
  };

  const startupMsg = `\n${"=".repeat(70)}\n  Session Started: ${new Date().toISOString()}\n${"=".repeat(70)}\n`;
  try {
    appendFileSync(path, startupMsg);
  } catch {
    // Logging must never break the run
  }

  return path;
}

/**
 * Put the original console methods back and stop writing to the file.
 */
export function restoreConsole(): void {
  if (originals) {
    console.log = originals.log;
    console.error = originals.error;
    console.warn = originals.warn;
    originals = null;
  }
  logFilePath = null;
}

/**
 * Format one log line: `[HH:mm:ss.SSS] [LEVEL] message`
 */
export function formatLogLine(level: string, args: unknown[], at: Date = new Date()): string {
  const timestamp = at.toISOString().substring(11, 23);
  const message = args
    .map((arg) => {
      if (typeof arg === "string") return arg;
      if (arg instanceof Error) return `${arg.message}\n${arg.stack}`;
      try {
        return JSON.stringify(arg, null, 0);
      } catch {
        return String(arg);
      }
    })
    .join(" ");

  return `[${timestamp}] [${level.padEnd(5)}] ${message}\n`;
}

function writeToFile(level: string, args: unknown[]): void {
  if (!logFilePath) return;

  try {
    appendFileSync(logFilePath, formatLogLine(level, args));
  } catch {
    // Logging must never break the run
  }
}

/**
 * Get the current log file path.
 */
export function getLogFilePath(): string | null {
  return logFilePath;
}
