import pino from "pino";
import type { Logger, TransportTargetOptions } from "pino";

export type { Logger } from "pino";

const isProduction = process.env.NODE_ENV === "production";
const isTest = process.env.NODE_ENV === "test";

function isKnownLevel(level: string): boolean {
  return level === "silent" || Object.hasOwn(pino.levels.values, level);
}

/**
 * `LOG_LEVEL` when pino knows it, otherwise silent in test, info in
 * production and debug elsewhere.
 */
export function resolveLevel(env: NodeJS.ProcessEnv = process.env): string {
  const requested = env.LOG_LEVEL?.trim().toLowerCase();
  if (requested && isKnownLevel(requested)) {
    return requested;
  }
  if (env.NODE_ENV === "test") {
    return "silent";
  }
  return env.NODE_ENV === "production" ? "info" : "debug";
}

const logger = pino({
  level: resolveLevel(),
  ...(isProduction || isTest
    ? {}
    : {
        transport: {
          target: "pino-pretty",
          options: { colorize: true },
        },
      }),
});

if (process.env.LOG_LEVEL && !isKnownLevel(process.env.LOG_LEVEL.trim().toLowerCase())) {
  logger.warn({ requested: process.env.LOG_LEVEL, level: logger.level }, "unknown LOG_LEVEL, using the default level");
}

/**
 * Creates a logger that writes to the console and appends JSON lines to `path`.
 * Used by the CLI to keep one log file per run.
 */
export function createFileLogger(path: string, runId: string): Logger {
  const consoleTarget: TransportTargetOptions = isProduction
    ? { target: "pino/file", options: { destination: 1 }, level: resolveLevel() }
    : { target: "pino-pretty", options: { colorize: true }, level: resolveLevel() };

  const transport = pino.transport({
    targets: [consoleTarget, { target: "pino/file", options: { destination: path, mkdir: true }, level: "debug" }],
  });
  return pino({ level: "debug" }, transport).child({ runId });
}

export function runId(now = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
    `_${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  );
}

export default logger;
