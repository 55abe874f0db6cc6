import pino from "pino";

// ── Structured Logger — pino ─────────────────────────────
// JSON output in production. Set LOG_PRETTY=true for dev; tests stay plain.

const env = process.env.NODE_ENV;
const isProduction = env === "production";
const isTest = env === "test" || process.env.VITEST === "true";
const isPretty =
  process.env.LOG_PRETTY === "true" || (!isProduction && !isTest);

export const log = pino({
  name: "memstrata",
  level: process.env.LOG_LEVEL || "info",
  ...(isPretty
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss",
            ignore: "pid,hostname",
          },
        },
      }
    : {}),
});

export type Logger = typeof log;
