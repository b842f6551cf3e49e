import pino, { type Logger } from "pino";

// ── Structured Logger — pino ─────────────────────────────
// JSON output in production. Pretty output in dev unless LOG_PRETTY=false.

const isProduction = process.env.NODE_ENV === "production";
const prettyFlag = process.env.LOG_PRETTY;
const isPretty =
  prettyFlag === "true" || (prettyFlag === undefined && !isProduction);

export const log = pino({
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

export type { Logger };

/** Logger scoped to one component; every line carries `component`. */
export function componentLogger(component: string): Logger {
  return log.child({ component });
}
