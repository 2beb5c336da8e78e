import { pino, type Logger } from "pino";

// LOG_LEVEL wins; tests run silent unless asked otherwise.
const level =
  process.env["LOG_LEVEL"] ?? (process.env["NODE_ENV"] === "test" ? "silent" : "info");

export const logger = pino({
  name: "notebook-semantic-index",
  level,
  transport:
    process.env["NODE_ENV"] === "development"
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            ignore: "pid,hostname",
            translateTime: "SYS:standard",
          },
        }
      : undefined,
});

export type { Logger };

export function getLogger(component: string): Logger {
  return logger.child({ component });
}
