import pino from "pino";
import type { Logger } from "pino";
import { config } from "./config.js";

const usePrettyTransport = config.NODE_ENV === "development";

export type EngineComponent = "registry" | "collector" | "store" | "classifier" | "sentiment" | "redis";

export const logger = pino({
  level: config.LOG_LEVEL,
  base: {
    engineId: config.ENGINE_ID,
  },
  redact: {
    paths: ["apiKey", "*.apiKey", "headers.authorization"],
    censor: "[redacted]",
  },
  transport: usePrettyTransport
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          singleLine: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      }
    : undefined,
});

const componentLoggers = new Map<EngineComponent, Logger>();

export function componentLogger(component: EngineComponent): Logger {
  let child = componentLoggers.get(component);
  if (!child) {
    child = logger.child({ component });
    componentLoggers.set(component, child);
  }
  return child;
}
