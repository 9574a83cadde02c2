/**
 * @xfactory/deployer — Logger construction.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { DeployerConfig } from "./config.js";

/**
 * Structured JSON logger; pretty-printed in development.
 */
export function createLogger(config: Pick<DeployerConfig, "LOG_LEVEL" | "NODE_ENV">): Logger {
  return pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}
