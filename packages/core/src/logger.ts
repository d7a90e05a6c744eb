import { pino } from "pino";
import type { Logger } from "pino";
import { loadSettings } from "./settings.js";

export type { Logger } from "pino";

export const logger: Logger = pino({
  name: "tributary",
  level: loadSettings().logLevel,
});

/** Child logger tagged with the module that emits it. */
export function createLogger(module: string): Logger {
  return logger.child({ module });
}
