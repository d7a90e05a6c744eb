/**
 * Process-wide settings, read from the environment.
 *
 * Broker connection defaults live here so that `Node.setup` can fill in
 * consumer and producer configuration a pipeline does not override.
 */

import { z } from "zod";
import { ConfigurationError } from "./errors.js";

/** Levels accepted by `Node.log`. */
export const NODE_LOG_LEVELS = [
  "info",
  "debug",
  "warning",
  "error",
  "critical",
] as const;

export type NodeLogLevel = (typeof NODE_LOG_LEVELS)[number];

/** Name of the reserved output every node logs to. */
export const LOGGING_DATASET = "logging";

const booleanString = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const EnvSchema = z.object({
  TRIBUTARY_LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  TRIBUTARY_BROKERS: z.string().min(1).default("localhost:9092"),
  TRIBUTARY_CONSUMER_SESSION_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(30000),
  TRIBUTARY_CONSUMER_FROM_BEGINNING: booleanString.default("false"),
  TRIBUTARY_LOGGING_CAPACITY: z.coerce.number().int().positive().default(1000),
});

export interface Settings {
  /** pino level for the framework's own logger. */
  logLevel: z.infer<typeof EnvSchema>["TRIBUTARY_LOG_LEVEL"];
  /** Default broker list for broker-backed datasets. */
  brokers: string[];
  /** Reserved output dataset for `Node.log`. */
  loggingDataset: string;
  /** Entries the default in-memory logging queue keeps; the oldest go first. */
  loggingCapacity: number;
  /** Levels accepted by `Node.log`. */
  nodeLogLevels: readonly NodeLogLevel[];
  /** Default consumer configuration for input datasets. */
  consumerConfig: Record<string, unknown>;
  /** Default producer configuration for output datasets. */
  producerConfig: Record<string, unknown>;
}

export function parseBrokers(value: string): string[] {
  return value
    .split(",")
    .map((broker) => broker.trim())
    .filter((broker) => broker.length > 0);
}

/**
 * Build settings from environment variables.
 *
 * @throws ConfigurationError when a variable has an invalid value
 */
export function loadSettings(
  env: Record<string, string | undefined> = process.env,
): Settings {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid environment settings: ${issues}`, {
      cause: parsed.error,
    });
  }

  const values = parsed.data;
  return {
    logLevel: values.TRIBUTARY_LOG_LEVEL,
    brokers: parseBrokers(values.TRIBUTARY_BROKERS),
    loggingDataset: LOGGING_DATASET,
    loggingCapacity: values.TRIBUTARY_LOGGING_CAPACITY,
    nodeLogLevels: NODE_LOG_LEVELS,
    consumerConfig: {
      sessionTimeout: values.TRIBUTARY_CONSUMER_SESSION_TIMEOUT_MS,
      fromBeginning: values.TRIBUTARY_CONSUMER_FROM_BEGINNING,
    },
    producerConfig: {
      allowAutoTopicCreation: false,
    },
  };
}
