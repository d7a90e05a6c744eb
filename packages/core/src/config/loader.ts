/**
 * Reads and validates a pipeline configuration file.
 *
 * Order: parse YAML -> flat `$NAME` substitution (when variables are given)
 * -> structural validation -> `{$NAME}` environment injection into every
 * node's `node_params`.
 */

import * as fs from "node:fs";
import { parse as parseYaml } from "yaml";
import { ConfigurationError } from "../errors.js";
import { createLogger } from "../logger.js";
import { injectEnvVars, updateParams } from "./inject.js";
import { PipelineConfigSchema } from "./pipeline-config.js";
import type { PipelineConfig } from "./pipeline-config.js";

const log = createLogger("config");

export interface ConfigLoaderOptions {
  pipelineConfigFile: string;
  /** Values for `$NAME` tokens, applied before validation. */
  variables?: Record<string, string>;
  /** Environment for `{$NAME}` placeholders. Default: `process.env`. */
  env?: Record<string, string | undefined>;
}

export class ConfigLoader {
  readonly pipelineConfigFile: string;
  private readonly variables: Record<string, string> | undefined;
  private readonly env: Record<string, string | undefined>;

  constructor(options: ConfigLoaderOptions) {
    this.pipelineConfigFile = options.pipelineConfigFile;
    this.variables = options.variables;
    this.env = options.env ?? process.env;
  }

  /**
   * Load and validate the pipeline config.
   *
   * @throws ConfigurationError when the file is not valid YAML or does not
   *   match the pipeline schema
   * @throws MissingEnvironmentVariableError when a node parameter references
   *   an unset variable
   */
  loadConfig(): PipelineConfig {
    const source = fs.readFileSync(this.pipelineConfigFile, "utf-8");
    return this.parse(source);
  }

  /** Same as `loadConfig`, from YAML source text. */
  parse(source: string): PipelineConfig {
    let raw: unknown;
    try {
      raw = parseYaml(source);
    } catch (error) {
      throw new ConfigurationError(
        `Failed to parse pipeline config ${this.pipelineConfigFile}`,
        { cause: error },
      );
    }

    if (this.variables) {
      raw = updateParams(raw, this.variables);
    }

    const parsed = PipelineConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      log.error(
        { file: this.pipelineConfigFile, issues: parsed.error.issues },
        "Schema validation failed for pipeline config",
      );
      throw new ConfigurationError(
        `Schema validation failed for pipeline config ${this.pipelineConfigFile}: ${issues}`,
        { cause: parsed.error },
      );
    }

    const config = parsed.data;
    for (const node of Object.values(config.pipeline.nodes)) {
      if (node.node_params) {
        node.node_params = injectEnvVars(node.node_params, this.env);
      }
    }
    return config;
  }
}
