import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { ConfigLoader } from "../../src/config/loader.js";
import {
  ConfigurationError,
  MissingEnvironmentVariableError,
} from "../../src/errors.js";

describe("ConfigLoader", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "loader-test-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeConfig(source: string): string {
    const file = path.join(tmpDir, "pipeline.yml");
    fs.writeFileSync(file, source);
    return file;
  }

  it("loads a pipeline and applies defaults", () => {
    const file = writeConfig(`
pipeline:
  name: integers
  nodes:
    sequencer:
      class: sequencer
      outputs: [integer_sequence]
      node_params:
        start_int: 0
  datasets:
    integer_sequence:
      type: memory
`);

    const config = new ConfigLoader({ pipelineConfigFile: file, env: {} }).loadConfig();

    expect(config).toEqual({
      pipeline: {
        name: "integers",
        nodes: {
          sequencer: {
            class: "sequencer",
            inputs: [],
            outputs: ["integer_sequence"],
            node_params: { start_int: 0 },
          },
        },
        datasets: {
          integer_sequence: { type: "memory", target: "", params: {} },
        },
      },
    });
  });

  it("substitutes variables and injects the environment", () => {
    const file = writeConfig(`
pipeline:
  name: $PIPELINE
  nodes:
    client:
      class: client
      node_params:
        token: "{$API_TOKEN}"
`);

    const config = new ConfigLoader({
      pipelineConfigFile: file,
      variables: { PIPELINE: "ingest" },
      env: { API_TOKEN: "test-secret" },
    }).loadConfig();

    expect(config.pipeline.name).toBe("ingest");
    expect(config.pipeline.nodes["client"]?.node_params).toEqual({ token: "test-secret" });
  });

  it("fails on a missing environment variable", () => {
    const file = writeConfig(`
pipeline:
  name: ingest
  nodes:
    client:
      class: client
      node_params:
        token: "{$API_TOKEN}"
`);

    const loader = new ConfigLoader({ pipelineConfigFile: file, env: {} });
    expect(() => loader.loadConfig()).toThrow(MissingEnvironmentVariableError);
  });

  it("rejects files that are not YAML", () => {
    const loader = new ConfigLoader({ pipelineConfigFile: "inline.yml" });
    expect(() => loader.parse("pipeline: [unclosed")).toThrow(
      "Failed to parse pipeline config inline.yml",
    );
  });

  it("rejects configs that do not match the schema", () => {
    const loader = new ConfigLoader({ pipelineConfigFile: "inline.yml" });

    let caught: unknown;
    try {
      loader.parse("pipeline:\n  nodes: {}\n");
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toHaveProperty(
      "message",
      "Schema validation failed for pipeline config inline.yml: pipeline.name: Required",
    );
  });
});
