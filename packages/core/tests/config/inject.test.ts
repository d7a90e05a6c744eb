import { describe, it, expect } from "vitest";
import { injectEnvVars, updateParams } from "../../src/config/inject.js";
import {
  InvalidParamTypeError,
  MissingEnvironmentVariableError,
} from "../../src/errors.js";

describe("injectEnvVars", () => {
  const env = { SECRET1: "one", SECRET2: "two", NESTED: "{$SECRET1}" };

  it("replaces every placeholder in a string", () => {
    expect(injectEnvVars({ key: "a {$SECRET1} and a {$SECRET2}" }, env)).toEqual({
      key: "a one and a two",
    });
  });

  it("walks nested mappings and arrays", () => {
    const params = {
      outer: { inner: ["{$SECRET2}", 3, true, null] },
      list: [{ value: "{$SECRET1}" }],
    };

    expect(injectEnvVars(params, env)).toEqual({
      outer: { inner: ["two", 3, true, null] },
      list: [{ value: "one" }],
    });
  });

  it("replaces repeated placeholders and resolves substituted ones", () => {
    expect(injectEnvVars({ a: "{$SECRET1}-{$SECRET1}", b: "{$NESTED}" }, env)).toEqual({
      a: "one-one",
      b: "one",
    });
  });

  it("returns a new tree and is idempotent", () => {
    const params = { key: "{$SECRET2}" };

    const once = injectEnvVars(params, env);

    expect(params).toEqual({ key: "{$SECRET2}" });
    expect(injectEnvVars(once, env)).toEqual(once);
  });

  it("names the first missing variable", () => {
    let caught: unknown;
    try {
      injectEnvVars({ key: "{$MISSING} {$SECRET1}" }, env);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MissingEnvironmentVariableError);
    expect(caught).toHaveProperty(
      "message",
      "Failed to inject environment variable. MISSING was not found.",
    );
  });
});

describe("updateParams", () => {
  it("replaces $NAME tokens in every string", () => {
    const raw = {
      pipeline: { name: "$NAME", nodes: ["$NAME-a", "x"] },
      count: 3,
      enabled: true,
    };

    expect(updateParams(raw, { NAME: "integers" })).toEqual({
      pipeline: { name: "integers", nodes: ["integers-a", "x"] },
      count: 3,
      enabled: true,
    });
  });

  it("rejects values it cannot substitute into", () => {
    expect(() => updateParams({ key: null }, {})).toThrow(
      "Invalid value type null. Expected object, array, string, number or boolean.",
    );
    expect(() => updateParams([undefined], {})).toThrow(InvalidParamTypeError);
  });
});
