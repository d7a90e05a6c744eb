/**
 * Placeholder substitution for parameter trees.
 *
 * `injectEnvVars` resolves `{$NAME}` placeholders against the process
 * environment before parameters reach a node. `updateParams` performs the
 * flat `$NAME` replacement applied to raw config files before validation.
 */

import {
  InvalidParamTypeError,
  MissingEnvironmentVariableError,
} from "../errors.js";
import { isParamMapping } from "./params.js";
import type { NodeParams, ParamValue } from "./params.js";

const ENV_VAR_PATTERN = /\{\$(.*?)\}/s;

type Environment = Record<string, string | undefined>;

function injectIntoString(value: string, env: Environment): string {
  let result = value;
  let match = ENV_VAR_PATTERN.exec(result);
  while (match) {
    const [placeholder, variable = ""] = match;
    const replacement = env[variable];
    if (replacement === undefined) {
      throw new MissingEnvironmentVariableError(variable);
    }
    result = result.split(placeholder).join(replacement);
    match = ENV_VAR_PATTERN.exec(result);
  }
  return result;
}

/**
 * Resolve `{$NAME}` placeholders in every string of a parameter tree.
 *
 * Placeholders resolve left to right; after each substitution the string is
 * scanned again from the start, so a value that itself contains a placeholder
 * is resolved too. Returns a new tree.
 *
 * @example
 * // SECRET1=one SECRET2=two
 * injectEnvVars({ key: "a {$SECRET1} and a {$SECRET2}" });
 * // => { key: "a one and a two" }
 *
 * @throws MissingEnvironmentVariableError naming the first unset variable
 */
export function injectEnvVars(params: NodeParams, env?: Environment): NodeParams;
export function injectEnvVars(params: ParamValue, env?: Environment): ParamValue;
export function injectEnvVars(
  params: ParamValue,
  env: Environment = process.env,
): ParamValue {
  if (Array.isArray(params)) {
    return params.map((item) => injectEnvVars(item, env));
  }
  if (isParamMapping(params)) {
    const result: NodeParams = {};
    for (const [key, value] of Object.entries(params)) {
      result[key] = injectEnvVars(value, env);
    }
    return result;
  }
  if (typeof params === "string") {
    return injectIntoString(params, env);
  }
  return params;
}

/**
 * Replace `$NAME` tokens with `variables[NAME]` in every string of a raw
 * config value. Keys are applied in insertion order.
 *
 * @throws InvalidParamTypeError for values other than objects, arrays,
 *   strings, numbers and booleans
 */
export function updateParams(
  value: unknown,
  variables: Record<string, string>,
): ParamValue {
  if (Array.isArray(value)) {
    return value.map((item: unknown) => updateParams(item, variables));
  }
  if (typeof value === "object" && value !== null) {
    const result: NodeParams = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = updateParams(item, variables);
    }
    return result;
  }
  if (typeof value === "string") {
    let result = value;
    for (const [key, replacement] of Object.entries(variables)) {
      result = result.split(`$${key}`).join(replacement);
    }
    return result;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  throw new InvalidParamTypeError(value === null ? "null" : typeof value);
}
