import { z } from "zod";

export type ParamScalar = string | number | boolean | null;

/** A node parameter tree: nested mappings, arrays and scalars. */
export type ParamValue = ParamScalar | ParamValue[] | { [key: string]: ParamValue };

export type NodeParams = { [key: string]: ParamValue };

export const ParamValueSchema: z.ZodType<ParamValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(ParamValueSchema),
    z.record(ParamValueSchema),
  ]),
);

export const NodeParamsSchema: z.ZodType<NodeParams> = z.record(ParamValueSchema);

export function isParamMapping(
  value: ParamValue,
): value is { [key: string]: ParamValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
