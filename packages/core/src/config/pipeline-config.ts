/**
 * Structural shape of a pipeline configuration file.
 *
 * ```yaml
 * pipeline:
 *   name: integers
 *   nodes:
 *     sequencer:
 *       class: sequencer
 *       outputs: [integer_sequence]
 *       node_params:
 *         start_int: 0
 *   datasets:
 *     integer_sequence:
 *       type: memory
 * ```
 */

import { z } from "zod";
import { DatasetConfigSchema } from "../datasets/config.js";
import { NodeParamsSchema } from "./params.js";

export const NodeConfigSchema = z.object({
  /** NodeRegistry key of the logic to run. */
  class: z.string().min(1),
  inputs: z.array(z.string()).default([]),
  outputs: z.array(z.string()).default([]),
  node_params: NodeParamsSchema.nullish(),
});

export const PipelineConfigSchema = z.object({
  pipeline: z.object({
    name: z.string().min(1),
    nodes: z.record(NodeConfigSchema),
    datasets: z.record(DatasetConfigSchema).default({}),
  }),
});

export type NodeConfig = z.infer<typeof NodeConfigSchema>;
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;
