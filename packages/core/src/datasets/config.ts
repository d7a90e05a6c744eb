/**
 * Dataset configuration record.
 *
 * ```yaml
 * datasets:
 *   my_dataset:
 *     type: memory
 *     target: foo
 *     params:
 *       param_1: bar
 * ```
 */

import { z } from "zod";

export const DatasetConfigSchema = z.object({
  /** Registry key of the backend to instantiate. */
  type: z.string().min(1),
  /** Backend address, e.g. a broker list or a queue name. */
  target: z.string().default(""),
  params: z.record(z.unknown()).default({}),
});

export type DatasetConfig = z.infer<typeof DatasetConfigSchema>;

/** Record as written by hand, before defaults are applied. */
export type DatasetConfigInput = z.input<typeof DatasetConfigSchema>;
