/**
 * Resolver configuration schema.
 *
 * Stored as a single YAML file (toolcontract.yaml); every field has a
 * default so a missing file means "all defaults".
 */

import { tmpdir } from "node:os";
import { z } from "zod";

export const ToolContractConfig = z.object({
  schemaVersion: z.literal(1).default(1),
  /** Processors available to one task ($max_nproc). */
  maxNproc: z.number().int().positive().default(1),
  /** Absolute ceiling on chunks per scatter ($max_nchunks). */
  maxNchunks: z.number().int().positive().default(24),
  /** Root for synthesized temp files and directories. */
  tmpDir: z.string().default(tmpdir()),
  /** Root for task log files (default: <outputDir>/logs). */
  logDir: z.string().optional(),
  /** Event log directory; events are not recorded when unset. */
  eventsDir: z.string().optional(),
  /** Directory of tool contract JSON documents to register at startup. */
  contractsDir: z.string().optional(),
  /** Extra file type table (JSON) merged over the builtin one. */
  fileTypes: z.string().optional(),
});
export type ToolContractConfig = z.infer<typeof ToolContractConfig>;
