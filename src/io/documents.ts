/**
 * On-disk (snake_case) shapes of tool contract and resolved tool
 * contract documents.
 */

import { z } from "zod";
import { OptionType, RawOptionValue } from "../schemas/option.js";
import { MaxNchunks, Nproc, ResourceType, TaskType, ToolDriver } from "../schemas/tool-contract.js";

export const JSON_SCHEMA_DRAFT = "http://json-schema.org/draft-04/schema#";

export const JsonSchemaType = z.enum(["integer", "number", "boolean", "string"]);
export type JsonSchemaType = z.infer<typeof JsonSchemaType>;

export const OptionPropertyDocument = z.object({
  type: JsonSchemaType,
  default: RawOptionValue,
  title: z.string().default(""),
  description: z.string().default(""),
  enum: z.array(RawOptionValue).min(1).optional(),
});
export type OptionPropertyDocument = z.infer<typeof OptionPropertyDocument>;

/** One option, as a JSON Schema object with a single required property. */
export const SchemaOptionDocument = z
  .object({
    $schema: z.string().optional(),
    type: z.literal("object"),
    title: z.string().optional(),
    required: z.array(z.string()).length(1),
    properties: z.record(z.string(), OptionPropertyDocument),
  })
  .superRefine((doc, ctx) => {
    const [id] = doc.required;
    if (id === undefined || !(id in doc.properties)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `required option '${id ?? ""}' has no entry in properties`,
        path: ["properties"],
      });
    }
  });
export type SchemaOptionDocument = z.infer<typeof SchemaOptionDocument>;

export const InputTypeDocument = z.object({
  file_type_id: z.string().min(1),
  label: z.string().min(1),
  description: z.string().default(""),
});

export const OutputTypeDocument = InputTypeDocument.extend({
  default_name: z.string().min(1).optional(),
});

export const ToolContractTaskDocument = z.object({
  tool_contract_id: z.string().min(1),
  name: z.string().default(""),
  description: z.string().default(""),
  task_type: TaskType,
  input_types: z.array(InputTypeDocument),
  output_types: z.array(OutputTypeDocument),
  schema_options: z.array(SchemaOptionDocument).default([]),
  nproc: Nproc,
  resource_types: z.array(ResourceType).default([]),
  _comment: z.string().optional(),
  // scatter
  chunk_keys: z.array(z.string()).optional(),
  nchunks: MaxNchunks.optional(),
  // gather
  chunk_key: z.string().optional(),
});

export const ToolContractDocument = z.object({
  tool_contract_id: z.string().min(1),
  version: z.string().min(1),
  driver: ToolDriver,
  tool_contract: ToolContractTaskDocument,
});
export type ToolContractDocument = z.infer<typeof ToolContractDocument>;

export const ResolvedTaskDocument = z.object({
  tool_contract_id: z.string().min(1),
  task_type: TaskType,
  input_files: z.array(z.string()),
  output_files: z.array(z.string()),
  options: z.record(z.string(), RawOptionValue),
  /** Declared option types; JSON alone cannot tell a float 2.0 from an int 2. */
  option_types: z.record(z.string(), OptionType).optional(),
  nproc: z.number().int().positive(),
  resources: z.array(z.tuple([ResourceType, z.string()])),
  // scatter
  chunk_keys: z.array(z.string()).optional(),
  max_nchunks: z.number().int().positive().optional(),
  nchunks: z.number().int().positive().optional(),
  // gather
  chunk_key: z.string().optional(),
  chunk_files: z.array(z.string()).optional(),
});

export const ResolvedToolContractDocument = z.object({
  driver: ToolDriver,
  tool_contract: ResolvedTaskDocument,
});
export type ResolvedToolContractDocument = z.infer<typeof ResolvedToolContractDocument>;
