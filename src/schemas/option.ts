/**
 * Task option schema: one declared, typed, defaulted option of a tool
 * contract, and the tagged value it resolves to.
 */

import { z } from "zod";

/** Namespaced option id, e.g. "toolset.task_options.min_length". */
export const OPTION_ID_REGEX = /^[A-Za-z0-9_]+(\.[A-Za-z0-9_]+)*$/;

/** Ids that would collide with Object.prototype members when used as keys. */
export const RESERVED_OPTION_IDS: ReadonlySet<string> = new Set(["__proto__", "constructor", "prototype"]);

export const OptionId = z
  .string()
  .regex(OPTION_ID_REGEX, "option id must be dot-separated [A-Za-z0-9_] segments")
  .refine(id => !RESERVED_OPTION_IDS.has(id), id => ({ message: `option id '${id}' is reserved` }));
export type OptionId = z.infer<typeof OptionId>;

export const OptionType = z.enum(["int", "float", "bool", "string"]);
export type OptionType = z.infer<typeof OptionType>;

/** A raw (untagged) option value as it appears in JSON. */
export const RawOptionValue = z.union([z.string(), z.number(), z.boolean()]);
export type RawOptionValue = z.infer<typeof RawOptionValue>;

export const OptionSchema = z.object({
  id: OptionId,
  title: z.string(),
  description: z.string().default(""),
  type: OptionType,
  default: RawOptionValue,
  /** Allowed values. Not supported for bool options. */
  choices: z.array(RawOptionValue).min(1).optional(),
});
export type OptionSchema = z.infer<typeof OptionSchema>;
export type OptionSchemaInput = z.input<typeof OptionSchema>;

/** Validated option value, tagged with its declared type. */
export type OptionValue =
  | { type: "int"; value: number }
  | { type: "float"; value: number }
  | { type: "bool"; value: boolean }
  | { type: "string"; value: string };

/** Resolved options keyed by option id. */
export type OptionValues = Readonly<Record<string, OptionValue>>;

/** Strip tags for serialization. */
export function optionValuesToJson(values: OptionValues): Record<string, RawOptionValue> {
  const out: Record<string, RawOptionValue> = {};
  for (const [id, tagged] of Object.entries(values)) {
    out[id] = tagged.value;
  }
  return out;
}

/** Plain value of one resolved option, or undefined if not declared. */
export function getOptionValue(values: OptionValues, id: string): RawOptionValue | undefined {
  return values[id]?.value;
}
