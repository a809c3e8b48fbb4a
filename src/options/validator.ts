/**
 * Option validation: turns candidate option values into the tagged,
 * complete option map of a resolved contract.
 *
 * Typing is strict: a string is never read as a number, a number never
 * as a boolean. The command-line path parses raw argument strings by the
 * declared type first (parseOptionArgument) and then applies the same
 * checks.
 */

import type { OptionSchema, OptionType, OptionValue, OptionValues } from "../schemas/option.js";
import { RESERVED_OPTION_IDS } from "../schemas/option.js";
import {
  ChoiceViolationError,
  InvalidContractError,
  TypeMismatchError,
  UnknownOptionError,
} from "../errors/index.js";

const TYPE_NAMES: Record<OptionType, string> = {
  int: "an integer",
  float: "a number",
  bool: "a boolean",
  string: "a string",
};

/**
 * Check one value against its option's declared type and choices.
 *
 * @throws TypeMismatchError, ChoiceViolationError
 */
export function validateOptionValue(schema: OptionSchema, value: unknown, contractId?: string): OptionValue {
  const tagged = tagValue(schema.type, value);
  if (!tagged) {
    throw new TypeMismatchError(schema.id, TYPE_NAMES[schema.type], value, contractId);
  }
  if (schema.choices && !schema.choices.some(choice => choice === tagged.value)) {
    throw new ChoiceViolationError(schema.id, tagged.value, schema.choices, contractId);
  }
  return tagged;
}

function tagValue(type: OptionType, value: unknown): OptionValue | undefined {
  switch (type) {
    case "int":
      return typeof value === "number" && Number.isInteger(value) ? { type, value } : undefined;
    case "float":
      return typeof value === "number" && Number.isFinite(value) ? { type, value } : undefined;
    case "bool":
      return typeof value === "boolean" ? { type, value } : undefined;
    case "string":
      return typeof value === "string" ? { type, value } : undefined;
  }
}

/**
 * Validate candidate options against a schema set.
 *
 * - every declared option appears in the result (defaults fill the gaps)
 * - keys absent from the schema set are rejected
 * - reserved ids (`__proto__`, `constructor`, `prototype`) are rejected
 * - result keys follow declaration order
 */
export function validateOptions(
  schemas: readonly OptionSchema[],
  candidate: Readonly<Record<string, unknown>>,
  contractId?: string,
): OptionValues {
  for (const schema of schemas) {
    if (RESERVED_OPTION_IDS.has(schema.id)) {
      throw new InvalidContractError(`Option id '${schema.id}' is reserved`, { contractId, key: schema.id });
    }
  }
  const declared = new Map(schemas.map(s => [s.id, s]));

  for (const id of Object.keys(candidate)) {
    if (!declared.has(id)) {
      throw new UnknownOptionError(id, contractId);
    }
  }

  const resolved: Record<string, OptionValue> = {};
  for (const schema of schemas) {
    const supplied = Object.prototype.hasOwnProperty.call(candidate, schema.id);
    const value = supplied ? candidate[schema.id] : schema.default;
    resolved[schema.id] = Object.freeze(validateOptionValue(schema, value, contractId));
  }
  return Object.freeze(resolved);
}

/**
 * Parse a raw command-line string for an option, then validate it.
 *
 * Accepts "true"/"false" for bool options, integer literals for int
 * options, and any finite decimal for float options.
 */
export function parseOptionArgument(schema: OptionSchema, raw: string, contractId?: string): OptionValue {
  return validateOptionValue(schema, parseRaw(schema.type, raw), contractId);
}

function parseRaw(type: OptionType, raw: string): unknown {
  switch (type) {
    case "int":
      return /^[-+]?\d+$/.test(raw.trim()) ? parseInt(raw, 10) : raw;
    case "float": {
      if (raw.trim() === "") return raw;
      const n = Number(raw);
      return Number.isFinite(n) ? n : raw;
    }
    case "bool":
      if (raw.trim() === "true") return true;
      if (raw.trim() === "false") return false;
      return raw;
    case "string":
      return raw;
  }
}
