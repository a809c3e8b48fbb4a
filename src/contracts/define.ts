/**
 * Contract authoring: build a validated, frozen ToolContract from a
 * plain object literal.
 */

import { ToolContract, type ToolContractInput } from "../schemas/tool-contract.js";
import { FileTypeRegistry, BUILTIN_FILE_TYPES } from "../file-types/registry.js";
import { InvalidContractError } from "../errors/index.js";
import { lintToolContract } from "./lint.js";

/**
 * Parse, default and lint a tool contract.
 *
 * @throws InvalidContractError listing every schema error or lint error
 */
export function defineToolContract(
  input: ToolContractInput,
  fileTypes: FileTypeRegistry = BUILTIN_FILE_TYPES,
): ToolContract {
  const result = ToolContract.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join(".")}: ${i.message}`);
    throw new InvalidContractError(`Invalid tool contract: ${issues.join("; ")}`, {
      contractId: input.toolContractId,
      issues,
    });
  }

  const errors = lintToolContract(result.data, fileTypes).filter(i => i.severity === "error");
  if (errors.length > 0) {
    const issues = errors.map(i => `[${i.rule}] ${i.message}`);
    throw new InvalidContractError(`Invalid tool contract: ${issues.join("; ")}`, {
      contractId: result.data.toolContractId,
      key: errors[0]?.path,
      issues,
    });
  }

  return deepFreeze(result.data);
}

/**
 * Recursively freeze a plain data structure. Already-frozen nodes are
 * still walked, since their children may not be.
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
