/**
 * Tool contract linter: checks the invariants a contract must hold
 * before it can be registered or resolved.
 */

import type { OptionSchema } from "../schemas/option.js";
import { OPTION_ID_REGEX, RESERVED_OPTION_IDS } from "../schemas/option.js";
import { CHUNK_FILE_TYPE_ID } from "../schemas/file-type.js";
import {
  CHUNK_KEY_PREFIX,
  MULTI_VALUED_RESOURCES,
  SEMVER_REGEX,
  TOOL_CONTRACT_ID_REGEX,
  type ResourceType,
  type ToolContract,
} from "../schemas/tool-contract.js";
import { FileTypeRegistry, BUILTIN_FILE_TYPES } from "../file-types/registry.js";
import { validateOptionValue } from "../options/validator.js";
import { isContractError } from "../errors/index.js";

export interface LintIssue {
  severity: "error" | "warning";
  rule: string;
  message: string;
  path?: string;
}

/** Check one option declaration: id format, default type, choices. */
export function lintOptionSchema(option: OptionSchema, path = "options"): LintIssue[] {
  const issues: LintIssue[] = [];

  if (!OPTION_ID_REGEX.test(option.id)) {
    issues.push({
      severity: "error",
      rule: "option-id-format",
      message: `Option id '${option.id}' must be dot-separated [A-Za-z0-9_] segments`,
      path,
    });
  }

  if (RESERVED_OPTION_IDS.has(option.id)) {
    issues.push({
      severity: "error",
      rule: "option-id-reserved",
      message: `Option id '${option.id}' is reserved`,
      path,
    });
  }

  if (option.type === "bool" && option.choices) {
    issues.push({
      severity: "error",
      rule: "option-choices",
      message: `Option '${option.id}' is a bool option and cannot declare choices`,
      path,
    });
  }

  for (const choice of option.choices ?? []) {
    try {
      validateOptionValue({ ...option, choices: undefined }, choice);
    } catch (err) {
      if (!isContractError(err)) throw err;
      issues.push({
        severity: "error",
        rule: "option-choices",
        message: `Choice ${JSON.stringify(choice)} of option '${option.id}' is not a ${option.type}`,
        path,
      });
    }
  }

  try {
    validateOptionValue(option, option.default);
  } catch (err) {
    if (!isContractError(err)) throw err;
    issues.push({
      severity: "error",
      rule: "option-default",
      message: `Default of option '${option.id}' is invalid: ${err.message}`,
      path,
    });
  }

  return issues;
}

/**
 * Lint a tool contract.
 *
 * Errors make the contract unusable; warnings are advisory.
 */
export function lintToolContract(
  contract: ToolContract,
  fileTypes: FileTypeRegistry = BUILTIN_FILE_TYPES,
): LintIssue[] {
  const issues: LintIssue[] = [];
  const error = (rule: string, message: string, path?: string) =>
    issues.push({ severity: "error", rule, message, path });

  if (!TOOL_CONTRACT_ID_REGEX.test(contract.toolContractId)) {
    error(
      "tool-contract-id-format",
      `Tool contract id '${contract.toolContractId}' must look like <namespace>.tasks.<name>`,
      "toolContractId",
    );
  }

  if (!SEMVER_REGEX.test(contract.version)) {
    error("version-format", `Version '${contract.version}' is not a semantic version`, "version");
  }

  contract.inputTypes.forEach((slot, i) => {
    if (!fileTypes.has(slot.fileTypeId)) {
      error("unknown-file-type", `Input '${slot.label}' uses unknown file type '${slot.fileTypeId}'`, `inputTypes.${i}`);
    }
  });
  contract.outputTypes.forEach((slot, i) => {
    if (!fileTypes.has(slot.fileTypeId)) {
      error("unknown-file-type", `Output '${slot.label}' uses unknown file type '${slot.fileTypeId}'`, `outputTypes.${i}`);
    }
  });

  const seen = new Set<string>();
  contract.options.forEach((option, i) => {
    if (seen.has(option.id)) {
      error("duplicate-option-id", `Option '${option.id}' is declared more than once`, `options.${i}`);
    }
    seen.add(option.id);
    issues.push(...lintOptionSchema(option, `options.${i}`));
  });

  if (typeof contract.nproc === "number" && contract.nproc < 1) {
    error("nproc-positive", `nproc must be at least 1, got ${contract.nproc}`, "nproc");
  }

  const resourceCounts = new Map<ResourceType, number>();
  for (const resource of contract.resourceTypes) {
    resourceCounts.set(resource, (resourceCounts.get(resource) ?? 0) + 1);
  }
  for (const [resource, count] of resourceCounts) {
    if (count > 1 && !MULTI_VALUED_RESOURCES.has(resource)) {
      error("duplicate-log-file", `Resource '${resource}' may be requested only once`, "resourceTypes");
    }
  }

  if (contract.scatter && contract.gather) {
    error("scatter-gather-exclusive", "A contract cannot be both a scatter and a gather task");
  }

  if (contract.scatter) {
    const { chunkKeys, maxNchunks } = contract.scatter;
    if (chunkKeys.length === 0) {
      error("scatter-chunk-keys", "Scatter contracts must declare at least one chunk key", "scatter.chunkKeys");
    }
    for (const key of chunkKeys) {
      if (!key.startsWith(CHUNK_KEY_PREFIX) || key.length === CHUNK_KEY_PREFIX.length) {
        error("scatter-chunk-keys", `Chunk key '${key}' must start with '${CHUNK_KEY_PREFIX}'`, "scatter.chunkKeys");
      }
    }
    if (new Set(chunkKeys).size !== chunkKeys.length) {
      error("scatter-chunk-keys", "Chunk keys must be unique", "scatter.chunkKeys");
    }
    if (typeof maxNchunks === "number" && maxNchunks < 1) {
      error("scatter-max-nchunks", `max_nchunks must be at least 1, got ${maxNchunks}`, "scatter.maxNchunks");
    }
  }

  if (contract.gather) {
    const chunkInput = contract.inputTypes.length === 1 && contract.inputTypes[0]?.fileTypeId === CHUNK_FILE_TYPE_ID;
    if (!chunkInput) {
      error("gather-chunk-input", `Gather contracts take exactly one input of type '${CHUNK_FILE_TYPE_ID}'`, "inputTypes");
    }
    if (contract.outputTypes.length !== 1) {
      error(
        "gather-single-output",
        `Gather contracts declare exactly one output, found ${contract.outputTypes.length}`,
        "outputTypes",
      );
    }
    const key = contract.gather.chunkKey;
    if (!key.startsWith(CHUNK_KEY_PREFIX) || key.length === CHUNK_KEY_PREFIX.length) {
      error("gather-chunk-key", `Chunk key '${key}' must start with '${CHUNK_KEY_PREFIX}'`, "gather.chunkKey");
    }
  }

  if (contract.outputTypes.length === 0) {
    issues.push({
      severity: "warning",
      rule: "no-outputs",
      message: "Contract declares no outputs",
      path: "outputTypes",
    });
  }

  return issues;
}
