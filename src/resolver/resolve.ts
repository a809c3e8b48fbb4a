/**
 * Resolver: turns a symbolic ToolContract plus one invocation's concrete
 * values into a ResolvedToolContract.
 *
 * Resolution is synchronous and performs no I/O. It either returns a
 * complete, frozen contract or throws a ContractError tagged with the
 * stage that failed (arity, resource, option, chunk).
 */

import { join } from "node:path";
import { randomUUID } from "node:crypto";
import type { ResolvedToolContract } from "../schemas/resolved-tool-contract.js";
import {
  Symbols,
  type MaxNchunks,
  type Nproc,
  type ToolContract,
} from "../schemas/tool-contract.js";
import { defaultFileName } from "../schemas/file-type.js";
import { FileTypeRegistry, BUILTIN_FILE_TYPES } from "../file-types/registry.js";
import { validateOptions } from "../options/validator.js";
import { deepFreeze } from "../contracts/define.js";
import { ArityError, InvalidContractError, ResourceBoundError } from "../errors/index.js";
import { synthesizeResources } from "./resources.js";

export interface ResolveOptions {
  /** Directory output files are written to. */
  outputDir: string;
  /** Processors available to this invocation. */
  maxNproc: number;
  /** Root for synthesized temp files and directories. */
  tmpDir: string;
  /** Root for log files (default: <outputDir>/logs). */
  logDir?: string;
  /** Option values keyed by option id; undeclared options are defaulted. */
  optionOverrides?: Readonly<Record<string, unknown>>;
  /** Explicit output paths, replacing <outputDir>/<defaultName>. */
  outputFiles?: readonly string[];
  /** Unique id of this invocation (default: random). */
  invocationId?: string;
  fileTypes?: FileTypeRegistry;
}

/** Resolve a literal-or-symbol nproc against the available processors. */
export function resolveNproc(nproc: Nproc, maxNproc: number, contractId?: string): number {
  if (!Number.isInteger(maxNproc) || maxNproc < 1) {
    throw new ResourceBoundError("max_nproc", `max_nproc must be a positive integer, got ${maxNproc}`, contractId);
  }
  if (nproc === Symbols.MAX_NPROC) {
    return maxNproc;
  }
  if (nproc < 1) {
    throw new ResourceBoundError("nproc", `nproc must be at least 1, got ${nproc}`, contractId);
  }
  // A tool that declares N processors may depend on having N; never run it with fewer.
  if (nproc > maxNproc) {
    throw new ResourceBoundError("nproc", `Contract requires ${nproc} processors but only ${maxNproc} are available`, contractId);
  }
  return nproc;
}

/**
 * Resolve a literal-or-symbol chunk ceiling. `$max_nchunks` becomes the
 * caller's ceiling; a literal above the ceiling is lowered to it.
 */
export function resolveMaxNchunks(maxNchunks: MaxNchunks, ceiling: number, contractId?: string): number {
  if (!Number.isInteger(ceiling) || ceiling < 1) {
    throw new ResourceBoundError("max_nchunks", `max_nchunks ceiling must be a positive integer, got ${ceiling}`, contractId);
  }
  if (maxNchunks === Symbols.MAX_NCHUNKS) {
    return ceiling;
  }
  if (maxNchunks < 1) {
    throw new ResourceBoundError("max_nchunks", `max_nchunks must be at least 1, got ${maxNchunks}`, contractId);
  }
  return Math.min(maxNchunks, ceiling);
}

/** Output paths for every declared output slot, in slot order. */
export function resolveOutputFiles(
  contract: ToolContract,
  outputDir: string,
  fileTypes: FileTypeRegistry = BUILTIN_FILE_TYPES,
): string[] {
  return contract.outputTypes.map((slot, i) => {
    if (slot.defaultName) {
      return join(outputDir, slot.defaultName);
    }
    const fileType = fileTypes.get(slot.fileTypeId);
    if (!fileType) {
      throw new InvalidContractError(`Output '${slot.label}' uses unknown file type '${slot.fileTypeId}'`, {
        contractId: contract.toolContractId,
        key: `outputTypes.${i}`,
      });
    }
    return join(outputDir, defaultFileName(fileType));
  });
}

/**
 * Resolve the fields every contract kind shares. Scatter and gather
 * fields are left unresolved; see resolveScatterToolContract and
 * resolveGatherFromChunks.
 *
 * @throws ArityError, ResourceBoundError, UnknownOptionError,
 *   TypeMismatchError, ChoiceViolationError
 */
export function resolveToolContract(
  contract: ToolContract,
  inputFiles: readonly string[],
  opts: ResolveOptions,
): ResolvedToolContract {
  return deepFreeze(resolveBase(contract, inputFiles, opts));
}

/** Unfrozen base resolution, extended by the scatter/gather resolvers before freezing. */
export function resolveBase(
  contract: ToolContract,
  inputFiles: readonly string[],
  opts: ResolveOptions,
): ResolvedToolContract {
  const contractId = contract.toolContractId;

  if (inputFiles.length !== contract.inputTypes.length) {
    throw new ArityError("input_files", contract.inputTypes.length, inputFiles.length, contractId);
  }

  let outputFiles: string[];
  if (opts.outputFiles) {
    if (opts.outputFiles.length !== contract.outputTypes.length) {
      throw new ArityError("output_files", contract.outputTypes.length, opts.outputFiles.length, contractId);
    }
    outputFiles = [...opts.outputFiles];
  } else {
    outputFiles = resolveOutputFiles(contract, opts.outputDir, opts.fileTypes);
  }

  const nproc = resolveNproc(contract.nproc, opts.maxNproc, contractId);

  const resources = synthesizeResources(contract.resourceTypes, {
    toolContractId: contractId,
    invocationId: opts.invocationId ?? randomUUID().slice(0, 8),
    tmpDir: opts.tmpDir,
    logDir: opts.logDir ?? join(opts.outputDir, "logs"),
  });

  const options = validateOptions(contract.options, opts.optionOverrides ?? {}, contractId);

  return {
    toolContractId: contractId,
    taskType: contract.taskType,
    inputFiles: [...inputFiles],
    outputFiles,
    options,
    nproc,
    resources,
    driver: { exe: contract.driver.exe, env: { ...contract.driver.env } },
  };
}
