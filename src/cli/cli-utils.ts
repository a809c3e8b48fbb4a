/**
 * Shared helpers for CLI commands.
 */

import { InvalidArgumentError, type Command } from "commander";
import type { ToolContractConfig } from "../schemas/config.js";
import type { ToolContract } from "../schemas/tool-contract.js";
import { DEFAULT_CONFIG_FILE, loadConfig } from "../config/index.js";
import { ResolutionService } from "../service/index.js";
import { loadToolContract } from "../io/index.js";
import { isContractError } from "../errors/index.js";

/** Path of the config file named by the global --config flag. */
export function configPathOf(program: Command): string {
  return program.opts<{ config?: string }>().config ?? DEFAULT_CONFIG_FILE;
}

export async function loadCliConfig(program: Command): Promise<ToolContractConfig> {
  return loadConfig(configPathOf(program));
}

/** Commander arg parser for counts (nproc, chunks). */
export function parseCount(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Not a non-negative integer.");
  }
  return parseInt(value, 10);
}

/** Commander collector for repeated `--option id=value` flags. */
export function collectPair(value: string, previous: Array<[string, string]>): Array<[string, string]> {
  const eq = value.indexOf("=");
  if (eq <= 0) {
    throw new InvalidArgumentError(`Expected id=value, got '${value}'.`);
  }
  return [...previous, [value.slice(0, eq), value.slice(eq + 1)]];
}

/**
 * A contract named on the command line: a `.json` path is loaded from
 * disk, anything else is looked up in the configured registry.
 */
export async function contractFromArg(service: ResolutionService, ref: string): Promise<ToolContract> {
  if (ref.endsWith(".json")) {
    return loadToolContract(ref, service.fileTypeRegistry);
  }
  return service.contracts.require(ref);
}

/**
 * Run a command action, reporting contract errors as a ❌ line and a
 * non-zero exit code. Anything else propagates.
 */
export async function runReported(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    if (!isContractError(err)) throw err;
    console.error(`❌ ${err.name}: ${err.message}`);
    process.exitCode = 1;
  }
}
