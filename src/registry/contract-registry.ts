/**
 * Contract registry: the orchestrator's catalog of tool contracts.
 *
 * Populated once at startup (register / loadContractRegistry), then
 * sealed; resolutions only read from it.
 */

import { readdir } from "node:fs/promises";
import { join, resolve } from "node:path";
import { contractKind, type ContractKind, type TaskType, type ToolContract } from "../schemas/tool-contract.js";
import { FileTypeRegistry, BUILTIN_FILE_TYPES } from "../file-types/registry.js";
import { loadToolContract } from "../io/tool-contract-io.js";
import { InvalidContractError, UnknownContractError } from "../errors/index.js";

export interface ContractFilter {
  kind?: ContractKind;
  taskType?: TaskType;
}

export class ContractRegistry {
  private readonly contracts = new Map<string, ToolContract>();
  private sealed = false;

  /**
   * Register a contract.
   *
   * @throws InvalidContractError if the id is already taken or the registry is sealed
   */
  register(contract: ToolContract): void {
    const id = contract.toolContractId;
    if (this.sealed) {
      throw new InvalidContractError("Contract registry is sealed", { contractId: id });
    }
    if (this.contracts.has(id)) {
      throw new InvalidContractError(`Tool contract id '${id}' is already registered`, {
        contractId: id,
        key: "tool_contract_id",
      });
    }
    this.contracts.set(id, contract);
  }

  /** Stop accepting registrations. */
  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  get(id: string): ToolContract | undefined {
    return this.contracts.get(id);
  }

  /** @throws UnknownContractError */
  require(id: string): ToolContract {
    const contract = this.contracts.get(id);
    if (!contract) {
      throw new UnknownContractError(id);
    }
    return contract;
  }

  has(id: string): boolean {
    return this.contracts.has(id);
  }

  /** Contracts sorted by id, optionally filtered by kind and task type. */
  list(filter: ContractFilter = {}): ToolContract[] {
    return Array.from(this.contracts.values())
      .filter(c => filter.kind === undefined || contractKind(c) === filter.kind)
      .filter(c => filter.taskType === undefined || c.taskType === filter.taskType)
      .sort((a, b) => a.toolContractId.localeCompare(b.toolContractId));
  }

  get size(): number {
    return this.contracts.size;
  }
}

/** A contract document that could not be registered. */
export interface ContractLoadFailure {
  path: string;
  error: string;
}

export interface LoadRegistryResult {
  registry: ContractRegistry;
  failures: ContractLoadFailure[];
}

export interface LoadRegistryOptions {
  fileTypes?: FileTypeRegistry;
  /** Leave the registry open for further registrations (default: false). */
  keepOpen?: boolean;
}

/**
 * Load every *.json tool contract document in `dir` (non-recursive).
 *
 * Invalid documents and duplicate ids are reported as failures rather
 * than aborting the whole load. A missing directory yields an empty
 * registry.
 */
export async function loadContractRegistry(dir: string, opts: LoadRegistryOptions = {}): Promise<LoadRegistryResult> {
  const root = resolve(dir);
  const registry = new ContractRegistry();
  const failures: ContractLoadFailure[] = [];

  for (const name of await scanContractFiles(root)) {
    const path = join(root, name);
    try {
      registry.register(await loadToolContract(path, opts.fileTypes ?? BUILTIN_FILE_TYPES));
    } catch (err) {
      failures.push({ path, error: err instanceof Error ? err.message : String(err) });
    }
  }

  if (!opts.keepOpen) {
    registry.seal();
  }
  return { registry, failures };
}

async function scanContractFiles(root: string): Promise<string[]> {
  try {
    const entries = await readdir(root, { withFileTypes: true });
    return entries
      .filter(e => e.isFile() && e.name.endsWith(".json"))
      .map(e => e.name)
      .sort();
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return [];
    }
    throw err;
  }
}
