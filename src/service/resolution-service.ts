/**
 * Resolution service: joins the contract registry, configuration,
 * resolver, document writers and event log for one orchestrator process.
 */

import type { ToolContractConfig } from "../schemas/config.js";
import type { ResolvedToolContract } from "../schemas/resolved-tool-contract.js";
import type { PipelineChunk } from "../schemas/chunk.js";
import { contractKind, type ToolContract } from "../schemas/tool-contract.js";
import { ContractRegistry, loadContractRegistry } from "../registry/contract-registry.js";
import { FileTypeRegistry, loadBuiltinFileTypes, loadFileTypeTable } from "../file-types/registry.js";
import { EventLogger } from "../events/logger.js";
import { resolveContract } from "../resolver/dispatch.js";
import { checkScatterOutput } from "../resolver/scatter.js";
import { loadChunks, writeChunks } from "../chunks/io.js";
import { writeResolvedToolContract } from "../io/tool-contract-io.js";
import { isContractError } from "../errors/index.js";

export interface ResolutionServiceDeps {
  registry: ContractRegistry;
  fileTypes: FileTypeRegistry;
  logger?: EventLogger;
}

export interface ResolveRequest {
  /** Input paths; for gather contracts, the single chunk list path. */
  inputFiles: readonly string[];
  outputDir: string;
  optionOverrides?: Readonly<Record<string, unknown>>;
  outputFiles?: readonly string[];
  invocationId?: string;
  /** Requested chunk count (scatter contracts). */
  nchunks?: number;
  /** Per-request overrides of the configured bounds. */
  maxNproc?: number;
  maxNchunks?: number;
  tmpDir?: string;
  logDir?: string;
  /** Write the resolved contract document here. */
  writeTo?: string;
}

const ACTOR = "resolver";

export class ResolutionService {
  private readonly registry: ContractRegistry;
  private readonly fileTypes: FileTypeRegistry;
  private readonly logger?: EventLogger;
  private readonly config: ToolContractConfig;

  constructor(deps: ResolutionServiceDeps, config: ToolContractConfig) {
    this.registry = deps.registry;
    this.fileTypes = deps.fileTypes;
    this.logger = deps.logger;
    this.config = config;
  }

  /**
   * Build a service from configuration: builtin file types plus the
   * configured extra table, contracts from `contractsDir`, and an event
   * log when `eventsDir` is set. Registries are sealed afterwards.
   */
  static async fromConfig(config: ToolContractConfig): Promise<ResolutionService> {
    const fileTypes = loadBuiltinFileTypes();
    if (config.fileTypes) {
      await loadFileTypeTable(fileTypes, config.fileTypes);
    }
    fileTypes.seal();

    const logger = config.eventsDir ? new EventLogger(config.eventsDir) : undefined;

    let registry = new ContractRegistry().seal();
    if (config.contractsDir) {
      const loaded = await loadContractRegistry(config.contractsDir, { fileTypes });
      registry = loaded.registry;
      await logger?.log("registry.loaded", ACTOR, {
        payload: {
          dir: config.contractsDir,
          contracts: registry.size,
          failures: loaded.failures,
        },
      });
      for (const failure of loaded.failures) {
        console.warn(`[toolcontract] skipped ${failure.path}: ${failure.error}`);
      }
    }

    return new ResolutionService({ registry, fileTypes, logger }, config);
  }

  get contracts(): ContractRegistry {
    return this.registry;
  }

  get fileTypeRegistry(): FileTypeRegistry {
    return this.fileTypes;
  }

  /** Resolve a registered contract for one invocation. */
  async resolve(contractId: string, req: ResolveRequest): Promise<ResolvedToolContract> {
    return this.resolveDefinition(this.registry.require(contractId), req);
  }

  /**
   * Resolve a contract for one invocation. Gather contracts load their
   * chunk list from `inputFiles[0]`.
   *
   * Failures are logged as `contract.resolution_failed` and rethrown.
   */
  async resolveDefinition(contract: ToolContract, req: ResolveRequest): Promise<ResolvedToolContract> {
    const kind = contractKind(contract);

    try {
      let chunks: PipelineChunk[] | undefined;
      const [chunkListPath] = req.inputFiles;
      if (kind === "gather" && chunkListPath !== undefined) {
        chunks = await loadChunks(chunkListPath);
      }

      const rtc = resolveContract(contract, req.inputFiles, {
        outputDir: req.outputDir,
        maxNproc: req.maxNproc ?? this.config.maxNproc,
        maxNchunks: req.maxNchunks ?? this.config.maxNchunks,
        nchunks: req.nchunks,
        tmpDir: req.tmpDir ?? this.config.tmpDir,
        logDir: req.logDir ?? this.config.logDir,
        optionOverrides: req.optionOverrides,
        outputFiles: req.outputFiles,
        invocationId: req.invocationId,
        fileTypes: this.fileTypes,
        chunks,
      });

      if (req.writeTo) {
        await writeResolvedToolContract(rtc, req.writeTo);
      }

      await this.logger?.log("contract.resolved", ACTOR, {
        taskId: rtc.toolContractId,
        payload: {
          kind,
          nproc: rtc.nproc,
          inputFiles: rtc.inputFiles,
          outputFiles: rtc.outputFiles,
          ...(req.writeTo ? { path: req.writeTo } : {}),
          ...(rtc.scatter ? { nchunks: rtc.scatter.nchunks } : {}),
          ...(rtc.gather ? { chunks: rtc.gather.chunkFiles.length } : {}),
        },
      });
      return rtc;
    } catch (err) {
      await this.logger?.log("contract.resolution_failed", ACTOR, {
        taskId: contract.toolContractId,
        payload: isContractError(err)
          ? { error: err.name, stage: err.stage, key: err.key ?? null, message: err.message }
          : { error: "Error", message: err instanceof Error ? err.message : String(err) },
      });
      throw err;
    }
  }

  /** Load the chunk list a scatter task wrote and check it against its resolved contract. */
  async acceptScatterOutput(rtc: ResolvedToolContract, chunkListPath: string): Promise<PipelineChunk[]> {
    const chunks = await loadChunks(chunkListPath);
    checkScatterOutput(rtc, chunks);
    await this.logger?.log("chunks.loaded", ACTOR, {
      taskId: rtc.toolContractId,
      payload: { path: chunkListPath, nchunks: chunks.length },
    });
    return chunks;
  }

  /** Write a chunk list on behalf of a scatter task. */
  async writeChunks(taskId: string, chunks: readonly PipelineChunk[], path: string, comment?: string): Promise<void> {
    await writeChunks(chunks, path, comment);
    await this.logger?.log("chunks.written", ACTOR, {
      taskId,
      payload: { path, nchunks: chunks.length },
    });
  }
}
