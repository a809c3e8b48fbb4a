/**
 * Tool-side adapter: a commander program for a tool described by a
 * contract.
 *
 * The same program runs three ways:
 *   tool --emit-tool-contract                 prints the contract document
 *   tool --resolved-tool-contract rtc.json    runs from a resolved contract
 *   tool in.fasta [out.fasta] --<option> v    resolves from the command line
 */

import { tmpdir } from "node:os";
import { Command, Option } from "commander";
import type { ToolContract } from "../schemas/tool-contract.js";
import type { ResolvedToolContract } from "../schemas/resolved-tool-contract.js";
import type { PipelineChunk } from "../schemas/chunk.js";
import { contractKind } from "../schemas/tool-contract.js";
import { FileTypeRegistry, BUILTIN_FILE_TYPES } from "../file-types/index.js";
import { parseOptionArgument } from "../options/index.js";
import { resolveContract } from "../resolver/index.js";
import { loadChunks } from "../chunks/index.js";
import { loadResolvedToolContract, toolContractToDocument } from "../io/index.js";
import { ArityError } from "../errors/index.js";
import { parseCount } from "./cli-utils.js";

export type ToolHandler = (rtc: ResolvedToolContract) => Promise<void> | void;

export interface ToolProgramOptions {
  /** Processors available when resolving from the command line (default 1). */
  maxNproc?: number;
  /** Chunk ceiling for scatter tools (default 24). */
  maxNchunks?: number;
  tmpDir?: string;
  fileTypes?: FileTypeRegistry;
  /** Where the emitted contract document goes (default: stdout). */
  write?: (text: string) => void;
}

interface RunnerFlags {
  emitToolContract: boolean;
  resolvedToolContract?: string;
  outputDir: string;
  nproc?: number;
  nchunks?: number;
  tmpDir?: string;
  invocationId?: string;
}

export function createToolProgram(
  contract: ToolContract,
  handler: ToolHandler,
  opts: ToolProgramOptions = {},
): Command {
  const cid = contract.toolContractId;
  const write = opts.write ?? ((text: string) => console.log(text));

  const program = new Command()
    .name(cid)
    .description(contract.description || contract.name || cid)
    .version(contract.version)
    .argument("[files...]", `${contract.inputTypes.length} input path(s), then optional output path(s)`)
    .option("--emit-tool-contract", "Print the tool contract document and exit", false)
    .option("--resolved-tool-contract <path>", "Run from a resolved tool contract document")
    .option("--output-dir <dir>", "Directory for default-named outputs", ".")
    .option("--nproc <n>", "Processors available", parseCount)
    .option("--tmp-dir <dir>", "Root for temp resources")
    .option("--invocation-id <id>", "Invocation id used in resource paths");

  if (contractKind(contract) === "scatter") {
    program.option("--nchunks <n>", "Chunks to emit", parseCount);
  }

  const optionAttributes = new Map<string, string>();
  for (const schema of contract.options) {
    const flag = new Option(`--${schema.id} <value>`, schema.title)
      .argParser((raw: string) => parseOptionArgument(schema, raw, cid).value);
    optionAttributes.set(schema.id, flag.attributeName());
    program.addOption(flag);
  }

  program.action(async (files: string[], flags: RunnerFlags) => {
    if (flags.emitToolContract) {
      write(JSON.stringify(toolContractToDocument(contract), null, 4));
      return;
    }

    if (flags.resolvedToolContract) {
      await handler(await loadResolvedToolContract(flags.resolvedToolContract, contract));
      return;
    }

    const values = program.opts<Record<string, unknown>>();
    const optionOverrides: Record<string, unknown> = {};
    for (const [id, attribute] of optionAttributes) {
      if (values[attribute] !== undefined) {
        optionOverrides[id] = values[attribute];
      }
    }

    const nInputs = contract.inputTypes.length;
    if (files.length < nInputs) {
      throw new ArityError("input_files", nInputs, files.length, cid);
    }
    const inputFiles = files.slice(0, nInputs);
    const outputFiles = files.length > nInputs ? files.slice(nInputs) : undefined;

    let chunks: PipelineChunk[] | undefined;
    const [chunkListPath] = inputFiles;
    if (contractKind(contract) === "gather" && chunkListPath !== undefined) {
      chunks = await loadChunks(chunkListPath);
    }

    const rtc = resolveContract(contract, inputFiles, {
      outputDir: flags.outputDir,
      maxNproc: flags.nproc ?? opts.maxNproc ?? 1,
      maxNchunks: opts.maxNchunks ?? 24,
      nchunks: flags.nchunks,
      tmpDir: flags.tmpDir ?? opts.tmpDir ?? tmpdir(),
      optionOverrides,
      outputFiles,
      invocationId: flags.invocationId,
      fileTypes: opts.fileTypes ?? BUILTIN_FILE_TYPES,
      chunks,
    });
    await handler(rtc);
  });

  return program;
}
