/**
 * Resolution commands: turn a tool contract plus invocation values into a
 * resolved tool contract document.
 */

import type { Command } from "commander";
import type { ToolContract } from "../../schemas/tool-contract.js";
import type { ResolvedToolContract } from "../../schemas/resolved-tool-contract.js";
import { resolvedToolContractToDocument } from "../../io/index.js";
import { parseOptionArgument } from "../../options/index.js";
import { ResolutionService, type ResolveRequest } from "../../service/index.js";
import { collectPair, contractFromArg, loadCliConfig, parseCount, runReported } from "../cli-utils.js";

interface ResolveFlags {
  outputDir: string;
  option: Array<[string, string]>;
  output?: string[];
  maxNproc?: number;
  maxNchunks?: number;
  nchunks?: number;
  tmpDir?: string;
  logDir?: string;
  invocationId?: string;
  out?: string;
}

function withResolveFlags(cmd: Command): Command {
  return cmd
    .requiredOption("-o, --output-dir <dir>", "Directory for output files")
    .option("--option <id=value>", "Option value (repeatable)", collectPair, [])
    .option("--output <paths...>", "Explicit output paths (one per output slot)")
    .option("--max-nproc <n>", "Processors available (default: config maxNproc)", parseCount)
    .option("--max-nchunks <n>", "Chunk ceiling (default: config maxNchunks)", parseCount)
    .option("--tmp-dir <dir>", "Root for temp resources (default: config tmpDir)")
    .option("--log-dir <dir>", "Root for log files (default: <output-dir>/logs)")
    .option("--invocation-id <id>", "Invocation id used in resource paths")
    .option("--out <path>", "Write the resolved contract here instead of stdout");
}

/**
 * Option overrides from `--option id=value` pairs. Declared options are
 * parsed by type; undeclared ids are passed through so resolution
 * reports them.
 */
export function optionOverridesFromPairs(
  contract: ToolContract,
  pairs: ReadonlyArray<readonly [string, string]>,
): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  for (const [id, raw] of pairs) {
    const schema = contract.options.find(o => o.id === id);
    overrides[id] = schema ? parseOptionArgument(schema, raw, contract.toolContractId).value : raw;
  }
  return overrides;
}

function requestFromFlags(contract: ToolContract, inputFiles: string[], flags: ResolveFlags): ResolveRequest {
  return {
    inputFiles,
    outputDir: flags.outputDir,
    optionOverrides: optionOverridesFromPairs(contract, flags.option),
    outputFiles: flags.output,
    maxNproc: flags.maxNproc,
    maxNchunks: flags.maxNchunks,
    nchunks: flags.nchunks,
    tmpDir: flags.tmpDir,
    logDir: flags.logDir,
    invocationId: flags.invocationId,
    writeTo: flags.out,
  };
}

function report(rtc: ResolvedToolContract, out: string | undefined): void {
  if (out) {
    console.log(`✅ Resolved ${rtc.toolContractId} → ${out}`);
    for (const file of rtc.outputFiles) {
      console.log(`   output: ${file}`);
    }
  } else {
    console.log(JSON.stringify(resolvedToolContractToDocument(rtc), null, 4));
  }
}

export function registerResolveCommands(program: Command): void {
  withResolveFlags(
    program
      .command("resolve <contract>")
      .description("Resolve a tool contract (.json path or registered id)")
      .option("-i, --input <paths...>", "Input files, one per input slot", [])
      .option("--nchunks <n>", "Chunks to request (scatter contracts)", parseCount),
  ).action(async (ref: string, flags: ResolveFlags & { input: string[] }) => runReported(async () => {
    const service = await ResolutionService.fromConfig(await loadCliConfig(program));
    const contract = await contractFromArg(service, ref);
    const rtc = await service.resolveDefinition(contract, requestFromFlags(contract, flags.input, flags));
    report(rtc, flags.out);
  }));

  withResolveFlags(
    program
      .command("gather <contract> <chunk-list>")
      .description("Resolve a gather contract against a chunk list"),
  ).action(async (ref: string, chunkList: string, flags: ResolveFlags) => runReported(async () => {
    const service = await ResolutionService.fromConfig(await loadCliConfig(program));
    const contract = await contractFromArg(service, ref);
    const rtc = await service.resolveDefinition(contract, requestFromFlags(contract, [chunkList], flags));
    report(rtc, flags.out);
  }));
}
