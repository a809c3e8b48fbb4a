/**
 * Contract and registry inspection commands.
 */

import type { Command } from "commander";
import { contractKind, ContractKind, TaskType, type ToolContract } from "../../schemas/tool-contract.js";
import { lintToolContract } from "../../contracts/index.js";
import { loadContractRegistry } from "../../registry/index.js";
import { loadToolContract } from "../../io/index.js";
import { ResolutionService } from "../../service/index.js";
import { loadCliConfig, runReported } from "../cli-utils.js";

export function registerContractCommands(program: Command): void {
  const contract = program
    .command("contract")
    .description("Tool contract documents");

  contract
    .command("validate <path>")
    .description("Load a tool contract document and run the linter")
    .action(async (path: string) => runReported(async () => {
      const service = await ResolutionService.fromConfig(await loadCliConfig(program));
      const tc = await loadToolContract(path, service.fileTypeRegistry);
      // Errors already failed the load; only warnings remain.
      for (const issue of lintToolContract(tc, service.fileTypeRegistry)) {
        console.log(`  ⚠ [${issue.rule}] ${issue.path}: ${issue.message}`);
      }
      console.log(`✅ ${tc.toolContractId} (${contractKind(tc)}) is valid`);
    }));

  contract
    .command("show <path>")
    .description("Summarize a tool contract document")
    .action(async (path: string) => runReported(async () => {
      const service = await ResolutionService.fromConfig(await loadCliConfig(program));
      const tc = await loadToolContract(path, service.fileTypeRegistry);
      for (const line of describeContract(tc)) {
        console.log(line);
      }
    }));
}

export function registerRegistryCommands(program: Command): void {
  const registry = program
    .command("registry")
    .description("Tool contract registries");

  registry
    .command("list <dir>")
    .description("List the tool contracts in a directory")
    .option("--kind <kind>", "Only standard|scatter|gather contracts")
    .option("--task-type <type>", "Only local|distributed contracts")
    .action(async (dir: string, opts: { kind?: string; taskType?: string }) => runReported(async () => {
      const kind = opts.kind === undefined ? undefined : ContractKind.safeParse(opts.kind);
      const taskType = opts.taskType === undefined ? undefined : TaskType.safeParse(opts.taskType);
      if (kind?.success === false || taskType?.success === false) {
        console.error("❌ --kind must be standard|scatter|gather and --task-type local|distributed");
        process.exitCode = 1;
        return;
      }

      const service = await ResolutionService.fromConfig(await loadCliConfig(program));
      const { registry: loaded, failures } = await loadContractRegistry(dir, {
        fileTypes: service.fileTypeRegistry,
      });
      const contracts = loaded.list({ kind: kind?.data, taskType: taskType?.data });

      if (contracts.length === 0) {
        console.log(`No tool contracts in ${dir}`);
      }
      for (const tc of contracts) {
        console.log(`${tc.toolContractId.padEnd(40)} ${contractKind(tc).padEnd(9)} ${tc.taskType.padEnd(12)} ${tc.version}`);
      }
      for (const failure of failures) {
        console.log(`  ⚠ ${failure.path}: ${failure.error}`);
      }
      if (failures.length > 0) process.exitCode = 1;
    }));
}

/** Human-readable summary lines for one contract. */
export function describeContract(tc: ToolContract): string[] {
  const lines = [
    `${tc.toolContractId} v${tc.version} (${contractKind(tc)}, ${tc.taskType})`,
  ];
  if (tc.name) lines.push(`  name:        ${tc.name}`);
  if (tc.description) lines.push(`  description: ${tc.description}`);
  lines.push(`  driver:      ${tc.driver.exe}`);
  lines.push(`  nproc:       ${tc.nproc}`);

  lines.push("  inputs:");
  tc.inputTypes.forEach((slot, i) => lines.push(`    [${i}] ${slot.label} <${slot.fileTypeId}>`));
  lines.push("  outputs:");
  tc.outputTypes.forEach((slot, i) => lines.push(`    [${i}] ${slot.label} <${slot.fileTypeId}>`));

  if (tc.options.length > 0) {
    lines.push("  options:");
    for (const opt of tc.options) {
      const choices = opt.choices ? ` one of ${opt.choices.join("|")}` : "";
      lines.push(`    ${opt.id} (${opt.type}, default ${String(opt.default)})${choices}`);
    }
  }
  if (tc.resourceTypes.length > 0) {
    lines.push(`  resources:   ${tc.resourceTypes.join(", ")}`);
  }
  if (tc.scatter) {
    lines.push(`  scatter:     keys ${tc.scatter.chunkKeys.join(", ")}; max_nchunks ${tc.scatter.maxNchunks}`);
  }
  if (tc.gather) {
    lines.push(`  gather:      key ${tc.gather.chunkKey}`);
  }
  return lines;
}
