import { Command } from "commander";
import { DEFAULT_CONFIG_FILE } from "../config/index.js";
import { registerContractCommands, registerRegistryCommands } from "./commands/contract-commands.js";
import { registerResolveCommands } from "./commands/resolve-commands.js";
import { registerChunkCommands } from "./commands/chunk-commands.js";
import { registerConfigCommands } from "./commands/config-commands.js";

export const VERSION = "0.1.0";

/** The `toolcontract` orchestrator CLI. */
export function createProgram(): Command {
  const program = new Command()
    .name("toolcontract")
    .description("Define, validate and resolve tool contracts")
    .version(VERSION)
    .option("--config <path>", "Resolver config file", DEFAULT_CONFIG_FILE);

  registerContractCommands(program);
  registerRegistryCommands(program);
  registerResolveCommands(program);
  registerChunkCommands(program);
  registerConfigCommands(program);

  return program;
}
