/**
 * Chunk list commands.
 */

import type { Command } from "commander";
import { loadChunks, loadChunksComment, mergeForGather } from "../../chunks/index.js";
import { loadResolvedToolContract } from "../../io/index.js";
import { ResolutionService } from "../../service/index.js";
import { loadCliConfig, runReported } from "../cli-utils.js";

export function registerChunkCommands(program: Command): void {
  const chunks = program
    .command("chunks")
    .description("Scatter chunk lists");

  chunks
    .command("show <path>")
    .description("Print the chunks of a chunk list")
    .action(async (path: string) => runReported(async () => {
      const list = await loadChunks(path);
      const comment = await loadChunksComment(path);
      if (comment) console.log(`# ${comment}`);
      console.log(`${list.length} chunk(s)`);
      for (const chunk of list) {
        console.log(`  ${chunk.chunkId}`);
        for (const [key, value] of Object.entries(chunk.values)) {
          console.log(`    ${key} = ${value}`);
        }
      }
    }));

  chunks
    .command("merge <path> <key>")
    .description("Print one chunk key's files in chunk list order")
    .action(async (path: string, key: string) => runReported(async () => {
      for (const file of mergeForGather(await loadChunks(path), key)) {
        console.log(file);
      }
    }));

  chunks
    .command("check <resolved-contract> <path>")
    .description("Check a scatter task's chunk list against its resolved contract")
    .action(async (rtcPath: string, path: string) => runReported(async () => {
      const service = await ResolutionService.fromConfig(await loadCliConfig(program));
      const rtc = await loadResolvedToolContract(rtcPath);
      const list = await service.acceptScatterOutput(rtc, path);
      console.log(`✅ ${list.length} chunk(s) match ${rtc.toolContractId}`);
    }));
}
