/**
 * Configuration commands.
 */

import type { Command } from "commander";
import { getConfigValue, loadConfig, setConfigValue, validateConfig } from "../../config/index.js";
import { EventLogger } from "../../events/index.js";
import { configPathOf, runReported } from "../cli-utils.js";

/**
 * Register configuration management commands.
 */
export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Resolver configuration (toolcontract.yaml)");

  config
    .command("get <key>")
    .description("Get config value (dot-notation)")
    .action(async (key: string) => runReported(async () => {
      const value = await getConfigValue(configPathOf(program), key);
      if (value === undefined) {
        console.log(`Key '${key}' not found`);
        process.exitCode = 1;
      } else {
        console.log(typeof value === "object" ? JSON.stringify(value, null, 2) : String(value));
      }
    }));

  config
    .command("set <key> <value>")
    .description("Set config value (validates + atomic write)")
    .option("--dry-run", "Preview change without applying", false)
    .action(async (key: string, value: string, opts: { dryRun: boolean }) => runReported(async () => {
      const configPath = configPathOf(program);
      const result = await setConfigValue(configPath, key, value, opts.dryRun);
      const rejected = result.issues.length > 0;

      if (opts.dryRun) {
        console.log(`[DRY RUN] Would update ${key}:`);
      } else if (rejected) {
        console.log("❌ Config change rejected:");
      } else {
        console.log(`✅ Config updated: ${key}`);
      }

      const fmt = (v: unknown) => v === undefined ? "undefined" : typeof v === "object" ? JSON.stringify(v) : String(v);
      console.log(`  ${key}: ${fmt(result.change.oldValue)} → ${fmt(result.change.newValue)}`);

      if (rejected) {
        console.log("\nIssues:");
        for (const issue of result.issues) {
          console.log(`  ✗ ${issue.path}: ${issue.message}`);
        }
        process.exitCode = 1;
        return;
      }

      if (!opts.dryRun) {
        const { eventsDir } = await loadConfig(configPath);
        if (eventsDir) {
          await new EventLogger(eventsDir).log("config.updated", "cli", {
            payload: { key, oldValue: result.change.oldValue, newValue: result.change.newValue },
          });
        }
      }
    }));

  config
    .command("validate")
    .description("Validate the config file")
    .action(async () => runReported(async () => {
      const result = await validateConfig(configPathOf(program));
      if (result.valid) {
        console.log("✅ Config valid");
        return;
      }
      console.log("❌ Schema validation failed:");
      for (const issue of result.issues) {
        console.log(`  ✗ ${issue.path}: ${issue.message}`);
      }
      process.exitCode = 1;
    }));
}
