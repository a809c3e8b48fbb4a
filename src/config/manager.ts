/**
 * Config manager: load, read and change the resolver configuration.
 *
 * Config lives in one YAML file. Changes go through setConfigValue,
 * which validates the whole document before writing it atomically.
 */

import { readFile } from "node:fs/promises";
import writeFileAtomic from "write-file-atomic";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { ToolContractConfig } from "../schemas/config.js";
import { MalformedDocumentError } from "../errors/index.js";

export const DEFAULT_CONFIG_FILE = "toolcontract.yaml";

/** Environment variables that override file values. */
export const CONFIG_ENV = {
  maxNproc: "TOOLCONTRACT_MAX_NPROC",
  maxNchunks: "TOOLCONTRACT_MAX_NCHUNKS",
  tmpDir: "TOOLCONTRACT_TMP_DIR",
  eventsDir: "TOOLCONTRACT_EVENTS_DIR",
} as const;

export interface ConfigChange {
  key: string;
  oldValue: unknown;
  newValue: unknown;
}

export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * Load the configuration.
 *
 * A missing file yields defaults; environment overrides are applied on
 * top of the file before validation.
 *
 * @throws MalformedDocumentError for unparsable YAML or invalid values
 */
export async function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<ToolContractConfig> {
  const raw = configPath ? await readRawConfig(configPath) : {};
  const source = configPath ?? "<defaults>";

  const merged: Record<string, unknown> = { ...raw };
  for (const key of ["maxNproc", "maxNchunks"] as const) {
    const value = env[CONFIG_ENV[key]];
    if (value !== undefined && value !== "") {
      merged[key] = /^\d+$/.test(value) ? parseInt(value, 10) : value;
    }
  }
  for (const key of ["tmpDir", "eventsDir"] as const) {
    const value = env[CONFIG_ENV[key]];
    if (value !== undefined && value !== "") {
      merged[key] = value;
    }
  }

  const result = ToolContractConfig.safeParse(merged);
  if (!result.success) {
    throw new MalformedDocumentError(
      source,
      result.error.issues.map(i => `${i.path.join(".")}: ${i.message}`),
    );
  }
  return result.data;
}

async function readRawConfig(configPath: string): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await readFile(configPath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return {};
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new MalformedDocumentError(configPath, [(err as Error).message]);
  }
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new MalformedDocumentError(configPath, ["config must be a YAML mapping"]);
  }
  return parsed;
}

/**
 * Get a value from the config file using a dot-notation path.
 * Returns undefined for keys not set in the file.
 */
export async function getConfigValue(configPath: string, key: string): Promise<unknown> {
  return resolveKeyPath(await readRawConfig(configPath), key);
}

/**
 * Set a value in the config file using a dot-notation path.
 * The whole config is validated after the change; nothing is written
 * when validation fails or in dry-run mode.
 */
export async function setConfigValue(
  configPath: string,
  key: string,
  value: string,
  dryRun: boolean = false,
): Promise<{ change: ConfigChange; issues: ConfigIssue[] }> {
  const raw = await readRawConfig(configPath);
  const oldValue = resolveKeyPath(raw, key);
  const parsedValue = parseValue(value);

  setKeyPath(raw, key, parsedValue);

  const change = { key, oldValue, newValue: parsedValue };
  const result = ToolContractConfig.safeParse(raw);
  if (!result.success) {
    return {
      change,
      issues: result.error.issues.map(i => ({ path: i.path.join("."), message: i.message })),
    };
  }

  if (!dryRun) {
    await writeFileAtomic(configPath, stringifyYaml(raw, { lineWidth: 120 }), { encoding: "utf-8" });
  }
  return { change, issues: [] };
}

/** Validate the config file (schema only). */
export async function validateConfig(configPath: string): Promise<{ valid: boolean; issues: ConfigIssue[] }> {
  const result = ToolContractConfig.safeParse(await readRawConfig(configPath));
  if (result.success) {
    return { valid: true, issues: [] };
  }
  return {
    valid: false,
    issues: result.error.issues.map(i => ({ path: i.path.join("."), message: i.message })),
  };
}

// --- Helpers ---

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function resolveKeyPath(obj: Record<string, unknown>, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split(".")) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return current;
}

function setKeyPath(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  const lastKey = parts.pop();
  if (lastKey === undefined) return;

  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[lastKey] = value;
}

/** Parse a string value into the appropriate type. */
function parseValue(value: string): unknown {
  if (value === "true") return true;
  if (value === "false") return false;
  if (value === "null") return null;
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  if (/^\d+\.\d+$/.test(value)) return parseFloat(value);
  // Remove surrounding quotes
  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    return value.slice(1, -1);
  }
  return value;
}
