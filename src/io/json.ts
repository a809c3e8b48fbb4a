/**
 * JSON document helpers shared by the contract and chunk readers/writers.
 */

import { readFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import writeFileAtomic from "write-file-atomic";
import type { z } from "zod";
import { MalformedDocumentError } from "../errors/index.js";

/** Read and JSON-parse a file. Read and syntax failures are reported as MalformedDocumentError. */
export async function readJsonDocument(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    throw new MalformedDocumentError(path, [`unable to read: ${(err as Error).message}`]);
  }
  return parseJsonDocument(content, path);
}

export function parseJsonDocument(content: string, source: string): unknown {
  try {
    return JSON.parse(content) as unknown;
  } catch (err) {
    throw new MalformedDocumentError(source, [`invalid JSON: ${(err as Error).message}`]);
  }
}

/** Validate a parsed document against a zod schema. */
export function parseWithSchema<S extends z.ZodTypeAny>(schema: S, raw: unknown, source: string): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new MalformedDocumentError(
      source,
      result.error.issues.map(i => `${i.path.join(".") || "<root>"}: ${i.message}`),
    );
  }
  return result.data;
}

/** Serialize with 4-space indentation and write atomically (temp file + rename). */
export async function writeJsonDocument(path: string, data: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFileAtomic(path, JSON.stringify(data, null, 4) + "\n", { encoding: "utf-8" });
}
