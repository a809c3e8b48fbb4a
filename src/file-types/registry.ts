/**
 * File Type Registry: lookup table from file type id to its descriptor.
 *
 * Populated once (builtin table plus optional extra tables), then sealed.
 * Ids are unique: extra tables add types, they never replace one.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { FileType, FileTypeTable } from "../schemas/file-type.js";
import { InvalidFileTypeError, MalformedDocumentError } from "../errors/index.js";
import { parseJsonDocument, parseWithSchema, readJsonDocument } from "../io/json.js";

const BUILTIN_TABLE_URL = new URL("../../data/file-types.json", import.meta.url);

export class FileTypeRegistry {
  private readonly types = new Map<string, Readonly<FileType>>();
  private sealed = false;

  constructor(fileTypes: Iterable<FileType> = []) {
    for (const fileType of fileTypes) {
      this.register(fileType);
    }
  }

  /**
   * Register a file type.
   *
   * @throws InvalidFileTypeError if the id is already registered or the registry is sealed
   */
  register(fileType: FileType): void {
    const id = fileType.fileTypeId;
    if (this.sealed) {
      throw new InvalidFileTypeError(id, `File type registry is sealed; cannot register '${id}'`);
    }
    if (this.types.has(id)) {
      throw new InvalidFileTypeError(id, `File type '${id}' is already registered`);
    }
    this.types.set(id, Object.freeze({ ...fileType }));
  }

  /** Make the registry read-only. Returns this for chaining. */
  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  get(fileTypeId: string): Readonly<FileType> | undefined {
    return this.types.get(fileTypeId);
  }

  has(fileTypeId: string): boolean {
    return this.types.has(fileTypeId);
  }

  list(): Readonly<FileType>[] {
    return Array.from(this.types.values());
  }

  get size(): number {
    return this.types.size;
  }
}

function registerTable(registry: FileTypeRegistry, raw: unknown, source: string): FileTypeRegistry {
  for (const fileType of parseWithSchema(FileTypeTable, raw, source).fileTypes) {
    try {
      registry.register(fileType);
    } catch (err) {
      if (!(err instanceof InvalidFileTypeError)) throw err;
      throw new MalformedDocumentError(source, [`fileTypes: ${err.message}`]);
    }
  }
  return registry;
}

/** Builtin file types (data/file-types.json), unsealed so callers can extend it. */
export function loadBuiltinFileTypes(): FileTypeRegistry {
  const source = fileURLToPath(BUILTIN_TABLE_URL);
  const content = readFileSync(BUILTIN_TABLE_URL, "utf-8");
  return registerTable(new FileTypeRegistry(), parseJsonDocument(content, source), source);
}

/**
 * Register every file type of a JSON table file into `registry`.
 * An id that is already registered, builtin or not, rejects the table.
 */
export async function loadFileTypeTable(registry: FileTypeRegistry, path: string): Promise<FileTypeRegistry> {
  return registerTable(registry, await readJsonDocument(path), path);
}

/** Process-wide builtin table, sealed. Used when a caller does not pass its own registry. */
export const BUILTIN_FILE_TYPES: FileTypeRegistry = loadBuiltinFileTypes().seal();
