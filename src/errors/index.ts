/**
 * Contract errors.
 *
 * Every failure raised while defining, loading, resolving or chunking a
 * tool contract is a ContractError naming the contract, the offending
 * key or slot, and the stage it failed in. Resolution is deterministic,
 * so none of these are retryable.
 */

export type ContractErrorStage =
  | "definition"
  | "document"
  | "arity"
  | "option"
  | "resource"
  | "chunk";

export interface ContractErrorDetails {
  contractId?: string;
  key?: string;
}

export class ContractError extends Error {
  public readonly stage: ContractErrorStage;
  public readonly contractId?: string;
  public readonly key?: string;

  constructor(stage: ContractErrorStage, message: string, details: ContractErrorDetails = {}) {
    super(formatMessage(stage, message, details));
    this.name = "ContractError";
    this.stage = stage;
    this.contractId = details.contractId;
    this.key = details.key;
  }
}

function formatMessage(stage: ContractErrorStage, message: string, details: ContractErrorDetails): string {
  const where = [
    details.contractId ? `contract=${details.contractId}` : undefined,
    details.key ? `key=${details.key}` : undefined,
  ].filter((part): part is string => part !== undefined);
  return where.length > 0 ? `[${stage}] ${message} (${where.join(", ")})` : `[${stage}] ${message}`;
}

/** Number of supplied files does not match the declared slots. */
export class ArityError extends ContractError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(key: string, expected: number, actual: number, contractId?: string) {
    super("arity", `Expected ${expected} ${key.replace("_", " ")}, got ${actual}`, { contractId, key });
    this.name = "ArityError";
    this.expected = expected;
    this.actual = actual;
  }
}

export class UnknownOptionError extends ContractError {
  constructor(optionId: string, contractId?: string) {
    super("option", `Unknown option '${optionId}'`, { contractId, key: optionId });
    this.name = "UnknownOptionError";
  }
}

export class TypeMismatchError extends ContractError {
  public readonly expectedType: string;

  constructor(optionId: string, expectedType: string, value: unknown, contractId?: string) {
    super(
      "option",
      `Option '${optionId}' expects ${expectedType}, got ${describeValue(value)}`,
      { contractId, key: optionId },
    );
    this.name = "TypeMismatchError";
    this.expectedType = expectedType;
  }
}

export class ChoiceViolationError extends ContractError {
  public readonly choices: readonly unknown[];

  constructor(optionId: string, value: unknown, choices: readonly unknown[], contractId?: string) {
    super(
      "option",
      `Option '${optionId}' value ${JSON.stringify(value)} is not one of ${JSON.stringify(choices)}`,
      { contractId, key: optionId },
    );
    this.name = "ChoiceViolationError";
    this.choices = choices;
  }
}

/** A requested resource (processors, paths) cannot be satisfied. */
export class ResourceBoundError extends ContractError {
  constructor(key: string, message: string, contractId?: string) {
    super("resource", message, { contractId, key });
    this.name = "ResourceBoundError";
  }
}

/** Chunks in one list disagree on their "$chunk." keys. */
export class ChunkKeySkewError extends ContractError {
  public readonly chunkId?: string;

  constructor(key: string, message: string, opts: { chunkId?: string; contractId?: string } = {}) {
    super("chunk", message, { contractId: opts.contractId, key });
    this.name = "ChunkKeySkewError";
    this.chunkId = opts.chunkId;
  }
}

export class ChunkCountExceededError extends ContractError {
  public readonly nchunks: number;
  public readonly maxNchunks: number;

  constructor(nchunks: number, maxNchunks: number, contractId?: string) {
    super("chunk", `${nchunks} chunks exceed the declared maximum of ${maxNchunks}`, {
      contractId,
      key: "max_nchunks",
    });
    this.name = "ChunkCountExceededError";
    this.nchunks = nchunks;
    this.maxNchunks = maxNchunks;
  }
}

/** Malformed chunk record (bad id, duplicate id, wrong value type). */
export class InvalidChunkError extends ContractError {
  constructor(key: string, message: string, contractId?: string) {
    super("chunk", message, { contractId, key });
    this.name = "InvalidChunkError";
  }
}

export class MultipleOutputsError extends ContractError {
  constructor(noutputs: number, contractId?: string) {
    super("arity", `Gather tasks must declare exactly one output, found ${noutputs}`, {
      contractId,
      key: "output_types",
    });
    this.name = "MultipleOutputsError";
  }
}

/** A JSON document could not be read or does not have the expected shape. */
export class MalformedDocumentError extends ContractError {
  public readonly path: string;
  public readonly issues: readonly string[];

  constructor(path: string, issues: readonly string[], contractId?: string) {
    super("document", `Malformed document ${path}: ${issues.join("; ")}`, { contractId });
    this.name = "MalformedDocumentError";
    this.path = path;
    this.issues = issues;
  }
}

/** A file type is registered twice, or into a sealed registry. */
export class InvalidFileTypeError extends ContractError {
  constructor(fileTypeId: string, message: string) {
    super("definition", message, { key: fileTypeId });
    this.name = "InvalidFileTypeError";
  }
}

/** A tool contract definition breaks one of its invariants. */
export class InvalidContractError extends ContractError {
  public readonly issues: readonly string[];

  constructor(message: string, opts: { contractId?: string; key?: string; issues?: readonly string[] } = {}) {
    super("definition", message, { contractId: opts.contractId, key: opts.key });
    this.name = "InvalidContractError";
    this.issues = opts.issues ?? [];
  }
}

export class UnknownContractError extends ContractError {
  constructor(contractId: string) {
    super("definition", `No tool contract registered with id '${contractId}'`, { contractId });
    this.name = "UnknownContractError";
  }
}

export function isContractError(err: unknown): err is ContractError {
  return err instanceof ContractError;
}

function describeValue(value: unknown): string {
  if (typeof value === "string") return `string ${JSON.stringify(value)}`;
  if (typeof value === "number") return Number.isInteger(value) ? `integer ${value}` : `number ${value}`;
  if (typeof value === "boolean") return `boolean ${value}`;
  if (value === null) return "null";
  return typeof value;
}
