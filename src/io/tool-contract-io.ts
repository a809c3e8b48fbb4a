/**
 * Tool contract and resolved tool contract documents: conversion to and
 * from the JSON shapes, plus load/write.
 *
 * Loading reports shape violations as MalformedDocumentError (with the
 * source path) and contract invariant violations as InvalidContractError.
 */

import type { OptionSchema, OptionType, OptionValue, RawOptionValue } from "../schemas/option.js";
import { optionValuesToJson } from "../schemas/option.js";
import type { ResourceType, ToolContract, ToolContractInput } from "../schemas/tool-contract.js";
import type { ResolvedToolContract } from "../schemas/resolved-tool-contract.js";
import { FileTypeRegistry, BUILTIN_FILE_TYPES } from "../file-types/registry.js";
import { defineToolContract, deepFreeze } from "../contracts/define.js";
import { validateOptionValue } from "../options/validator.js";
import { MalformedDocumentError, isContractError } from "../errors/index.js";
import {
  JSON_SCHEMA_DRAFT,
  ResolvedToolContractDocument,
  ToolContractDocument,
  type JsonSchemaType,
  type SchemaOptionDocument,
} from "./documents.js";
import { parseWithSchema, readJsonDocument, writeJsonDocument } from "./json.js";

const TO_JSON_SCHEMA_TYPE: Record<OptionType, JsonSchemaType> = {
  int: "integer",
  float: "number",
  bool: "boolean",
  string: "string",
};

const FROM_JSON_SCHEMA_TYPE: Record<JsonSchemaType, OptionType> = {
  integer: "int",
  number: "float",
  boolean: "bool",
  string: "string",
};

// --- Options ---

export function optionToSchemaDocument(option: OptionSchema): SchemaOptionDocument {
  return {
    $schema: JSON_SCHEMA_DRAFT,
    type: "object",
    title: `JSON Schema for ${option.id}`,
    required: [option.id],
    properties: {
      [option.id]: {
        type: TO_JSON_SCHEMA_TYPE[option.type],
        default: option.default,
        title: option.title,
        description: option.description,
        ...(option.choices && { enum: [...option.choices] }),
      },
    },
  };
}

export function optionFromSchemaDocument(doc: SchemaOptionDocument): OptionSchema {
  const [id] = doc.required;
  const property = id === undefined ? undefined : doc.properties[id];
  // SchemaOptionDocument's refinement guarantees both
  if (id === undefined || property === undefined) {
    throw new Error("schema option without a required property");
  }
  return {
    id,
    title: property.title,
    description: property.description,
    type: FROM_JSON_SCHEMA_TYPE[property.type],
    default: property.default,
    ...(property.enum && { choices: [...property.enum] }),
  };
}

// --- Tool contracts ---

export function toolContractToDocument(contract: ToolContract): ToolContractDocument {
  return {
    tool_contract_id: contract.toolContractId,
    version: contract.version,
    driver: { exe: contract.driver.exe, env: { ...contract.driver.env } },
    tool_contract: {
      tool_contract_id: contract.toolContractId,
      name: contract.name,
      description: contract.description,
      task_type: contract.taskType,
      input_types: contract.inputTypes.map(slot => ({
        file_type_id: slot.fileTypeId,
        label: slot.label,
        description: slot.description,
      })),
      output_types: contract.outputTypes.map(slot => ({
        file_type_id: slot.fileTypeId,
        label: slot.label,
        description: slot.description,
        ...(slot.defaultName ? { default_name: slot.defaultName } : {}),
      })),
      schema_options: contract.options.map(optionToSchemaDocument),
      nproc: contract.nproc,
      resource_types: [...contract.resourceTypes],
      ...(contract.scatter && {
        chunk_keys: [...contract.scatter.chunkKeys],
        nchunks: contract.scatter.maxNchunks,
      }),
      ...(contract.gather && { chunk_key: contract.gather.chunkKey }),
    },
  };
}

/**
 * Build a validated ToolContract from a parsed JSON document.
 *
 * @param source - document path (or label) used in error messages
 */
export function toolContractFromDocument(
  raw: unknown,
  source: string,
  fileTypes: FileTypeRegistry = BUILTIN_FILE_TYPES,
): ToolContract {
  const doc = parseWithSchema(ToolContractDocument, raw, source);
  const task = doc.tool_contract;

  if (doc.tool_contract_id !== task.tool_contract_id) {
    throw new MalformedDocumentError(
      source,
      [`tool_contract_id '${doc.tool_contract_id}' does not match tool_contract.tool_contract_id '${task.tool_contract_id}'`],
      doc.tool_contract_id,
    );
  }
  const hasScatterFields = task.chunk_keys !== undefined || task.nchunks !== undefined;
  if (hasScatterFields && (task.chunk_keys === undefined || task.nchunks === undefined)) {
    throw new MalformedDocumentError(source, ["scatter contracts need both chunk_keys and nchunks"], doc.tool_contract_id);
  }

  const input: ToolContractInput = {
    toolContractId: task.tool_contract_id,
    name: task.name,
    description: task.description,
    version: doc.version,
    taskType: task.task_type,
    inputTypes: task.input_types.map(slot => ({
      fileTypeId: slot.file_type_id,
      label: slot.label,
      description: slot.description,
    })),
    outputTypes: task.output_types.map(slot => ({
      fileTypeId: slot.file_type_id,
      label: slot.label,
      description: slot.description,
      defaultName: slot.default_name,
    })),
    options: task.schema_options.map(optionFromSchemaDocument),
    nproc: task.nproc,
    resourceTypes: task.resource_types,
    driver: doc.driver,
  };
  if (task.chunk_keys !== undefined && task.nchunks !== undefined) {
    input.scatter = { chunkKeys: task.chunk_keys, maxNchunks: task.nchunks };
  }
  if (task.chunk_key !== undefined) {
    input.gather = { chunkKey: task.chunk_key };
  }

  return defineToolContract(input, fileTypes);
}

export async function loadToolContract(
  path: string,
  fileTypes: FileTypeRegistry = BUILTIN_FILE_TYPES,
): Promise<ToolContract> {
  return toolContractFromDocument(await readJsonDocument(path), path, fileTypes);
}

export async function writeToolContract(contract: ToolContract, path: string): Promise<void> {
  await writeJsonDocument(path, toolContractToDocument(contract));
}

// --- Resolved tool contracts ---

export function resolvedToolContractToDocument(rtc: ResolvedToolContract): ResolvedToolContractDocument {
  return {
    driver: { exe: rtc.driver.exe, env: { ...rtc.driver.env } },
    tool_contract: {
      tool_contract_id: rtc.toolContractId,
      task_type: rtc.taskType,
      input_files: [...rtc.inputFiles],
      output_files: [...rtc.outputFiles],
      options: optionValuesToJson(rtc.options),
      option_types: Object.fromEntries(Object.entries(rtc.options).map(([id, option]) => [id, option.type])),
      nproc: rtc.nproc,
      resources: rtc.resources.map(([type, path]): [ResourceType, string] => [type, path]),
      ...(rtc.scatter && {
        chunk_keys: [...rtc.scatter.chunkKeys],
        max_nchunks: rtc.scatter.maxNchunks,
        nchunks: rtc.scatter.nchunks,
      }),
      ...(rtc.gather && {
        chunk_key: rtc.gather.chunkKey,
        chunk_files: [...rtc.gather.chunkFiles],
      }),
    },
  };
}

/** Tag a raw value by its JSON type (integers become int options). Used when no type was recorded. */
function inferOptionValue(value: RawOptionValue): OptionValue {
  if (typeof value === "boolean") return { type: "bool", value };
  if (typeof value === "string") return { type: "string", value };
  return Number.isInteger(value) ? { type: "int", value } : { type: "float", value };
}

/**
 * Build a ResolvedToolContract from a parsed document.
 *
 * With the source contract, options are re-validated against its schema
 * and must cover exactly its declared ids; without it, option tags come
 * from the recorded `option_types`, falling back to the JSON value types.
 */
export function resolvedToolContractFromDocument(
  raw: unknown,
  source: string,
  contract?: ToolContract,
): ResolvedToolContract {
  const doc = parseWithSchema(ResolvedToolContractDocument, raw, source);
  const task = doc.tool_contract;
  const contractId = task.tool_contract_id;

  if (contract && contract.toolContractId !== contractId) {
    throw new MalformedDocumentError(
      source,
      [`resolved contract '${contractId}' does not belong to '${contract.toolContractId}'`],
      contractId,
    );
  }

  const options: Record<string, OptionValue> = {};
  if (contract) {
    const declared = new Set(contract.options.map(o => o.id));
    const missing = [...declared].filter(id => !Object.prototype.hasOwnProperty.call(task.options, id));
    const extra = Object.keys(task.options).filter(id => !declared.has(id));
    if (missing.length > 0 || extra.length > 0) {
      throw new MalformedDocumentError(
        source,
        [
          ...missing.map(id => `options: missing '${id}'`),
          ...extra.map(id => `options: undeclared '${id}'`),
        ],
        contractId,
      );
    }
    for (const option of contract.options) {
      try {
        options[option.id] = validateOptionValue(option, task.options[option.id], contractId);
      } catch (err) {
        if (!isContractError(err)) throw err;
        throw new MalformedDocumentError(source, [`options.${option.id}: ${err.message}`], contractId);
      }
    }
  } else {
    for (const [id, value] of Object.entries(task.options)) {
      const type = task.option_types?.[id];
      if (type === undefined) {
        options[id] = inferOptionValue(value);
        continue;
      }
      try {
        options[id] = validateOptionValue({ id, title: id, description: "", type, default: value }, value, contractId);
      } catch (err) {
        if (!isContractError(err)) throw err;
        throw new MalformedDocumentError(source, [`options.${id}: ${err.message}`], contractId);
      }
    }
  }

  const scatterFields = [task.chunk_keys, task.max_nchunks, task.nchunks];
  const hasScatter = scatterFields.some(f => f !== undefined);
  if (hasScatter && scatterFields.some(f => f === undefined)) {
    throw new MalformedDocumentError(source, ["scatter fields chunk_keys, max_nchunks and nchunks go together"], contractId);
  }
  if ((task.chunk_key === undefined) !== (task.chunk_files === undefined)) {
    throw new MalformedDocumentError(source, ["gather fields chunk_key and chunk_files go together"], contractId);
  }

  const rtc: ResolvedToolContract = {
    toolContractId: contractId,
    taskType: task.task_type,
    inputFiles: task.input_files,
    outputFiles: task.output_files,
    options,
    nproc: task.nproc,
    resources: task.resources,
    driver: doc.driver,
    ...(task.chunk_keys !== undefined && task.max_nchunks !== undefined && task.nchunks !== undefined && {
      scatter: { chunkKeys: task.chunk_keys, maxNchunks: task.max_nchunks, nchunks: task.nchunks },
    }),
    ...(task.chunk_key !== undefined && task.chunk_files !== undefined && {
      gather: { chunkKey: task.chunk_key, chunkFiles: task.chunk_files },
    }),
  };
  return deepFreeze(rtc);
}

export async function loadResolvedToolContract(path: string, contract?: ToolContract): Promise<ResolvedToolContract> {
  return resolvedToolContractFromDocument(await readJsonDocument(path), path, contract);
}

export async function writeResolvedToolContract(rtc: ResolvedToolContract, path: string): Promise<void> {
  await writeJsonDocument(path, resolvedToolContractToDocument(rtc));
}
