export {
  toolContractToDocument,
  toolContractFromDocument,
  loadToolContract,
  writeToolContract,
  resolvedToolContractToDocument,
  resolvedToolContractFromDocument,
  loadResolvedToolContract,
  writeResolvedToolContract,
  optionToSchemaDocument,
  optionFromSchemaDocument,
} from "./tool-contract-io.js";
export { ToolContractDocument, ResolvedToolContractDocument, SchemaOptionDocument } from "./documents.js";
export { readJsonDocument, writeJsonDocument, parseWithSchema } from "./json.js";
