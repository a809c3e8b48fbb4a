export { FileTypeRegistry, loadBuiltinFileTypes, loadFileTypeTable, BUILTIN_FILE_TYPES } from "./registry.js";
