/**
 * File type schema: the identifiers tool contracts use for their
 * input and output slots.
 */

import { z } from "zod";

/** Namespace prefix for generic file types. */
export const FILE_TYPE_PREFIX = "FileTypes";

/** Namespace prefix for dataset file types. */
export const DATASET_TYPE_PREFIX = "DataSets";

/** Namespace prefix for index file types. */
export const INDEX_TYPE_PREFIX = "Indexes";

/** Id of the chunk list file type consumed by gather tasks. */
export const CHUNK_FILE_TYPE_ID = `${FILE_TYPE_PREFIX}.CHUNK`;

export const FileType = z.object({
  /** Globally unique id, e.g. "FileTypes.Fasta". */
  fileTypeId: z.string().min(1),
  /** Default base name of a file of this type (without extension). */
  baseName: z.string().min(1),
  /** File extension, without the leading dot ("fasta", "tar.gz"). */
  ext: z.string().min(1),
  mimeType: z.string().min(1),
});
export type FileType = z.infer<typeof FileType>;

/** File type table as stored on disk. */
export const FileTypeTable = z.object({
  fileTypes: z.array(FileType),
});
export type FileTypeTable = z.infer<typeof FileTypeTable>;

/** Default file name (base name + extension) for a file type. */
export function defaultFileName(fileType: FileType): string {
  return `${fileType.baseName}.${fileType.ext}`;
}
