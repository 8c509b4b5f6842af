/**
 * octet-csv - streaming CSV codec
 *
 * Decodes byte streams into records of byte fields and encodes records back
 * into CSV. Encoding-agnostic: fields are octets, never characters.
 */

// CSV codec
export * from "./formats/csv";

// Error types
export { ContractError, CsvError, FileError, ValidationError } from "./errors";

// Byte transports
export { ByteBuffer } from "./io/byte-buffer";
export { FileSource, openFileSource } from "./io/file-reader";
export { FileSink, openFileSink } from "./io/file-writer";
export { MemorySink, MemorySource } from "./io/memory";
export { runSyncOrThrow } from "./io/runtime";

// Core types
export type {
  ByteSink,
  ByteSource,
  FileSinkOptions,
  FileSourceOptions,
  Octet,
} from "./types";
export { FileSinkOptionsSchema, FileSourceOptionsSchema } from "./types";
