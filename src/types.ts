/**
 * Core type definitions shared by the codec and its transports
 *
 * The reader and writer are generic over any transport offering the narrow
 * capabilities below, so memory buffers, files or sockets can all be used
 * without inheritance.
 */

import { type } from "arktype";

/**
 * An integer in the range 0-255
 */
export type Octet = number;

/**
 * Sequential source of octets
 */
export interface ByteSource {
  /**
   * Return the next octet, or `undefined` at end of stream.
   * Any thrown error is propagated unchanged by the reader.
   */
  readByte(): Octet | undefined;
}

/**
 * Sequential sink of octets
 */
export interface ByteSink {
  /** Write every octet of `bytes` */
  writeAll(bytes: Uint8Array): void;
  /** Write a single octet */
  writeByte(octet: Octet): void;
}

/**
 * Options for the buffered file-descriptor source
 */
export interface FileSourceOptions {
  /** Size of the read buffer in bytes (default 4096) */
  bufferSize?: number;
}

/**
 * Options for the buffered file-descriptor sink
 */
export interface FileSinkOptions {
  /** Size of the write buffer in bytes (default 4096) */
  bufferSize?: number;
  /** Append to an existing file instead of truncating it */
  append?: boolean;
}

const isPositiveInteger = (value: number): boolean => Number.isInteger(value) && value > 0;

/**
 * ArkType validation schema for file source options
 */
export const FileSourceOptionsSchema = type({
  "bufferSize?": "number | undefined",
}).narrow((options, ctx) => {
  if (options.bufferSize !== undefined && !isPositiveInteger(options.bufferSize)) {
    return ctx.reject({
      path: ["bufferSize"],
      expected: "a positive integer",
      actual: String(options.bufferSize),
    });
  }
  return true;
});

/**
 * ArkType validation schema for file sink options
 */
export const FileSinkOptionsSchema = type({
  "bufferSize?": "number | undefined",
  "append?": "boolean | undefined",
}).narrow((options, ctx) => {
  if (options.bufferSize !== undefined && !isPositiveInteger(options.bufferSize)) {
    return ctx.reject({
      path: ["bufferSize"],
      expected: "a positive integer",
      actual: String(options.bufferSize),
    });
  }
  return true;
});
