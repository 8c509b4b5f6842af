/**
 * Buffered file-descriptor byte source
 *
 * Reads go through `fs.readSync`, filling a fixed buffer that `readByte`
 * drains one octet at a time.
 */

import { closeSync, openSync, readSync } from "node:fs";
import { type } from "arktype";
import { Effect, type Scope } from "effect";
import { FileError, ValidationError } from "../errors";
import { DEFAULT_BUFFER_SIZE } from "../formats/csv/constants";
import type { ByteSource, FileSourceOptions, Octet } from "../types";
import { FileSourceOptionsSchema } from "../types";

/**
 * Byte source over an open file descriptor. The descriptor is owned by the
 * caller; `openFileSource` opens and closes one within a scope.
 */
export class FileSource implements ByteSource {
  private readonly buffer: Uint8Array;
  private start = 0;
  private end = 0;
  private exhausted = false;

  constructor(
    private readonly fd: number,
    readonly path: string,
    options: FileSourceOptions = {}
  ) {
    const validation = FileSourceOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid file source options: ${validation.summary}`);
    }
    this.buffer = new Uint8Array(options.bufferSize ?? DEFAULT_BUFFER_SIZE);
  }

  /**
   * @throws {FileError} when the underlying read fails
   */
  readByte(): Octet | undefined {
    if (this.start === this.end && !this.fill()) {
      return undefined;
    }
    return this.buffer[this.start++];
  }

  private fill(): boolean {
    if (this.exhausted) {
      return false;
    }
    let bytesRead: number;
    try {
      bytesRead = readSync(this.fd, this.buffer, 0, this.buffer.length, null);
    } catch (error) {
      throw FileError.fromSystemError("read", this.path, error);
    }
    this.start = 0;
    this.end = bytesRead;
    if (bytesRead === 0) {
      this.exhausted = true;
      return false;
    }
    return true;
  }
}

/**
 * Close a descriptor opened by one of the scoped helpers. A failing close
 * becomes a defect of the surrounding program.
 */
export const closeDescriptor = (fd: number, path: string): Effect.Effect<void> =>
  Effect.try({
    try: () => closeSync(fd),
    catch: (error) => FileError.fromSystemError("close", path, error),
  }).pipe(
    Effect.tap(() => Effect.logDebug("closed file")),
    Effect.annotateLogs("path", path),
    Effect.orDie
  );

/**
 * Open `path` for reading within the current scope. The descriptor is closed
 * when the scope ends, whatever the outcome.
 *
 * @example
 * ```typescript
 * const program = Effect.scoped(
 *   Effect.gen(function* () {
 *     const source = yield* openFileSource("data.csv");
 *     return new CsvReader(source).next(record);
 *   })
 * );
 * ```
 */
export const openFileSource = (
  path: string,
  options: FileSourceOptions = {}
): Effect.Effect<FileSource, FileError | ValidationError, Scope.Scope> =>
  Effect.gen(function* () {
    const validation = FileSourceOptionsSchema(options);
    if (validation instanceof type.errors) {
      return yield* Effect.fail(
        new ValidationError(`Invalid file source options: ${validation.summary}`)
      );
    }

    const fd = yield* Effect.acquireRelease(
      Effect.try({
        try: () => openSync(path, "r"),
        catch: (error) => FileError.fromSystemError("open", path, error),
      }).pipe(
        Effect.tap(() => Effect.logDebug("opened file for reading")),
        Effect.annotateLogs("path", path)
      ),
      (fd) => closeDescriptor(fd, path)
    );

    return new FileSource(fd, path, options);
  });
