/**
 * Buffered file-descriptor byte sink
 *
 * Writes are collected in a fixed buffer and handed to `fs.writeSync` when it
 * fills up or on `flush`.
 */

import { openSync, writeSync } from "node:fs";
import { type } from "arktype";
import { Effect, type Scope } from "effect";
import { ContractError, FileError, ValidationError } from "../errors";
import { DEFAULT_BUFFER_SIZE } from "../formats/csv/constants";
import type { ByteSink, FileSinkOptions, Octet } from "../types";
import { FileSinkOptionsSchema } from "../types";
import { closeDescriptor } from "./file-reader";

/**
 * Byte sink over an open file descriptor. Call `flush` before closing the
 * descriptor; `openFileSink` leaves that to its caller so that a failed flush
 * surfaces as an error rather than a defect.
 */
export class FileSink implements ByteSink {
  private readonly buffer: Uint8Array;
  private used = 0;
  private closed = false;

  constructor(
    private readonly fd: number,
    readonly path: string,
    options: Pick<FileSinkOptions, "bufferSize"> = {}
  ) {
    const validation = FileSinkOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid file sink options: ${validation.summary}`);
    }
    this.buffer = new Uint8Array(options.bufferSize ?? DEFAULT_BUFFER_SIZE);
  }

  writeAll(bytes: Uint8Array): void {
    this.ensureOpen();
    if (bytes.length > this.buffer.length - this.used) {
      this.flush();
      if (bytes.length >= this.buffer.length) {
        this.writeThrough(bytes);
        return;
      }
    }
    this.buffer.set(bytes, this.used);
    this.used += bytes.length;
  }

  writeByte(octet: Octet): void {
    this.ensureOpen();
    if (this.used === this.buffer.length) {
      this.flush();
    }
    this.buffer[this.used++] = octet;
  }

  /**
   * Write out everything buffered so far
   *
   * @throws {FileError} when the underlying write fails
   */
  flush(): void {
    if (this.used === 0) {
      return;
    }
    const pending = this.buffer.subarray(0, this.used);
    this.used = 0;
    this.writeThrough(pending);
  }

  /**
   * Flush and refuse further writes; the descriptor itself is not closed
   */
  close(): void {
    if (!this.closed) {
      this.flush();
      this.closed = true;
    }
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new ContractError(`Write to closed file sink ${this.path}`, "write");
    }
  }

  private writeThrough(bytes: Uint8Array): void {
    let offset = 0;
    while (offset < bytes.length) {
      try {
        offset += writeSync(this.fd, bytes, offset, bytes.length - offset);
      } catch (error) {
        throw FileError.fromSystemError("write", this.path, error);
      }
    }
  }
}

/**
 * Open `path` for writing within the current scope. The file is truncated
 * unless `append` is set; the descriptor is closed when the scope ends.
 */
export const openFileSink = (
  path: string,
  options: FileSinkOptions = {}
): Effect.Effect<FileSink, FileError | ValidationError, Scope.Scope> =>
  Effect.gen(function* () {
    const validation = FileSinkOptionsSchema(options);
    if (validation instanceof type.errors) {
      return yield* Effect.fail(
        new ValidationError(`Invalid file sink options: ${validation.summary}`)
      );
    }

    const fd = yield* Effect.acquireRelease(
      Effect.try({
        try: () => openSync(path, options.append === true ? "a" : "w"),
        catch: (error) => FileError.fromSystemError("open", path, error),
      }).pipe(
        Effect.tap(() => Effect.logDebug("opened file for writing")),
        Effect.annotateLogs("path", path)
      ),
      (fd) => closeDescriptor(fd, path)
    );

    return new FileSink(fd, path, { bufferSize: options.bufferSize });
  });
