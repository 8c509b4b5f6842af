/**
 * Tests for the error hierarchy and its string rendering
 */

import { describe, expect, test } from "vitest";
import { ContractError, CsvError, FileError, ValidationError } from "../src";

describe("CsvError", () => {
  test("renders the message alone without context", () => {
    const error = new CsvError("broken", "TEST_ERROR");
    expect(error.toString()).toBe("CsvError: broken");
    expect(error.code).toBe("TEST_ERROR");
  });

  test("appends context on its own line", () => {
    const error = new ValidationError("delimiter must be a single octet", 'got "::"');
    expect(error.toString()).toBe(
      'ValidationError: delimiter must be a single octet\nContext: got "::"'
    );
    expect(error.code).toBe("VALIDATION_ERROR");
    expect(error).toBeInstanceOf(CsvError);
  });

  test("contract errors carry the operation as context", () => {
    const error = new ContractError("field index 3 out of range", "field");
    expect(error.operation).toBe("field");
    expect(error.toString()).toBe("ContractError: field index 3 out of range\nContext: field");
  });
});

describe("FileError", () => {
  test("fromSystemError adds a suggestion for known failures", () => {
    const cause = new Error("ENOENT: no such file or directory");
    const error = FileError.fromSystemError("open", "/tmp/missing.csv", cause);

    expect(error.message).toBe(
      "open operation failed: ENOENT: no such file or directory. " +
        "Check that the file path is correct and the file exists"
    );
    expect(error.filePath).toBe("/tmp/missing.csv");
    expect(error.operation).toBe("open");
    expect(error.systemError).toBe(cause);
    expect(error.toString()).toBe(
      `FileError: ${error.message}\n` +
        "Context: System error: ENOENT: no such file or directory\n" +
        "System Error: Error: ENOENT: no such file or directory"
    );
  });

  test("fromSystemError leaves unknown failures without a suggestion", () => {
    const error = FileError.fromSystemError("write", "out.csv", "disk on fire");
    expect(error.message).toBe("write operation failed: disk on fire");
    expect(error.toString()).toBe(
      "FileError: write operation failed: disk on fire\nContext: System error: disk on fire"
    );
  });
});
