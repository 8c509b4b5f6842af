/**
 * CSV Writer Tests
 */

import { describe, expect, test } from "vitest";
import { ContractError, CsvWriter, createDialect, csvWriter } from "../../../src";
import { UTF8_BOM } from "../../../src/formats/csv/constants";
import { MemorySink } from "../../../src/io/memory";
import type { ByteSink } from "../../../src/types";
import { bytes, encodeAll, text } from "../../utils/csv-helpers";

describe("CsvWriter", () => {
  test("writes records and escapes fields", () => {
    const sink = new MemorySink();
    const writer = new CsvWriter(sink);

    writer.writeRecord(["foo", "bar", "baz"]);
    writer.writeField('this field needs to be "escaped"');
    writer.writeField("and, this one\ntoo?");
    writer.writeField("but this one - 'no'");
    writer.terminateRecord();

    expect(text(sink.toBytes())).toBe(
      'foo,bar,baz\r\n"this field needs to be ""escaped""","and, this one\ntoo?",but this one - \'no\'\r\n'
    );
  });

  test("emits a BOM once when bom is true", () => {
    const sink = new MemorySink();
    const writer = csvWriter(sink, { bom: true });

    writer.writeRecord(["foo", "bar", "baz"]);
    writer.writeRecord(["spam", "eggs", "42"]);

    expect(text(sink.toBytes())).toBe("\xEF\xBB\xBFfoo,bar,baz\r\nspam,eggs,42\r\n");
  });

  test("emits the BOM before the first field, after any empty records", () => {
    const sink = new MemorySink();
    const writer = csvWriter(sink, { bom: true });

    writer.writeRecord([]);
    writer.writeRecord(["a"]);

    expect(text(sink.toBytes())).toBe("\r\n\xEF\xBB\xBFa\r\n");
  });

  test("keeps its own copy of the BOM", () => {
    const sink = new MemorySink();
    const writer = csvWriter(sink, { bom: true });
    const saved = UTF8_BOM[0] ?? 0;

    UTF8_BOM[0] = 0x41;
    try {
      writer.writeRecord(["a"]);
    } finally {
      UTF8_BOM[0] = saved;
    }

    expect(text(sink.toBytes())).toBe("\xEF\xBB\xBFa\r\n");
  });

  test("emits no BOM otherwise", () => {
    expect(encodeAll([["a"]], { bom: false })).toBe("a\r\n");
    expect(encodeAll([["a"]])).toBe("a\r\n");
  });

  test("writes with a custom dialect", () => {
    const output = encodeAll(
      [
        ["foo", "bar", "baz"],
        ["needs|escaping", "and'this#too", '"but this" - no'],
      ],
      { delimiter: "|", quote: "'", terminator: "#" }
    );

    expect(output).toBe("foo|bar|baz#'needs|escaping'|'and''this#too'|\"but this\" - no#");
  });

  test("falls back to double quotes when quoting is disabled", () => {
    expect(encodeAll([['a"b', "c,d", "e"]], { quote: null })).toBe('"a""b","c,d",e\r\n');
  });

  describe("escaping triggers", () => {
    test.each([
      ["delimiter", "a,b", '"a,b"\r\n'],
      ["quote", 'a"b', '"a""b"\r\n'],
      ["carriage return", "a\rb", '"a\rb"\r\n'],
      ["line feed", "a\nb", '"a\nb"\r\n'],
    ])("quotes a field containing a %s", (_name, field, expected) => {
      expect(encodeAll([[field]])).toBe(expected);
    });

    test("writes other fields verbatim", () => {
      expect(encodeAll([["plain text; with 'stuff'\t|#"]])).toBe(
        "plain text; with 'stuff'\t|#\r\n"
      );
    });

    test("a fixed terminator only triggers on its own octet", () => {
      expect(encodeAll([["a\nb", "c#d"]], { terminator: "#" })).toBe('a\nb,"c#d"#');
    });
  });

  test("writes empty fields", () => {
    expect(encodeAll([["", ""]])).toBe(",\r\n");
  });

  test("writes raw octets unchanged", () => {
    const sink = new MemorySink();
    const writer = new CsvWriter(sink, createDialect({ terminator: "\n" }));

    writer.writeField(Uint8Array.of(0xff, 0x00, 0x80));
    writer.terminateRecord();

    expect(Array.from(sink.toBytes())).toEqual([0xff, 0x00, 0x80, 0x0a]);
  });

  test("encodes string fields as UTF-8", () => {
    const sink = new MemorySink();
    new CsvWriter(sink).writeRecord(["é"]);
    expect(Array.from(sink.toBytes())).toEqual([0xc3, 0xa9, 0x0d, 0x0a]);
  });

  test("accepts arrays and tuples", () => {
    const sink = new MemorySink();
    const writer = new CsvWriter(sink);
    const tuple = ["x", bytes("y")] as const;

    writer.writeRecord(tuple);
    writer.writeRecord(["z"]);

    expect(text(sink.toBytes())).toBe("x,y\r\nz\r\n");
  });

  test("rejects a bare string as a record", () => {
    const sink = new MemorySink();
    const writer = new CsvWriter(sink);

    // @ts-expect-error a string is not a list of fields
    expect(() => writer.writeRecord("a,b")).toThrow(ContractError);
    expect(sink.size).toBe(0);
    expect(writer.pendingRecord).toBe(false);
  });

  test("rejects writeRecord while a record is pending", () => {
    const sink = new MemorySink();
    const writer = new CsvWriter(sink);

    writer.writeField("open");
    expect(writer.pendingRecord).toBe(true);
    expect(() => writer.writeRecord(["next"])).toThrow(ContractError);

    writer.terminateRecord();
    expect(writer.pendingRecord).toBe(false);
    writer.writeRecord(["next"]);
    expect(text(sink.toBytes())).toBe("open\r\nnext\r\n");
  });

  test("propagates sink errors unchanged", () => {
    const failure = new Error("pipe closed");
    const sink: ByteSink = {
      writeAll() {
        throw failure;
      },
      writeByte() {
        throw failure;
      },
    };

    let caught: unknown;
    try {
      new CsvWriter(sink).writeRecord(["a"]);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBe(failure);
  });
});
