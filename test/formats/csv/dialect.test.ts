/**
 * Tests for dialect construction, validation and the escape-trigger set
 */

import { describe, expect, test } from "vitest";
import {
  CR,
  createDialect,
  DEFAULT_DIALECT,
  escapeOctets,
  isTerminator,
  LF,
  parseOctet,
  ValidationError,
} from "../../../src";

describe("createDialect", () => {
  test("defaults follow RFC 4180", () => {
    expect(createDialect()).toEqual({
      delimiter: 0x2c,
      quote: 0x22,
      terminator: { type: "crlf" },
      bom: null,
    });
    expect(DEFAULT_DIALECT).toEqual(createDialect());
  });

  test("returns a frozen value", () => {
    const dialect = createDialect({ terminator: "#" });
    expect(Object.isFrozen(dialect)).toBe(true);
    expect(Object.isFrozen(dialect.terminator)).toBe(true);
  });

  test("accepts characters and numbers", () => {
    expect(createDialect({ delimiter: "|", quote: 0x27, terminator: 0x23, bom: true })).toEqual({
      delimiter: 0x7c,
      quote: 0x27,
      terminator: { type: "octet", octet: 0x23 },
      bom: true,
    });
  });

  test("null quote disables quoting", () => {
    expect(createDialect({ quote: null }).quote).toBeNull();
  });

  test('"crlf" selects CRLF-mode', () => {
    expect(createDialect({ terminator: "crlf" }).terminator).toEqual({ type: "crlf" });
  });

  test.each([
    ["a two-character delimiter", { delimiter: "ab" }],
    ["an out-of-range delimiter", { delimiter: 256 }],
    ["a negative quote", { quote: -1 }],
    ["a fractional terminator", { terminator: 10.5 }],
    ["a wide character", { delimiter: "€" }],
    ["an empty terminator", { terminator: "" }],
  ])("rejects %s", (_name, options) => {
    expect(() => createDialect(options)).toThrow(ValidationError);
  });

  test("permits colliding octets", () => {
    expect(createDialect({ delimiter: '"' }).delimiter).toBe(0x22);
  });
});

describe("escapeOctets", () => {
  test("CRLF-mode escapes both CR and LF", () => {
    expect(escapeOctets(createDialect())).toEqual([0x2c, 0x22, CR, LF]);
  });

  test("uses the fallback quote when quoting is disabled", () => {
    expect(escapeOctets(createDialect({ quote: null, terminator: "#" }))).toEqual([
      0x2c, 0x22, 0x23,
    ]);
  });
});

describe("isTerminator", () => {
  test("matches CR and LF in CRLF-mode", () => {
    const { terminator } = createDialect();
    expect(isTerminator(CR, terminator)).toBe(true);
    expect(isTerminator(LF, terminator)).toBe(true);
    expect(isTerminator(0x23, terminator)).toBe(false);
  });

  test("matches only the fixed octet otherwise", () => {
    const { terminator } = createDialect({ terminator: "#" });
    expect(isTerminator(0x23, terminator)).toBe(true);
    expect(isTerminator(LF, terminator)).toBe(false);
  });
});

describe("parseOctet", () => {
  test("parses characters and integers", () => {
    expect(parseOctet(",")).toBe(0x2c);
    expect(parseOctet("\xff")).toBe(0xff);
    expect(parseOctet(0)).toBe(0);
    expect(parseOctet(255)).toBe(255);
  });

  test("returns undefined for non-octets", () => {
    expect(parseOctet("")).toBeUndefined();
    expect(parseOctet("ab")).toBeUndefined();
    expect(parseOctet(256)).toBeUndefined();
    expect(parseOctet(1.5)).toBeUndefined();
  });
});
