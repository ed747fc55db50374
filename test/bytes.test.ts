import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { canonicalizeLabel, decodeBytes, sniffEncoding } from "../src/internal/encoding/mod.js";
import {
  InputParseError,
  findText,
  parseStructuredBytes,
  parseStructuredBytesDetailed
} from "../src/public/mod.js";

function latin1Bytes(text: string): Uint8Array {
  return Uint8Array.from(text, (char) => char.charCodeAt(0));
}

function utf8Bytes(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

describe("sniffEncoding", () => {
  it("prefers a UTF-8 byte order mark", () => {
    const bytes = Uint8Array.from([0xef, 0xbb, 0xbf, ...utf8Bytes("{}")]);
    assert.deepStrictEqual(sniffEncoding(bytes, { transportEncodingLabel: "latin1" }), {
      encoding: "utf-8",
      source: "bom",
      bomLength: 3
    });
  });

  it("detects a UTF-16LE byte order mark", () => {
    assert.deepStrictEqual(sniffEncoding(Uint8Array.from([0xff, 0xfe, 0x3c, 0x00])), {
      encoding: "utf-16le",
      source: "bom",
      bomLength: 2
    });
  });

  it("uses the transport label when there is no BOM", () => {
    assert.deepStrictEqual(sniffEncoding(latin1Bytes("<p></p>"), { transportEncodingLabel: "ISO-8859-1" }), {
      encoding: "windows-1252",
      source: "transport",
      bomLength: 0
    });
  });

  it("finds http-equiv content-type charsets in markup", () => {
    const bytes = latin1Bytes(
      '<html><head><meta http-equiv="Content-Type" content="text/html; charset=windows-1252"></head></html>'
    );
    assert.deepStrictEqual(sniffEncoding(bytes), { encoding: "windows-1252", source: "meta", bomLength: 0 });
  });

  it("does not prescan JSON", () => {
    assert.deepStrictEqual(sniffEncoding(utf8Bytes('{"a": "<meta charset=latin1>"}')), {
      encoding: "utf-8",
      source: "default",
      bomLength: 0
    });
  });

  it("throws RangeError for an unknown transport label", () => {
    assert.throws(() => sniffEncoding(utf8Bytes("{}"), { transportEncodingLabel: "x-no-such-charset" }), RangeError);
  });
});

describe("canonicalizeLabel", () => {
  it("maps labels to decoder names", () => {
    assert.equal(canonicalizeLabel('"UTF-8"'), "utf-8");
    assert.equal(canonicalizeLabel("latin1"), "windows-1252");
    assert.equal(canonicalizeLabel("utf-16"), "utf-8");
    assert.equal(canonicalizeLabel("bogus"), null);
    assert.equal(canonicalizeLabel(" "), null);
  });
});

describe("decodeBytes", () => {
  it("strips a UTF-16LE byte order mark", () => {
    const bytes = Uint8Array.from([0xff, 0xfe, 0x3c, 0x00, 0x61, 0x00, 0x3e, 0x00]);
    assert.equal(decodeBytes(bytes).text, "<a>");
  });
});

describe("parseStructuredBytes", () => {
  it("decodes UTF-8 JSON behind a BOM", () => {
    const bytes = Uint8Array.from([0xef, 0xbb, 0xbf, ...utf8Bytes('{"a": "é"}')]);
    const result = parseStructuredBytesDetailed(bytes, { trace: true });

    assert.equal(result.tree?.children[0]?.text, "é");
    assert.deepStrictEqual(result.trace?.[0], { seq: 1, kind: "decode", encoding: "utf-8", sniffSource: "bom" });
  });

  it("honours a meta charset declared in the markup", () => {
    const bytes = latin1Bytes(
      '<html><head><meta charset="iso-8859-1"></head><body><p>café</p></body></html>'
    );
    const root = parseStructuredBytes(bytes);

    assert.equal(root?.name, "html");
    assert.equal(root && findText(root, "body/p"), "café");
  });

  it("decodes with the transport label", () => {
    const root = parseStructuredBytes(latin1Bytes("<p>é</p>"), { transportEncodingLabel: "latin1" });
    assert.equal(root?.text, "é");
  });

  it("raises InputParseError for an unknown transport label", () => {
    assert.throws(
      () => parseStructuredBytes(utf8Bytes("{}"), { transportEncodingLabel: "x-no-such-charset" }),
      (error: unknown) => error instanceof InputParseError && error.payload.code === "UNSUPPORTED_ENCODING"
    );
  });

  it("checks maxInputBytes against the raw byte length", () => {
    assert.throws(
      () => parseStructuredBytes(utf8Bytes('["é"]'), { budgets: { maxInputBytes: 5 } }),
      (error: unknown) => error instanceof Error && error.name === "BudgetExceededError"
    );
  });

  it("traces maxInputBytes once, with the raw byte length", () => {
    const result = parseStructuredBytesDetailed(utf8Bytes('["é"]'), { trace: true, budgets: { maxInputBytes: 6 } });
    const inputBudgets = (result.trace ?? []).filter(
      (event) => event.kind === "budget" && event.budget === "maxInputBytes"
    );

    assert.deepStrictEqual(inputBudgets, [{ seq: 2, kind: "budget", budget: "maxInputBytes", limit: 6, actual: 6 }]);
  });
});
