import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
  BudgetExceededError,
  InputParseError,
  parseStructuredText,
  parseStructuredTextDetailed
} from "../src/public/mod.js";

// ---------------------------------------------------------------------------
// Format selection
// ---------------------------------------------------------------------------

describe("parseStructuredText — dispatch", () => {
  it("returns null for whitespace-only input", () => {
    assert.equal(parseStructuredText("  "), null);
  });

  it("returns null for text that is neither JSON nor markup", () => {
    assert.equal(parseStructuredText("not json or html"), null);
    assert.deepStrictEqual(parseStructuredTextDetailed("not json or html"), { format: null, tree: null });
  });

  it("raises InputParseError for broken JSON", () => {
    assert.throws(
      () => parseStructuredText("{bad json"),
      (error: unknown) => error instanceof InputParseError && error.payload.code === "JSON_DECODE_FAILED"
    );
  });

  it("parses JSON objects after trimming", () => {
    assert.deepStrictEqual(parseStructuredText('  {"a": [1, 2]}\n'), {
      name: "root",
      attributes: {},
      children: [
        {
          name: "a",
          attributes: {},
          children: [
            { name: "i0", attributes: {}, text: "1", children: [] },
            { name: "i1", attributes: {}, text: "2", children: [] }
          ]
        }
      ]
    });
  });

  it("parses JSON arrays under the configured root name", () => {
    const result = parseStructuredTextDetailed("[1]", { rootName: "items" });
    assert.equal(result.format, "json");
    assert.equal(result.tree?.name, "items");
  });

  it("keeps object members in source order, integer-like keys included", () => {
    const tree = parseStructuredText('{"title": "x", "2021": "y", "b": 1}');
    assert.deepStrictEqual(
      tree?.children.map((node) => node.name),
      ["title", "2021", "b"]
    );
  });

  it("keeps the first position and the last value of a repeated key", () => {
    const tree = parseStructuredText('{"a": 1, "b": 2, "a": 3}');
    assert.deepStrictEqual(
      tree?.children.map((node) => [node.name, node.text]),
      [
        ["a", "3"],
        ["b", "2"]
      ]
    );
  });

  it("accepts raw control characters inside JSON strings", () => {
    const tree = parseStructuredText('{"a": "x\ty"}');
    assert.equal(tree?.children[0]?.text, "x\ty");
  });

  for (const input of ['{"a": 1 /* note */}', "[1, 2,]", "[NaN]", "[Infinity]", "[1] [2]"]) {
    it(`rejects non-standard JSON ${JSON.stringify(input)}`, () => {
      assert.throws(
        () => parseStructuredText(input),
        (error: unknown) =>
          error instanceof InputParseError &&
          error.payload.code === "JSON_DECODE_FAILED" &&
          error.cause instanceof SyntaxError
      );
    });
  }

  it("parses markup after trimming", () => {
    const result = parseStructuredTextDetailed("\n  <p>hi</p>\n");
    assert.equal(result.format, "markup");
    assert.deepStrictEqual(result.tree, { name: "p", attributes: {}, text: "hi", children: [] });
  });

  it("recovers from an unclosed tag", () => {
    assert.deepStrictEqual(parseStructuredText("<a><b></a>"), {
      name: "a",
      attributes: {},
      children: [{ name: "b", attributes: {}, children: [] }]
    });
  });

  it("recognizes markup that yields no node", () => {
    assert.deepStrictEqual(parseStructuredTextDetailed("</x>"), { format: "markup", tree: null });
  });

  it("builds structurally equal trees for repeated input", () => {
    const input = '<ul class="l"><li>a</li><li>b</li></ul>';
    const first = parseStructuredText(input);
    const second = parseStructuredText(input);
    assert.deepStrictEqual(first, second);
    assert.notEqual(first, second);
  });
});

// ---------------------------------------------------------------------------
// Budgets
// ---------------------------------------------------------------------------

describe("parseStructuredText — budgets", () => {
  it("rejects input above maxInputBytes", () => {
    assert.throws(
      () => parseStructuredText("<a></a>", { budgets: { maxInputBytes: 5 } }),
      (error: unknown) =>
        error instanceof BudgetExceededError &&
        error.payload.budget === "maxInputBytes" &&
        error.payload.limit === 5 &&
        error.payload.actual === 7
    );
  });

  it("rejects trees above maxNodes", () => {
    assert.throws(
      () => parseStructuredText("[1, 2, 3]", { budgets: { maxNodes: 3 } }),
      (error: unknown) =>
        error instanceof BudgetExceededError && error.payload.budget === "maxNodes" && error.payload.actual === 4
    );
  });

  it("rejects trees above maxDepth", () => {
    assert.throws(
      () => parseStructuredText('{"a": {"b": {"c": 1}}}', { budgets: { maxDepth: 3 } }),
      (error: unknown) =>
        error instanceof BudgetExceededError && error.payload.budget === "maxDepth" && error.payload.actual === 4
    );
  });

  it("accepts trees within every budget", () => {
    const tree = parseStructuredText("[1, 2, 3]", { budgets: { maxInputBytes: 9, maxNodes: 4, maxDepth: 2 } });
    assert.equal(tree?.children.length, 3);
  });

  it("rejects traces above maxTraceEvents", () => {
    assert.throws(
      () => parseStructuredText("<a></a>", { trace: true, budgets: { maxTraceEvents: 2 } }),
      (error: unknown) =>
        error instanceof BudgetExceededError && error.payload.budget === "maxTraceEvents" && error.payload.actual === 3
    );
  });
});

// ---------------------------------------------------------------------------
// Trace
// ---------------------------------------------------------------------------

describe("parseStructuredTextDetailed — trace", () => {
  it("omits the trace unless asked for", () => {
    assert.equal("trace" in parseStructuredTextDetailed("<a></a>"), false);
  });

  it("records dispatch, tokens, recovery and tree metrics for markup", () => {
    const result = parseStructuredTextDetailed("<a><b></a>", { trace: true });

    assert.deepStrictEqual(result.trace, [
      { seq: 1, kind: "budget", budget: "maxInputBytes", limit: null, actual: 10 },
      { seq: 2, kind: "dispatch", format: "markup", inputLength: 10 },
      { seq: 3, kind: "token", count: 4 },
      { seq: 4, kind: "recovery", action: "implicit-close", tagName: "b", closedBy: "a", tokenIndex: 2 },
      { seq: 5, kind: "tree", nodeCount: 2, maxDepth: 2 },
      { seq: 6, kind: "budget", budget: "maxNodes", limit: null, actual: 2 },
      { seq: 7, kind: "budget", budget: "maxDepth", limit: null, actual: 2 }
    ]);
  });

  it("records ignored end tags", () => {
    const result = parseStructuredTextDetailed("<a></x></a>", { trace: true });
    const recoveries = (result.trace ?? []).filter((event) => event.kind === "recovery");
    assert.deepStrictEqual(recoveries, [
      { seq: 4, kind: "recovery", action: "ignored-end-tag", tagName: "x", tokenIndex: 1 }
    ]);
  });

  it("records JSON dispatch without token events", () => {
    const result = parseStructuredTextDetailed("[1]", { trace: true, budgets: { maxNodes: 10 } });

    assert.deepStrictEqual(result.trace, [
      { seq: 1, kind: "budget", budget: "maxInputBytes", limit: null, actual: 3 },
      { seq: 2, kind: "dispatch", format: "json", inputLength: 3 },
      { seq: 3, kind: "tree", nodeCount: 2, maxDepth: 2 },
      { seq: 4, kind: "budget", budget: "maxNodes", limit: 10, actual: 2 },
      { seq: 5, kind: "budget", budget: "maxDepth", limit: null, actual: 2 }
    ]);
  });

  it("records tokenizer errors", () => {
    const result = parseStructuredTextDetailed('<a x="1" x="2"></a>', { trace: true });
    const codes = (result.trace ?? []).flatMap((event) => (event.kind === "tokenizer-error" ? [event.code] : []));
    assert.deepStrictEqual(codes, ["duplicate-attribute"]);
  });
});
