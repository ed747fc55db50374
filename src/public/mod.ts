import { decodeBytes } from "../internal/encoding/mod.js";
import {
  DEFAULT_ROOT_NAME,
  buildTreeFromJson,
  buildTreeFromJsonSyntax,
  decodeJsonSyntax,
  decodeJsonText,
  type JsonSyntaxNode,
  type JsonValue
} from "../internal/json/mod.js";
import { compilePath, evaluatePath, isCompiledPath, type CompiledPath } from "../internal/query/mod.js";
import { serializeTree } from "../internal/serializer/serialize.js";
import { tokenize, type TokenizeResult } from "../internal/tokenizer/mod.js";
import { buildTreeFromTokens, collectMetrics, normalizeTree, type TreeNode } from "../internal/tree/mod.js";

import type {
  BudgetExceededPayload,
  BudgetOptions,
  InputParseErrorPayload,
  InvalidPathPayload,
  NodeVisitor,
  StructuredFormat,
  StructuredParseOptions,
  StructuredParseResult,
  TraceEvent,
  TraceEventBody
} from "./types.js";

export type {
  BudgetExceededPayload,
  BudgetOptions,
  InputParseErrorPayload,
  InvalidPathPayload,
  JsonArray,
  JsonObject,
  JsonPrimitive,
  JsonValue,
  NodeVisitor,
  StructuredFormat,
  StructuredParseOptions,
  StructuredParseResult,
  TraceBudgetEvent,
  TraceDecodeEvent,
  TraceDispatchEvent,
  TraceEvent,
  TraceEventBody,
  TraceRecoveryEvent,
  TraceTokenEvent,
  TraceTokenizerErrorEvent,
  TraceTreeEvent,
  TreeNode,
  TreeRecovery
} from "./types.js";

export { mergeDeep, replaceDeep, stripDeep } from "../internal/values/mod.js";

/**
 * Raised when input was recognized but cannot be read: JSON that does not
 * decode, markup the tokenizer cannot get through, or an unknown charset.
 */
export class InputParseError extends Error {
  readonly payload: InputParseErrorPayload;

  constructor(payload: InputParseErrorPayload, cause?: unknown) {
    super(`Input parse failed: ${payload.code} ${payload.message}`, cause === undefined ? undefined : { cause });
    this.name = "InputParseError";
    this.payload = payload;
  }
}

export class BudgetExceededError extends Error {
  readonly payload: BudgetExceededPayload;

  constructor(payload: BudgetExceededPayload) {
    super(
      `Budget exceeded: ${payload.budget} limit=${String(payload.limit)} actual=${String(payload.actual)}`
    );
    this.name = "BudgetExceededError";
    this.payload = payload;
  }
}

export class InvalidPathError extends Error {
  readonly payload: InvalidPathPayload;

  constructor(payload: InvalidPathPayload) {
    super(`Invalid path ${JSON.stringify(payload.path)} at step ${JSON.stringify(payload.step)}`);
    this.name = "InvalidPathError";
    this.payload = payload;
  }
}

function enforceBudget(budget: keyof BudgetOptions, limit: number | undefined, actual: number): void {
  if (limit === undefined || actual <= limit) {
    return;
  }

  throw new BudgetExceededError({
    code: "BUDGET_EXCEEDED",
    budget,
    limit,
    actual
  });
}

class TraceRecorder {
  readonly #events: TraceEvent[] = [];
  readonly #limit: number | undefined;

  constructor(limit: number | undefined) {
    this.#limit = limit;
  }

  push(event: TraceEventBody): void {
    this.#events.push({ ...event, seq: this.#events.length + 1 });
    enforceBudget("maxTraceEvents", this.#limit, this.#events.length);
  }

  pushBudget(budget: keyof BudgetOptions, limit: number | undefined, actual: number): void {
    this.push({ kind: "budget", budget, limit: limit ?? null, actual });
  }

  get events(): readonly TraceEvent[] {
    return [...this.#events];
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Decodes JSON text. Raw control characters inside string literals are
 * accepted; anything else `JSON.parse` rejects raises `InputParseError`.
 */
export function decodeJson(text: string): JsonValue {
  return withJsonDecodeErrors(() => decodeJsonText(text));
}

function withJsonDecodeErrors<T>(decode: () => T): T {
  try {
    return decode();
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new InputParseError({ code: "JSON_DECODE_FAILED", message: error.message }, error);
    }
    throw error;
  }
}

/**
 * Maps an already-decoded JSON value to a tree. Array items are named
 * `i0`, `i1`, …, object members by their key; scalars become leaf text.
 * Members follow the object's iteration order, which lists integer-like
 * keys first; `parseStructuredText` reads JSON text in source order instead.
 * Never throws.
 */
export function jsonValueToTree(value: JsonValue, rootName: string = DEFAULT_ROOT_NAME): TreeNode {
  return buildTreeFromJson(value, rootName);
}

function markupToTreeInternal(markup: string, trace: TraceRecorder | undefined): TreeNode | null {
  let tokenized: TokenizeResult;
  try {
    tokenized = tokenize(markup);
  } catch (error) {
    throw new InputParseError({ code: "MARKUP_TOKENIZE_FAILED", message: errorMessage(error) }, error);
  }

  trace?.push({ kind: "token", count: tokenized.tokens.length });
  for (const error of tokenized.errors) {
    trace?.push({ kind: "tokenizer-error", code: error.code, index: error.index });
  }

  return buildTreeFromTokens(
    tokenized.tokens,
    trace
      ? {
          onRecovery(recovery) {
            trace?.push({ kind: "recovery", ...recovery });
          }
        }
      : {}
  );
}

/**
 * Builds a tree from a markup string, recovering from unbalanced tags.
 *
 * The result is the node touched last rather than a synthetic document
 * root: with several top-level elements it is the last one closed, and
 * `null` when the input holds no element at all.
 */
export function markupToTree(markup: string): TreeNode | null {
  return markupToTreeInternal(markup, undefined);
}

function detectFormat(text: string): StructuredFormat | null {
  if (text.startsWith("{") || text.startsWith("[")) {
    return "json";
  }

  if (text.startsWith("<")) {
    return "markup";
  }

  return null;
}

function parseStructuredInternal(
  input: string,
  options: StructuredParseOptions,
  trace: TraceRecorder | undefined
): StructuredParseResult {
  const budgets = options.budgets;

  const text = input.trim();
  const format = detectFormat(text);
  trace?.push({ kind: "dispatch", format, inputLength: input.length });

  if (format === null) {
    return { format, tree: null, ...(trace ? { trace: trace.events } : {}) };
  }

  const tree =
    format === "json"
      ? buildTreeFromJsonSyntax(
          withJsonDecodeErrors<JsonSyntaxNode>(() => decodeJsonSyntax(text)),
          options.rootName ?? DEFAULT_ROOT_NAME
        )
      : markupToTreeInternal(text, trace);

  const metrics = collectMetrics(tree);
  enforceBudget("maxNodes", budgets?.maxNodes, metrics.nodes);
  enforceBudget("maxDepth", budgets?.maxDepth, metrics.maxDepth);

  trace?.push({ kind: "tree", nodeCount: metrics.nodes, maxDepth: metrics.maxDepth });
  trace?.pushBudget("maxNodes", budgets?.maxNodes, metrics.nodes);
  trace?.pushBudget("maxDepth", budgets?.maxDepth, metrics.maxDepth);

  return { format, tree, ...(trace ? { trace: trace.events } : {}) };
}

/**
 * Parses text that is either JSON or markup into a tree, picking the format
 * from the first non-whitespace character: `{` or `[` for JSON, `<` for
 * markup. Any other input yields `format: null` and no tree.
 */
export function parseStructuredTextDetailed(
  input: string,
  options: StructuredParseOptions = {}
): StructuredParseResult {
  const trace = options.trace ? new TraceRecorder(options.budgets?.maxTraceEvents) : undefined;
  enforceBudget("maxInputBytes", options.budgets?.maxInputBytes, input.length);
  trace?.pushBudget("maxInputBytes", options.budgets?.maxInputBytes, input.length);
  return parseStructuredInternal(input, options, trace);
}

/**
 * Parses JSON or markup text into a tree. Returns `null` when the input is
 * neither; throws `InputParseError` when it is one of them but unreadable.
 */
export function parseStructuredText(input: string, options: StructuredParseOptions = {}): TreeNode | null {
  return parseStructuredTextDetailed(input, options).tree;
}

export function parseStructuredBytesDetailed(
  bytes: Uint8Array,
  options: StructuredParseOptions = {}
): StructuredParseResult {
  const trace = options.trace ? new TraceRecorder(options.budgets?.maxTraceEvents) : undefined;
  enforceBudget("maxInputBytes", options.budgets?.maxInputBytes, bytes.byteLength);

  let decoded: ReturnType<typeof decodeBytes>;
  try {
    decoded = decodeBytes(
      bytes,
      options.transportEncodingLabel !== undefined
        ? { transportEncodingLabel: options.transportEncodingLabel }
        : {}
    );
  } catch (error) {
    if (error instanceof RangeError) {
      throw new InputParseError({ code: "UNSUPPORTED_ENCODING", message: error.message }, error);
    }
    throw error;
  }

  trace?.push({
    kind: "decode",
    encoding: decoded.sniff.encoding,
    sniffSource: decoded.sniff.source
  });
  trace?.pushBudget("maxInputBytes", options.budgets?.maxInputBytes, bytes.byteLength);

  return parseStructuredInternal(decoded.text, options, trace);
}

/** Decodes raw bytes (BOM, transport charset, meta prescan) then parses them. */
export function parseStructuredBytes(bytes: Uint8Array, options: StructuredParseOptions = {}): TreeNode | null {
  return parseStructuredBytesDetailed(bytes, options).tree;
}

function requirePath(path: string): CompiledPath {
  const compiled = compilePath(path);
  if (!isCompiledPath(compiled)) {
    throw new InvalidPathError({ code: "INVALID_PATH", path: compiled.path, step: compiled.step });
  }
  return compiled;
}

function* iterateNodes(
  node: TreeNode,
  depth: number
): IterableIterator<{ readonly node: TreeNode; readonly depth: number }> {
  yield { node, depth };
  for (const child of node.children) {
    yield* iterateNodes(child, depth + 1);
  }
}

/** Pre-order traversal; the root is visited at depth 0. */
export function walk(root: TreeNode, visitor: NodeVisitor): void {
  for (const entry of iterateNodes(root, 0)) {
    visitor(entry.node, entry.depth);
  }
}

export function* findAllByName(root: TreeNode, name: string): IterableIterator<TreeNode> {
  for (const entry of iterateNodes(root, 0)) {
    if (entry.node.name === name) {
      yield entry.node;
    }
  }
}

export function* findAllByAttr(root: TreeNode, name: string, value?: string): IterableIterator<TreeNode> {
  for (const entry of iterateNodes(root, 0)) {
    const actual = entry.node.attributes[name];
    if (actual !== undefined && (value === undefined || actual === value)) {
      yield entry.node;
    }
  }
}

export function child(node: TreeNode, name: string): TreeNode | null {
  return node.children.find((candidate) => candidate.name === name) ?? null;
}

/**
 * All nodes matching a relative path such as `items/i0/title`,
 * `.//a[@href]` or `row[2]/*`. Throws `InvalidPathError` on bad syntax.
 */
export function findAll(root: TreeNode, path: string): TreeNode[] {
  return evaluatePath(root, requirePath(path));
}

export function find(root: TreeNode, path: string): TreeNode | null {
  return findAll(root, path)[0] ?? null;
}

/** Text of the first match, `""` when it has none, `null` without a match. */
export function findText(root: TreeNode, path: string): string | null {
  const match = find(root, path);
  if (!match) {
    return null;
  }
  return match.text ?? "";
}

/** Concatenated text of a node and its descendants, tails included. */
export function textContent(node: TreeNode): string {
  let out = node.text ?? "";
  for (const entry of node.children) {
    out += textContent(entry) + (entry.tail ?? "");
  }
  return out;
}

export function serialize(root: TreeNode): string {
  return serializeTree(root);
}

export { normalizeTree };
