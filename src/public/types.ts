import type { EncodingSniffSource } from "../internal/encoding/mod.js";
import type { TreeNode, TreeRecovery } from "../internal/tree/mod.js";

export type { TreeNode, TreeRecovery } from "../internal/tree/mod.js";
export type { JsonArray, JsonObject, JsonPrimitive, JsonValue } from "../internal/json/mod.js";

export type StructuredFormat = "json" | "markup";

export interface BudgetOptions {
  readonly maxInputBytes?: number;
  readonly maxNodes?: number;
  readonly maxDepth?: number;
  readonly maxTraceEvents?: number;
}

export interface StructuredParseOptions {
  /** Name of the root node built for JSON input. Defaults to `"root"`. */
  readonly rootName?: string;
  readonly trace?: boolean;
  /** Charset from the transport layer, e.g. a `Content-Type` header. */
  readonly transportEncodingLabel?: string;
  readonly budgets?: BudgetOptions;
}

export interface InputParseErrorPayload {
  readonly code: "JSON_DECODE_FAILED" | "MARKUP_TOKENIZE_FAILED" | "UNSUPPORTED_ENCODING";
  readonly message: string;
}

export interface BudgetExceededPayload {
  readonly code: "BUDGET_EXCEEDED";
  readonly budget: keyof BudgetOptions;
  readonly limit: number;
  readonly actual: number;
}

export interface InvalidPathPayload {
  readonly code: "INVALID_PATH";
  readonly path: string;
  readonly step: string;
}

export interface TraceDispatchEvent {
  readonly kind: "dispatch";
  readonly format: StructuredFormat | null;
  readonly inputLength: number;
}

export interface TraceDecodeEvent {
  readonly kind: "decode";
  readonly encoding: string;
  readonly sniffSource: EncodingSniffSource;
}

export interface TraceTokenEvent {
  readonly kind: "token";
  readonly count: number;
}

export interface TraceTokenizerErrorEvent {
  readonly kind: "tokenizer-error";
  readonly code: string;
  readonly index: number;
}

export type TraceRecoveryEvent = TreeRecovery & { readonly kind: "recovery" };

export interface TraceTreeEvent {
  readonly kind: "tree";
  readonly nodeCount: number;
  readonly maxDepth: number;
}

export interface TraceBudgetEvent {
  readonly kind: "budget";
  readonly budget: keyof BudgetOptions;
  readonly limit: number | null;
  readonly actual: number;
}

export type TraceEventBody =
  | TraceDispatchEvent
  | TraceDecodeEvent
  | TraceTokenEvent
  | TraceTokenizerErrorEvent
  | TraceRecoveryEvent
  | TraceTreeEvent
  | TraceBudgetEvent;

export type TraceEvent = TraceEventBody & { readonly seq: number };

export interface StructuredParseResult {
  readonly format: StructuredFormat | null;
  readonly tree: TreeNode | null;
  readonly trace?: readonly TraceEvent[];
}

export type NodeVisitor = (node: TreeNode, depth: number) => void;
