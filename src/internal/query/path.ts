import type { TreeNode } from "../tree/types.js";

export type PathPredicate =
  | { readonly kind: "has-attr"; readonly name: string }
  | { readonly kind: "attr-equals"; readonly name: string; readonly value: string }
  | { readonly kind: "position"; readonly index: number };

export interface PathStep {
  /** Child name, `*` for any child, or `.` for the context node itself. */
  readonly name: string;
  readonly descendants: boolean;
  readonly predicates: readonly PathPredicate[];
}

export interface CompiledPath {
  readonly source: string;
  readonly steps: readonly PathStep[];
}

export type PathSyntaxIssue = { readonly path: string; readonly step: string };

const STEP_PATTERN = /^([^[\]]+)((?:\[[^\]]*\])*)$/;
const PREDICATE_PATTERN = /\[([^\]]*)\]/g;
const ATTR_EQUALS_PATTERN = /^@([^=\s]+)\s*=\s*(["'])(.*)\2$/;
const HAS_ATTR_PATTERN = /^@([^=\s]+)$/;
const POSITION_PATTERN = /^[1-9]\d*$/;

function parsePredicate(raw: string): PathPredicate | null {
  const trimmed = raw.trim();

  const equals = trimmed.match(ATTR_EQUALS_PATTERN);
  const equalsName = equals?.[1];
  const equalsValue = equals?.[3];
  if (equalsName !== undefined && equalsValue !== undefined) {
    return { kind: "attr-equals", name: equalsName, value: equalsValue };
  }

  const hasName = trimmed.match(HAS_ATTR_PATTERN)?.[1];
  if (hasName !== undefined) {
    return { kind: "has-attr", name: hasName };
  }

  if (POSITION_PATTERN.test(trimmed)) {
    return { kind: "position", index: Number(trimmed) };
  }

  return null;
}

function parseStep(raw: string, descendants: boolean): PathStep | null {
  const match = raw.match(STEP_PATTERN);
  const name = match?.[1];
  if (!match || name === undefined) {
    return null;
  }

  const predicates: PathPredicate[] = [];
  for (const predicateMatch of (match[2] ?? "").matchAll(PREDICATE_PATTERN)) {
    const predicate = parsePredicate(predicateMatch[1] ?? "");
    if (!predicate) {
      return null;
    }
    predicates.push(predicate);
  }

  if (name === "." && predicates.length > 0) {
    return null;
  }

  return { name, descendants, predicates };
}

/**
 * Compiles a `/`-separated relative path. An empty segment (`a//b`, or a
 * leading `.//`) makes the next step search all descendants instead of
 * direct children. Returns the offending step when the path is malformed.
 */
export function compilePath(path: string): CompiledPath | PathSyntaxIssue {
  const source = path.trim();
  if (source.startsWith("/")) {
    return { path, step: "/" };
  }

  const segments = source === "" ? ["."] : source.split("/");
  const steps: PathStep[] = [];
  let descendants = false;

  for (const [index, segment] of segments.entries()) {
    if (segment === "") {
      if (descendants || index === segments.length - 1) {
        return { path, step: segment };
      }
      descendants = true;
      continue;
    }

    const step = parseStep(segment, descendants);
    if (!step) {
      return { path, step: segment };
    }

    steps.push(step);
    descendants = false;
  }

  return { source, steps };
}

export function isCompiledPath(value: CompiledPath | PathSyntaxIssue): value is CompiledPath {
  return "steps" in value;
}

function* descendantsOf(node: TreeNode): IterableIterator<TreeNode> {
  for (const child of node.children) {
    yield child;
    yield* descendantsOf(child);
  }
}

function matchesAttributes(node: TreeNode, predicates: readonly PathPredicate[]): boolean {
  return predicates.every((predicate) => {
    if (predicate.kind === "has-attr") {
      return Object.hasOwn(node.attributes, predicate.name);
    }
    if (predicate.kind === "attr-equals") {
      return node.attributes[predicate.name] === predicate.value;
    }
    return true;
  });
}

function applyStep(context: TreeNode, step: PathStep): TreeNode[] {
  if (step.name === ".") {
    return step.descendants ? [context, ...descendantsOf(context)] : [context];
  }

  const pool: readonly TreeNode[] = step.descendants ? [...descendantsOf(context)] : context.children;
  let candidates = pool.filter(
    (node) => (step.name === "*" || node.name === step.name) && matchesAttributes(node, step.predicates)
  );

  for (const predicate of step.predicates) {
    if (predicate.kind === "position") {
      const picked = candidates[predicate.index - 1];
      candidates = picked ? [picked] : [];
    }
  }

  return candidates;
}

/**
 * Evaluates a compiled path from `root`, returning matches in document
 * order without duplicates. Positional predicates count from 1 among the
 * candidates found for each context node.
 */
export function evaluatePath(root: TreeNode, compiled: CompiledPath): TreeNode[] {
  let context: TreeNode[] = [root];

  for (const step of compiled.steps) {
    const seen = new Set<TreeNode>();
    const next: TreeNode[] = [];

    for (const node of context) {
      for (const match of applyStep(node, step)) {
        if (!seen.has(match)) {
          seen.add(match);
          next.push(match);
        }
      }
    }

    context = next;
  }

  return context;
}
