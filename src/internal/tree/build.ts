import type { MarkupToken } from "../tokenizer/tokens.js";

import type {
  MutableTreeNode,
  TreeBuildOptions,
  TreeMetrics,
  TreeNode
} from "./types.js";

export function createNode(name: string, attributes: Readonly<Record<string, string>> = {}): MutableTreeNode {
  return { name, attributes, children: [] };
}

interface BuildState {
  readonly stack: MutableTreeNode[];
  current: MutableTreeNode | null;
  afterEnd: boolean;
}

function openElement(
  state: BuildState,
  name: string,
  attributes: Readonly<Record<string, string>>
): void {
  state.afterEnd = false;

  // Valueless attributes already arrive as "" from the tokenizer.
  const node = createNode(name, attributes);
  state.stack[state.stack.length - 1]?.children.push(node);
  state.stack.push(node);
  state.current = node;
}

function closeElement(
  state: BuildState,
  name: string,
  tokenIndex: number,
  options: TreeBuildOptions
): void {
  if (!state.stack.some((node) => node.name === name)) {
    options.onRecovery?.({ action: "ignored-end-tag", tagName: name, tokenIndex });
    return;
  }

  let popped = state.stack.pop();
  while (popped) {
    state.afterEnd = true;
    state.current = popped;
    if (popped.name === name) {
      return;
    }

    options.onRecovery?.({
      action: "implicit-close",
      tagName: popped.name,
      closedBy: name,
      tokenIndex
    });
    popped = state.stack.pop();
  }
}

function assignText(state: BuildState, data: string): void {
  const current = state.current;
  if (!current) {
    return;
  }

  if (state.afterEnd) {
    current.tail = data.trim();
  } else {
    current.text = data.trim();
  }
}

/**
 * Builds a tree from markup tokens with an explicit stack of open nodes.
 *
 * An end tag with no open counterpart is ignored. An end tag whose node is
 * open further down the stack closes every node above it; those nodes stay
 * children of whatever was on top when they opened.
 *
 * The returned root is the node touched last, which is not always the
 * outermost one: for `<a></a><b></b>` it is `b`, and for an unclosed
 * `<a>` followed by `<b></b>` it is also `b`.
 */
export function buildTreeFromTokens(
  tokens: readonly MarkupToken[],
  options: TreeBuildOptions = {}
): TreeNode | null {
  const state: BuildState = { stack: [], current: null, afterEnd: false };

  tokens.forEach((token, tokenIndex) => {
    switch (token.type) {
      case "StartTag":
        openElement(state, token.name, token.attributes);
        if (token.selfClosing) {
          closeElement(state, token.name, tokenIndex, options);
        }
        return;
      case "EndTag":
        closeElement(state, token.name, tokenIndex, options);
        return;
      case "Character":
        assignText(state, token.data);
        return;
      case "Comment":
      case "Doctype":
      case "EOF":
        return;
    }
  });

  return state.current;
}

function collectMetricsForNode(node: TreeNode, depth: number): TreeMetrics {
  let nodes = 1;
  let maxDepth = depth;

  for (const child of node.children) {
    const metrics = collectMetricsForNode(child, depth + 1);
    nodes += metrics.nodes;
    maxDepth = Math.max(maxDepth, metrics.maxDepth);
  }

  return { nodes, maxDepth };
}

export function collectMetrics(root: TreeNode | null): TreeMetrics {
  if (!root) {
    return { nodes: 0, maxDepth: 0 };
  }

  return collectMetricsForNode(root, 1);
}
