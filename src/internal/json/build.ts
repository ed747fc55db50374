import { createNode } from "../tree/build.js";
import type { MutableTreeNode, TreeNode } from "../tree/types.js";

import type { JsonSyntaxNode } from "./decode.js";
import type { JsonValue } from "./types.js";

export const DEFAULT_ROOT_NAME = "root";
export const ARRAY_ITEM_PREFIX = "i";

function buildNode(value: JsonValue, name: string): MutableTreeNode {
  const node = createNode(name);

  if (Array.isArray(value)) {
    value.forEach((item, index) => {
      node.children.push(buildNode(item, `${ARRAY_ITEM_PREFIX}${String(index)}`));
    });
    return node;
  }

  if (value === null) {
    return node;
  }

  if (typeof value === "object") {
    for (const [key, item] of Object.entries(value)) {
      node.children.push(buildNode(item, key));
    }
    return node;
  }

  node.text = String(value);
  return node;
}

/**
 * Maps a decoded JSON value onto a tree of the same shape. Array items are
 * named `i0`, `i1`, …; object members are named by their key, in the
 * object's own iteration order. Scalars become leaf text and `null` an
 * empty leaf.
 */
export function buildTreeFromJson(value: JsonValue, rootName: string = DEFAULT_ROOT_NAME): TreeNode {
  return buildNode(value, rootName);
}

function buildSyntaxNode(syntax: JsonSyntaxNode, name: string): MutableTreeNode {
  const node = createNode(name);

  switch (syntax.type) {
    case "array":
      (syntax.children ?? []).forEach((item, index) => {
        node.children.push(buildSyntaxNode(item, `${ARRAY_ITEM_PREFIX}${String(index)}`));
      });
      return node;
    case "object": {
      // A repeated key keeps its first position and takes the last value.
      const positions = new Map<string, number>();
      for (const property of syntax.children ?? []) {
        const [keyNode, valueNode] = property.children ?? [];
        if (keyNode === undefined || valueNode === undefined || typeof keyNode.value !== "string") {
          continue;
        }

        const key = keyNode.value;
        const member = buildSyntaxNode(valueNode, key);
        const position = positions.get(key);
        if (position === undefined) {
          positions.set(key, node.children.length);
          node.children.push(member);
        } else {
          node.children[position] = member;
        }
      }
      return node;
    }
    case "null":
      return node;
    default:
      node.text = String(syntax.value);
      return node;
  }
}

/**
 * Same mapping as `buildTreeFromJson`, read from a syntax tree so object
 * members keep their source order.
 */
export function buildTreeFromJsonSyntax(syntax: JsonSyntaxNode, rootName: string = DEFAULT_ROOT_NAME): TreeNode {
  return buildSyntaxNode(syntax, rootName);
}
