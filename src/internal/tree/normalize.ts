import type { TreeNode } from "./types.js";

function indent(level: number): string {
  return "  ".repeat(level);
}

function quoteRaw(value: string): string {
  return `"${value}"`;
}

function normalizeNode(node: TreeNode, level: number, lines: string[]): void {
  lines.push(`| ${indent(level)}<${node.name}>`);

  for (const [name, value] of Object.entries(node.attributes)) {
    lines.push(`| ${indent(level + 1)}${name}=${quoteRaw(value)}`);
  }

  if (node.text !== undefined) {
    lines.push(`| ${indent(level + 1)}${quoteRaw(node.text)}`);
  }

  for (const child of node.children) {
    normalizeNode(child, level + 1, lines);
  }

  if (node.tail !== undefined) {
    lines.push(`| ${indent(level)}tail=${quoteRaw(node.tail)}`);
  }
}

/** Line-per-node dump of a tree, indented by depth. */
export function normalizeTree(root: TreeNode): string {
  const lines: string[] = [];
  normalizeNode(root, 0, lines);
  return lines.join("\n");
}
