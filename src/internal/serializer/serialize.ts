import type { TreeNode } from "../tree/types.js";

function escapeText(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

function escapeAttribute(value: string, quote: "\"" | "'"): string {
  const escapedAmp = value.replace(/&/g, "&amp;").replace(/</g, "&lt;");
  if (quote === "\"") {
    return escapedAmp.replace(/"/g, "&quot;");
  }

  return escapedAmp.replace(/'/g, "&#39;");
}

function chooseQuote(value: string): "\"" | "'" {
  return value.includes("\"") && !value.includes("'") ? "'" : "\"";
}

function serializeAttributes(attributes: Readonly<Record<string, string>>): string {
  const parts = Object.entries(attributes).map(([name, value]) => {
    const quote = chooseQuote(value);
    return `${name}=${quote}${escapeAttribute(value, quote)}${quote}`;
  });

  return parts.length === 0 ? "" : ` ${parts.join(" ")}`;
}

function serializeTreeNode(node: TreeNode, parts: string[]): void {
  const attrs = serializeAttributes(node.attributes);

  if (node.text === undefined && node.children.length === 0) {
    parts.push(`<${node.name}${attrs} />`);
  } else {
    parts.push(`<${node.name}${attrs}>`);
    if (node.text !== undefined) {
      parts.push(escapeText(node.text));
    }
    for (const child of node.children) {
      serializeTreeNode(child, parts);
    }
    parts.push(`</${node.name}>`);
  }

  if (node.tail !== undefined) {
    parts.push(escapeText(node.tail));
  }
}

/**
 * Renders a tree as markup. Each node's tail follows its closing tag, and a
 * node with neither text nor children is written as an empty-element tag.
 */
export function serializeTree(root: TreeNode): string {
  const parts: string[] = [];
  serializeTreeNode(root, parts);
  return parts.join("");
}
