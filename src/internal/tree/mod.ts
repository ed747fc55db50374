export { buildTreeFromTokens, collectMetrics, createNode } from "./build.js";
export { normalizeTree } from "./normalize.js";

export type {
  MutableTreeNode,
  TreeBuildOptions,
  TreeMetrics,
  TreeNode,
  TreeRecovery
} from "./types.js";
