export interface TreeNode {
  readonly name: string;
  readonly attributes: Readonly<Record<string, string>>;
  readonly text?: string;
  readonly tail?: string;
  readonly children: readonly TreeNode[];
}

/** Node shape used while a build pass is still running. */
export interface MutableTreeNode {
  name: string;
  attributes: Readonly<Record<string, string>>;
  text?: string;
  tail?: string;
  children: MutableTreeNode[];
}

export type TreeRecovery =
  | {
      readonly action: "ignored-end-tag";
      readonly tagName: string;
      readonly tokenIndex: number;
    }
  | {
      readonly action: "implicit-close";
      readonly tagName: string;
      readonly closedBy: string;
      readonly tokenIndex: number;
    };

export interface TreeBuildOptions {
  readonly onRecovery?: (recovery: TreeRecovery) => void;
}

export interface TreeMetrics {
  readonly nodes: number;
  readonly maxDepth: number;
}
