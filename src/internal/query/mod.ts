export { compilePath, evaluatePath, isCompiledPath } from "./path.js";

export type { CompiledPath, PathPredicate, PathStep, PathSyntaxIssue } from "./path.js";
