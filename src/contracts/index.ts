export { defineToolContract, deepFreeze } from "./define.js";
export { lintToolContract, lintOptionSchema } from "./lint.js";
export type { LintIssue } from "./lint.js";
