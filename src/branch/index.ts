export type { Branch, BranchOperation } from "./Branch";
export { ConcreteBranch } from "./ConcreteBranch";
