export type { Branch, BranchOperation } from "./branch";
export { ConcreteBranch } from "./branch";
export { createCommit, formatCommit } from "./commit";
export { OperationLog } from "./operation-log";
export type {
  BranchConstructor,
  Repository,
  RepositoryOperation,
} from "./repository";
export { ConcreteRepository } from "./repository";
export type { ReplayStep, StepResult } from "./script";
export { describeStep, parseReplayScript, runReplayScript } from "./script";
export {
  CommitNotFoundError,
  ConfigError,
  NotJoinableBranchesError,
  ReplayScriptError,
} from "./shared/errors";
export type {
  BranchName,
  Commit,
  FilePath,
  RepositoryName,
} from "./shared/types";
