import type { BranchName, FilePath } from "./types";

/**
 * Thrown by `Branch.join` when both branches touch at least one common file.
 * Nothing is merged when this is thrown.
 */
export class NotJoinableBranchesError extends Error {
  constructor(
    public readonly sourceBranch: BranchName,
    public readonly destinationBranch: BranchName,
    public readonly conflictingFiles: FilePath[],
  ) {
    super(
      `Cannot join ${sourceBranch} into ${destinationBranch}: both touch ${conflictingFiles.join(
        ", ",
      )}`,
    );
    this.name = "NotJoinableBranchesError";
  }
}

/**
 * Thrown when a commit used as a clone boundary is not part of the branch
 * being cloned.
 */
export class CommitNotFoundError extends Error {
  constructor(
    public readonly branchName: BranchName,
    public readonly commitName: string,
  ) {
    super(`Commit ${commitName} could not be found on branch ${branchName}.`);
    this.name = "CommitNotFoundError";
  }
}

export class ReplayScriptError extends Error {
  constructor(message: string, public readonly stepIndex?: number) {
    super(stepIndex === undefined ? message : `Step ${stepIndex}: ${message}`);
    this.name = "ReplayScriptError";
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly configPath: string) {
    super(`${configPath}: ${message}`);
    this.name = "ConfigError";
  }
}
