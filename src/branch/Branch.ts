import type { BranchName, Commit, FilePath } from "../shared/types";

export type BranchOperation = {
  type: "addCommit";
  payload: { commit: Commit };
};

/**
 * An ordered history of commits with its own undo/redo log.
 *
 * A branch does not know which repository owns it.
 */
export interface Branch {
  /**
   * The branch's name. Repositories rename freshly cloned branches through
   * this property.
   */
  name: BranchName;

  /**
   * Create a commit and append it to this branch.
   */
  addCommit(name: string, description: string, files: FilePath[]): void;

  /**
   * Copy this branch's history into a new branch with the same name and an
   * empty undo/redo log.
   *
   * @param lastCommit If given, the copy stops at (and includes) this commit.
   * @throws CommitNotFoundError if `lastCommit` is not on this branch.
   */
  clone(lastCommit?: Commit): Branch;

  /**
   * Re-create each of this branch's commits, oldest first, in `destination`.
   * This branch is left untouched.
   *
   * @throws NotJoinableBranchesError if any file is touched by commits on
   * both branches. `destination` is not modified in that case.
   */
  join(destination: Branch): void;

  /**
   * Revert the most recent recorded change. Does nothing if there is none.
   */
  undo(): void;

  /**
   * Re-apply the most recently undone change. Does nothing if there is none.
   */
  redo(): void;

  getCommitsList(): readonly Commit[];

  getName(): BranchName;

  getUndoableOperationCount(): number;
  getRedoableOperationCount(): number;

  /**
   * A listing of the branch name followed by one line per commit.
   */
  toString(): string;
}
