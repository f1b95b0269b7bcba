import type { Branch } from "../branch";
import type { BranchName, Commit, RepositoryName } from "../shared/types";

export type RepositoryOperation =
  | { type: "createBranch"; payload: { name: BranchName } }
  | { type: "removeBranch"; payload: { name: BranchName } }
  | {
      type: "cloneBranch";
      payload: { sourceName: BranchName; newName: BranchName };
    }
  | { type: "addBranch"; payload: { name: BranchName; branch: Branch } };

/**
 * A named collection of branches with an undo/redo log of branch lifecycle
 * changes.
 *
 * The repository's log only covers its own branch map. Commits added to a
 * branch are undone through that branch.
 */
export interface Repository {
  /**
   * Create a branch called `newName`.
   *
   * Without `baseBranchName` the new branch is empty. With it, the new branch
   * is a clone of that branch, truncated at `lastCommit` if given. Nothing
   * happens if `baseBranchName` does not exist.
   *
   * @throws CommitNotFoundError if `lastCommit` is not on the base branch.
   */
  createBranch(
    newName: BranchName,
    baseBranchName?: BranchName,
    lastCommit?: Commit,
  ): void;

  /**
   * Remove a branch. Nothing happens if it does not exist.
   */
  removeBranch(name: BranchName): void;

  /**
   * Clone branch `name` as `newName`, truncated at `lastCommit` if given.
   * Nothing happens if `name` does not exist.
   *
   * @throws CommitNotFoundError if `lastCommit` is not on branch `name`.
   */
  cloneBranch(
    name: BranchName,
    newName: BranchName,
    lastCommit?: Commit,
  ): void;

  /**
   * Insert an existing branch under its own name.
   */
  addBranch(branch: Branch): void;

  /**
   * Get a branch by name, or null if there is no such branch.
   */
  getBranch(name: BranchName): Branch | null;

  getBranchList(): Branch[];

  getName(): RepositoryName;

  undo(): void;
  redo(): void;

  getUndoableOperationCount(): number;
  getRedoableOperationCount(): number;
}
