export type BranchName = string;
export type RepositoryName = string;
export type FilePath = string;

/**
 * A named change touching a list of files. Commits are value objects: once
 * created they never change, and the same Commit may appear in several
 * branches.
 */
export interface Commit {
  readonly name: string;
  readonly description: string;
  readonly createdAt: Date;

  /** Touched paths in insertion order. May contain duplicates. */
  readonly files: readonly FilePath[];
}
