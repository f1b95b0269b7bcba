import type { Commit, FilePath } from "../shared/types";

export function createCommit(
  name: string,
  description: string,
  files: readonly FilePath[],
): Commit {
  return Object.freeze({
    name,
    description,
    createdAt: new Date(),
    files: Object.freeze([...files]),
  });
}

export function formatCommit(commit: Commit): string {
  return `Commit: ${commit.name}, Description: ${
    commit.description
  }, Created at: ${commit.createdAt.toISOString()}`;
}
