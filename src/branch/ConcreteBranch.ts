import type { BranchName, Commit, FilePath } from "../shared/types";
import type { Branch, BranchOperation } from "./Branch";

import { produce, castDraft } from "immer";

import { createCommit, formatCommit } from "../commit";
import { OperationLog } from "../operation-log";
import {
  CommitNotFoundError,
  NotJoinableBranchesError,
} from "../shared/errors";

function filesTouchedByCommits(commits: readonly Commit[]): Set<FilePath> {
  return new Set(commits.flatMap(({ files }) => files));
}

/**
 * A concrete implementation of the Branch interface.
 *
 * The commit list is replaced (never mutated) on every change, so snapshots
 * handed out by `getCommitsList` and `clone` stay valid.
 */
export class ConcreteBranch implements Branch {
  name: BranchName;

  private commits: readonly Commit[];
  private operationLog = new OperationLog<BranchOperation>();

  constructor(name: BranchName, commits: readonly Commit[] = []) {
    this.name = name;
    this.commits = commits;
  }

  addCommit(name: string, description: string, files: FilePath[]): void {
    const commit = createCommit(name, description, files);
    this.appendCommit(commit);
    this.operationLog.record({ type: "addCommit", payload: { commit } });
  }

  clone(lastCommit?: Commit): Branch {
    if (!lastCommit) {
      return new ConcreteBranch(this.name, this.commits);
    }

    const lastCommitIndex = this.commits.indexOf(lastCommit);
    if (lastCommitIndex === -1) {
      throw new CommitNotFoundError(this.name, lastCommit.name);
    }
    return new ConcreteBranch(
      this.name,
      this.commits.slice(0, lastCommitIndex + 1),
    );
  }

  join(destination: Branch): void {
    // Snapshot first: `destination` may be this branch.
    const commitsToJoin = this.commits;

    const destinationFiles = filesTouchedByCommits(
      destination.getCommitsList(),
    );
    const conflictingFiles = Array.from(
      filesTouchedByCommits(commitsToJoin),
    ).filter((file) => destinationFiles.has(file));
    if (conflictingFiles.length > 0) {
      throw new NotJoinableBranchesError(
        this.name,
        destination.getName(),
        conflictingFiles,
      );
    }

    commitsToJoin.forEach(({ name, description, files }) =>
      destination.addCommit(name, description, [...files]),
    );
  }

  undo(): void {
    this.operationLog.undo((operation) => {
      switch (operation.type) {
        case "addCommit":
          this.removeCommit(operation.payload.commit);
          return true;
      }
    });
  }

  redo(): void {
    this.operationLog.redo((operation) => {
      switch (operation.type) {
        case "addCommit":
          this.appendCommit(operation.payload.commit);
          return true;
      }
    });
  }

  getCommitsList(): readonly Commit[] {
    return this.commits;
  }

  getName(): BranchName {
    return this.name;
  }

  getUndoableOperationCount(): number {
    return this.operationLog.undoableOperations.length;
  }

  getRedoableOperationCount(): number {
    return this.operationLog.redoableOperations.length;
  }

  toString(): string {
    return [`Branch: ${this.name}`, ...this.commits.map(formatCommit)]
      .map((line) => `${line}\n`)
      .join("");
  }

  private appendCommit(commit: Commit): void {
    this.commits = produce(this.commits, (draftCommits) => {
      draftCommits.push(castDraft(commit));
    });
  }

  private removeCommit(commit: Commit): void {
    // Look the commit up outside of `produce`: drafts are proxies and would
    // never be identical to `commit`.
    const commitIndex = this.commits.indexOf(commit);
    if (commitIndex === -1) {
      return;
    }
    this.commits = produce(this.commits, (draftCommits) => {
      draftCommits.splice(commitIndex, 1);
    });
  }
}
