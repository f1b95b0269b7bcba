import type { Branch } from "../branch";
import type { BranchName, Commit, RepositoryName } from "../shared/types";
import type { Repository, RepositoryOperation } from "./Repository";

import { produce, castDraft, enableMapSet } from "immer";

import { ConcreteBranch } from "../branch";
import { OperationLog } from "../operation-log";

enableMapSet();

export type BranchConstructor = (name: BranchName) => Branch;

/**
 * A concrete implementation of the Repository interface.
 *
 * Undo and redo follow these rules:
 *
 * - Undoing `createBranch` drops the log entry without touching any branch.
 * - Undoing `removeBranch` deletes the (already removed) branch again, and
 *   redoing it deletes it once more. The removed branch is never restored.
 * - Undoing `cloneBranch` deletes the *source* branch, and redoing it only
 *   moves the entry back to the undo log.
 * - Undoing `addBranch` deletes the branch; redoing it re-inserts the very
 *   same branch object.
 */
export class ConcreteRepository implements Repository {
  private name: RepositoryName;
  private branches: ReadonlyMap<BranchName, Branch> = new Map();
  private operationLog = new OperationLog<RepositoryOperation>();
  private branchConstructor: BranchConstructor;

  constructor(
    name: RepositoryName,
    branchConstructor: BranchConstructor = (branchName) =>
      new ConcreteBranch(branchName),
  ) {
    this.name = name;
    this.branchConstructor = branchConstructor;
  }

  createBranch(
    newName: BranchName,
    baseBranchName?: BranchName,
    lastCommit?: Commit,
  ): void {
    if (baseBranchName) {
      const baseBranch = this.branches.get(baseBranchName);
      if (!baseBranch) {
        return;
      }
      this.setBranch(newName, this.cloneAs(baseBranch, newName, lastCommit));
    } else {
      this.setBranch(newName, this.branchConstructor(newName));
    }
    this.operationLog.record({
      type: "createBranch",
      payload: { name: newName },
    });
  }

  removeBranch(name: BranchName): void {
    if (!this.branches.has(name)) {
      return;
    }
    this.deleteBranch(name);
    this.operationLog.record({ type: "removeBranch", payload: { name } });
  }

  cloneBranch(
    name: BranchName,
    newName: BranchName,
    lastCommit?: Commit,
  ): void {
    const sourceBranch = this.branches.get(name);
    if (!sourceBranch) {
      return;
    }
    this.setBranch(newName, this.cloneAs(sourceBranch, newName, lastCommit));
    this.operationLog.record({
      type: "cloneBranch",
      payload: { sourceName: name, newName },
    });
  }

  addBranch(branch: Branch): void {
    const name = branch.getName();
    this.setBranch(name, branch);
    this.operationLog.record({ type: "addBranch", payload: { name, branch } });
  }

  getBranch(name: BranchName): Branch | null {
    return this.branches.get(name) ?? null;
  }

  getBranchList(): Branch[] {
    return Array.from(this.branches.values());
  }

  getName(): RepositoryName {
    return this.name;
  }

  undo(): void {
    this.operationLog.undo((operation) => {
      switch (operation.type) {
        case "createBranch":
          return false;
        case "removeBranch":
          this.deleteBranch(operation.payload.name);
          return true;
        case "cloneBranch":
          this.deleteBranch(operation.payload.sourceName);
          return true;
        case "addBranch":
          this.deleteBranch(operation.payload.name);
          return true;
      }
    });
  }

  redo(): void {
    this.operationLog.redo((operation) => {
      switch (operation.type) {
        case "createBranch":
          // Never reaches the redo log; see `undo`.
          return true;
        case "removeBranch":
          this.deleteBranch(operation.payload.name);
          return true;
        case "cloneBranch":
          return true;
        case "addBranch":
          this.setBranch(operation.payload.name, operation.payload.branch);
          return true;
      }
    });
  }

  getUndoableOperationCount(): number {
    return this.operationLog.undoableOperations.length;
  }

  getRedoableOperationCount(): number {
    return this.operationLog.redoableOperations.length;
  }

  private cloneAs(
    branch: Branch,
    newName: BranchName,
    lastCommit: Commit | undefined,
  ): Branch {
    const clonedBranch = branch.clone(lastCommit);
    clonedBranch.name = newName;
    return clonedBranch;
  }

  private setBranch(name: BranchName, branch: Branch): void {
    this.branches = produce(this.branches, (draftBranches) => {
      draftBranches.set(name, castDraft(branch));
    });
  }

  private deleteBranch(name: BranchName): void {
    if (!this.branches.has(name)) {
      return;
    }
    this.branches = produce(this.branches, (draftBranches) => {
      draftBranches.delete(name);
    });
  }
}
