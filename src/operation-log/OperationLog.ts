/**
 * Undo and redo stacks of reversible operations.
 *
 * Owners record an operation after each mutation and supply the code that
 * reverts or re-applies it. Recording does not clear the redo stack, so a redo
 * after a fresh mutation still re-applies the last undone operation.
 */
export class OperationLog<Operation> {
  private undoStack: Operation[] = [];
  private redoStack: Operation[] = [];

  get undoableOperations(): readonly Operation[] {
    return this.undoStack;
  }

  get redoableOperations(): readonly Operation[] {
    return this.redoStack;
  }

  record(operation: Operation): void {
    this.undoStack.push(operation);
  }

  /**
   * Pops the newest operation and hands it to `revert`. The operation moves
   * to the redo stack only if `revert` returns true; otherwise it is dropped.
   *
   * @returns The popped operation, or undefined if there was nothing to undo.
   */
  undo(revert: (operation: Operation) => boolean): Operation | undefined {
    const operation = this.undoStack.pop();
    if (operation === undefined) {
      return undefined;
    }
    if (revert(operation)) {
      this.redoStack.push(operation);
    }
    return operation;
  }

  /**
   * Pops the newest undone operation and hands it to `reapply`. The operation
   * moves back to the undo stack only if `reapply` returns true.
   */
  redo(reapply: (operation: Operation) => boolean): Operation | undefined {
    const operation = this.redoStack.pop();
    if (operation === undefined) {
      return undefined;
    }
    if (reapply(operation)) {
      this.undoStack.push(operation);
    }
    return operation;
  }
}
