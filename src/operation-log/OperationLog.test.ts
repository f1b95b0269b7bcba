import { OperationLog } from "./OperationLog";

test("undo and redo do nothing on empty logs", () => {
  const log = new OperationLog<string>();
  const revert = jest.fn(() => true);

  expect(log.undo(revert)).toBeUndefined();
  expect(log.redo(revert)).toBeUndefined();
  expect(revert).not.toHaveBeenCalled();
});

test("undo hands the newest operation to revert and moves it to redo", () => {
  const log = new OperationLog<string>();
  log.record("first");
  log.record("second");
  const revert = jest.fn(() => true);

  expect(log.undo(revert)).toBe("second");
  expect(revert).toHaveBeenCalledWith("second");
  expect(log.undoableOperations).toEqual(["first"]);
  expect(log.redoableOperations).toEqual(["second"]);
});

test("undo drops the operation when revert returns false", () => {
  const log = new OperationLog<string>();
  log.record("first");

  log.undo(() => false);

  expect(log.undoableOperations).toEqual([]);
  expect(log.redoableOperations).toEqual([]);
});

test("redo moves the operation back to the undo log", () => {
  const log = new OperationLog<string>();
  log.record("first");
  log.undo(() => true);
  const reapply = jest.fn(() => true);

  expect(log.redo(reapply)).toBe("first");
  expect(reapply).toHaveBeenCalledWith("first");
  expect(log.undoableOperations).toEqual(["first"]);
  expect(log.redoableOperations).toEqual([]);
});

test("recording keeps previously undone operations redoable", () => {
  const log = new OperationLog<string>();
  log.record("first");
  log.undo(() => true);
  log.record("second");

  expect(log.undoableOperations).toEqual(["second"]);
  expect(log.redoableOperations).toEqual(["first"]);
});
