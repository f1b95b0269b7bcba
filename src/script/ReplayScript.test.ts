import fs from "fs";
import path from "path";

import type { ReplayStep } from "./ReplayScript";

import { ConcreteRepository } from "../repository";
import {
  NotJoinableBranchesError,
  ReplayScriptError,
} from "../shared/errors";
import {
  describeStep,
  parseReplayScript,
  runReplayScript,
} from "./ReplayScript";

function repositoryWithMain(): ConcreteRepository {
  const repository = new ConcreteRepository("demo");
  repository.createBranch("main");
  return repository;
}

function commitNames(repository: ConcreteRepository, branch: string) {
  return (repository.getBranch(branch)?.getCommitsList() ?? []).map(
    ({ name }) => name,
  );
}

describe("parseReplayScript", () => {
  test("parses every kind of step", () => {
    const steps = parseReplayScript(
      JSON.stringify({
        steps: [
          { op: "createBranch", name: "feature", base: "main", lastCommit: 0 },
          { op: "removeBranch", name: "feature" },
          { op: "cloneBranch", name: "main", newName: "copy" },
          {
            op: "addCommit",
            branch: "main",
            name: "c1",
            description: "First",
            files: ["a.ts"],
          },
          { op: "join", source: "copy", destination: "main" },
          { op: "undo" },
          { op: "redo", branch: "main" },
        ],
      }),
    );

    expect(steps).toEqual([
      { op: "createBranch", name: "feature", base: "main", lastCommit: 0 },
      { op: "removeBranch", name: "feature" },
      {
        op: "cloneBranch",
        name: "main",
        newName: "copy",
        lastCommit: undefined,
      },
      {
        op: "addCommit",
        branch: "main",
        name: "c1",
        description: "First",
        files: ["a.ts"],
      },
      { op: "join", source: "copy", destination: "main" },
      { op: "undo", branch: undefined },
      { op: "redo", branch: "main" },
    ]);
  });

  test("rejects a script without steps", () => {
    expect(() => parseReplayScript('{ "actions": [] }')).toThrow(
      'expected an object with a "steps" list',
    );
  });

  test("rejects invalid JSON", () => {
    expect(() => parseReplayScript("steps:")).toThrow(ReplayScriptError);
  });

  test("names the step with an unknown op", () => {
    expect(() =>
      parseReplayScript('{ "steps": [{ "op": "rebase" }] }'),
    ).toThrow('Step 0: unknown op "rebase"');
  });

  test("names the step with a malformed field", () => {
    const script = JSON.stringify({
      steps: [
        { op: "undo" },
        {
          op: "addCommit",
          branch: "main",
          name: "c1",
          description: "First",
          files: "a.ts",
        },
      ],
    });

    expect(() => parseReplayScript(script)).toThrow(
      'Step 1: "files" must be a list of strings',
    );
  });

  test("names a step that is not an object", () => {
    expect(() =>
      parseReplayScript('{ "steps": [{ "op": "undo" }, "redo"] }'),
    ).toThrow("Step 1: expected an object");
  });

  test("names a missing field", () => {
    let thrown: unknown;
    try {
      parseReplayScript('{ "steps": [{ "op": "join", "source": "main" }] }');
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ReplayScriptError);
    if (thrown instanceof ReplayScriptError) {
      expect(thrown.stepIndex).toBe(0);
      expect(thrown.message).toBe('Step 0: "destination" must be a string');
    }
  });

  test("rejects fractional commit indexes", () => {
    expect(() =>
      parseReplayScript(
        '{ "steps": [{ "op": "createBranch", "name": "x", "base": "main", "lastCommit": 1.5 }] }',
      ),
    ).toThrow('Step 0: "lastCommit" must be a non-negative integer');
  });

  test("drops unknown fields", () => {
    expect(
      parseReplayScript('{ "steps": [{ "op": "undo", "note": "tidy up" }] }'),
    ).toEqual([{ op: "undo" }]);
  });

  test("rejects negative commit indexes", () => {
    expect(() =>
      parseReplayScript(
        '{ "steps": [{ "op": "cloneBranch", "name": "main", "newName": "x", "lastCommit": -1 }] }',
      ),
    ).toThrow('Step 0: "lastCommit" must be a non-negative integer');
  });
});

describe("runReplayScript", () => {
  test("applies steps in order", () => {
    const repository = repositoryWithMain();
    const steps: ReplayStep[] = [
      {
        op: "addCommit",
        branch: "main",
        name: "c1",
        description: "First",
        files: ["a.ts"],
      },
      {
        op: "addCommit",
        branch: "main",
        name: "c2",
        description: "Second",
        files: ["b.ts"],
      },
      { op: "createBranch", name: "hotfix", base: "main", lastCommit: 0 },
      {
        op: "addCommit",
        branch: "hotfix",
        name: "h1",
        description: "Fix",
        files: ["fix.ts"],
      },
      { op: "createBranch", name: "docs" },
      {
        op: "addCommit",
        branch: "docs",
        name: "d1",
        description: "Docs",
        files: ["README.md"],
      },
      { op: "join", source: "docs", destination: "main" },
    ];

    const results = runReplayScript(repository, steps);

    expect(results.every(({ status }) => status === "applied")).toBe(true);
    expect(commitNames(repository, "hotfix")).toEqual(["c1", "h1"]);
    expect(commitNames(repository, "main")).toEqual(["c1", "c2", "d1"]);
    expect(commitNames(repository, "docs")).toEqual(["d1"]);
  });

  test("applies every step of the bundled example script", () => {
    const repository = repositoryWithMain();
    const steps = parseReplayScript(
      fs
        .readFileSync(
          path.join(__dirname, "../../examples/feature-branch.json"),
        )
        .toString(),
    );

    const results = runReplayScript(repository, steps);

    expect(results.map(({ status }) => status)).toEqual(
      steps.map(() => "applied"),
    );
    expect(commitNames(repository, "main")).toEqual([
      "Initial layout",
      "Notes",
    ]);
    expect(commitNames(repository, "feature")).toEqual([
      "Initial layout",
      "Add parser",
      "Notes",
    ]);
    expect(repository.getBranch("scratch")).toBeNull();
  });

  test("refuses to join a branch back into the branch it was cut from", () => {
    const repository = repositoryWithMain();

    const [, , , joinResult] = runReplayScript(repository, [
      {
        op: "addCommit",
        branch: "main",
        name: "c1",
        description: "First",
        files: ["README.md"],
      },
      { op: "createBranch", name: "feature", base: "main" },
      {
        op: "addCommit",
        branch: "feature",
        name: "f1",
        description: "Feature",
        files: ["feature.ts"],
      },
      { op: "join", source: "feature", destination: "main" },
    ]);

    expect(joinResult.status).toBe("failed");
    if (joinResult.status === "failed") {
      expect(joinResult.error.message).toBe(
        "Cannot join feature into main: both touch README.md",
      );
    }
    expect(commitNames(repository, "main")).toEqual(["c1"]);
  });

  test("records a failed join and carries on", () => {
    const repository = repositoryWithMain();
    const steps: ReplayStep[] = [
      {
        op: "addCommit",
        branch: "main",
        name: "c1",
        description: "First",
        files: ["a.ts"],
      },
      { op: "cloneBranch", name: "main", newName: "copy" },
      { op: "join", source: "copy", destination: "main" },
      { op: "undo", branch: "main" },
    ];

    const [, , joinResult, undoResult] = runReplayScript(repository, steps);

    expect(joinResult.status).toBe("failed");
    if (joinResult.status === "failed") {
      expect(joinResult.error).toBeInstanceOf(NotJoinableBranchesError);
    }
    expect(undoResult.status).toBe("applied");
    expect(commitNames(repository, "main")).toEqual([]);
  });

  test("fails steps that name a missing branch", () => {
    const repository = repositoryWithMain();

    const [result] = runReplayScript(repository, [
      { op: "undo", branch: "ghost" },
    ]);

    expect(result.status).toBe("failed");
    if (result.status === "failed") {
      expect(result.error.message).toBe("Step 0: branch ghost does not exist");
    }
  });

  test("fails a commit index past the end of the branch", () => {
    const repository = repositoryWithMain();

    const [result] = runReplayScript(repository, [
      { op: "cloneBranch", name: "main", newName: "copy", lastCommit: 2 },
    ]);

    expect(result.status).toBe("failed");
    if (result.status === "failed") {
      expect(result.error.message).toBe(
        "Step 0: branch main has no commit at index 2",
      );
    }
    expect(repository.getBranch("copy")).toBeNull();
  });

  test("leaves cloning a missing branch to the repository", () => {
    const repository = repositoryWithMain();

    const [result] = runReplayScript(repository, [
      { op: "createBranch", name: "feature", base: "ghost", lastCommit: 3 },
    ]);

    expect(result.status).toBe("applied");
    expect(repository.getBranch("feature")).toBeNull();
  });

  test("undoes on the repository when no branch is named", () => {
    const repository = repositoryWithMain();
    repository.cloneBranch("main", "copy");

    runReplayScript(repository, [{ op: "undo" }, { op: "redo" }]);

    expect(
      repository.getBranchList().map((branch) => branch.getName()),
    ).toEqual(["copy"]);
    expect(repository.getRedoableOperationCount()).toBe(0);
  });
});

test("describes steps on one line", () => {
  expect(
    describeStep({
      op: "createBranch",
      name: "feature",
      base: "main",
      lastCommit: 1,
    }),
  ).toBe("create branch feature from main at commit #1");
  expect(describeStep({ op: "cloneBranch", name: "main", newName: "copy" })).toBe(
    "clone main as copy",
  );
  expect(
    describeStep({
      op: "addCommit",
      branch: "main",
      name: "c1",
      description: "First",
      files: ["a.ts", "b.ts"],
    }),
  ).toBe('commit "c1" on main (a.ts, b.ts)');
  expect(describeStep({ op: "join", source: "a", destination: "b" })).toBe(
    "join a into b",
  );
  expect(describeStep({ op: "undo" })).toBe("undo repository");
  expect(describeStep({ op: "redo", branch: "main" })).toBe(
    "redo branch main",
  );
});
