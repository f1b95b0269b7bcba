import type { Branch } from "../branch";
import type { Repository } from "../repository";
import type { BranchName, Commit } from "../shared/types";

import nullthrows from "nullthrows";
import { z } from "zod";

import { ReplayScriptError } from "../shared/errors";

const mustBeString = "must be a string";
const mustBeIndex = "must be a non-negative integer";
const mustBeStringList = "must be a list of strings";

const text = z.string({
  required_error: mustBeString,
  invalid_type_error: mustBeString,
});

/** 0-based index into a branch's commits. */
const commitIndex = z
  .number({ invalid_type_error: mustBeIndex })
  .int(mustBeIndex)
  .nonnegative(mustBeIndex);

const fileList = z.array(z.string({ invalid_type_error: mustBeStringList }), {
  required_error: mustBeStringList,
  invalid_type_error: mustBeStringList,
});

const replayStepSchema = z.discriminatedUnion(
  "op",
  [
    z.object({
      op: z.literal("createBranch"),
      name: text,
      base: text.optional(),
      lastCommit: commitIndex.optional(),
    }),
    z.object({ op: z.literal("removeBranch"), name: text }),
    z.object({
      op: z.literal("cloneBranch"),
      name: text,
      newName: text,
      lastCommit: commitIndex.optional(),
    }),
    z.object({
      op: z.literal("addCommit"),
      branch: text,
      name: text,
      description: text,
      files: fileList,
    }),
    z.object({ op: z.literal("join"), source: text, destination: text }),
    z.object({ op: z.literal("undo"), branch: text.optional() }),
    z.object({ op: z.literal("redo"), branch: text.optional() }),
  ],
  {
    errorMap: (issue, ctx) => {
      switch (issue.code) {
        case z.ZodIssueCode.invalid_union_discriminator:
          return { message: `unknown op ${JSON.stringify(ctx.data?.op)}` };
        case z.ZodIssueCode.invalid_type:
          return { message: "expected an object" };
        default:
          return { message: ctx.defaultError };
      }
    },
  },
);

const missingSteps = 'expected an object with a "steps" list';

const replayScriptSchema = z.object(
  {
    steps: z.array(replayStepSchema, {
      required_error: missingSteps,
      invalid_type_error: missingSteps,
    }),
  },
  { invalid_type_error: missingSteps },
);

export type ReplayStep = z.infer<typeof replayStepSchema>;

export type StepResult =
  | { step: ReplayStep; status: "applied" }
  | { step: ReplayStep; status: "failed"; error: Error };

/**
 * Turns a validation issue into a `ReplayScriptError`. Issues under
 * `steps[i].field` name the step and the field.
 */
function toReplayScriptError({
  code,
  path,
  message,
}: z.ZodIssue): ReplayScriptError {
  const [, stepIndex, field] = path;
  if (typeof stepIndex !== "number") {
    return new ReplayScriptError(message);
  }
  if (
    field === undefined ||
    code === z.ZodIssueCode.invalid_union_discriminator
  ) {
    return new ReplayScriptError(message, stepIndex);
  }
  return new ReplayScriptError(`"${field}" ${message}`, stepIndex);
}

/**
 * Parses a replay script of the form `{ "steps": [...] }`.
 *
 * @throws ReplayScriptError if the script or any of its steps is malformed.
 */
export function parseReplayScript(contents: string): ReplayStep[] {
  let script: unknown;
  try {
    script = JSON.parse(contents);
  } catch (error) {
    throw new ReplayScriptError(
      `invalid JSON (${error instanceof Error ? error.message : error})`,
    );
  }
  const result = replayScriptSchema.safeParse(script);
  if (!result.success) {
    throw toReplayScriptError(result.error.issues[0]);
  }
  return result.data.steps;
}

function requireBranch(
  repository: Repository,
  name: BranchName,
  stepIndex: number,
): Branch {
  const branch = repository.getBranch(name);
  if (!branch) {
    throw new ReplayScriptError(`branch ${name} does not exist`, stepIndex);
  }
  return branch;
}

/**
 * Resolves a commit index on `branchName`. Returns undefined when there is
 * no index, or when the branch is missing so that the repository can treat
 * the step as a no-op.
 */
function resolveLastCommit(
  repository: Repository,
  branchName: BranchName | undefined,
  lastCommitIndex: number | undefined,
  stepIndex: number,
): Commit | undefined {
  if (lastCommitIndex === undefined || branchName === undefined) {
    return undefined;
  }
  const branch = repository.getBranch(branchName);
  if (!branch) {
    return undefined;
  }
  const commits = branch.getCommitsList();
  if (lastCommitIndex >= commits.length) {
    throw new ReplayScriptError(
      `branch ${branchName} has no commit at index ${lastCommitIndex}`,
      stepIndex,
    );
  }
  return nullthrows(commits[lastCommitIndex]);
}

function applyStep(
  repository: Repository,
  step: ReplayStep,
  stepIndex: number,
): void {
  switch (step.op) {
    case "createBranch":
      repository.createBranch(
        step.name,
        step.base,
        resolveLastCommit(repository, step.base, step.lastCommit, stepIndex),
      );
      return;
    case "removeBranch":
      repository.removeBranch(step.name);
      return;
    case "cloneBranch":
      repository.cloneBranch(
        step.name,
        step.newName,
        resolveLastCommit(repository, step.name, step.lastCommit, stepIndex),
      );
      return;
    case "addCommit":
      requireBranch(repository, step.branch, stepIndex).addCommit(
        step.name,
        step.description,
        step.files,
      );
      return;
    case "join":
      requireBranch(repository, step.source, stepIndex).join(
        requireBranch(repository, step.destination, stepIndex),
      );
      return;
    case "undo":
      if (step.branch === undefined) {
        repository.undo();
      } else {
        requireBranch(repository, step.branch, stepIndex).undo();
      }
      return;
    case "redo":
      if (step.branch === undefined) {
        repository.redo();
      } else {
        requireBranch(repository, step.branch, stepIndex).redo();
      }
      return;
  }
}

/**
 * Applies `steps` to `repository` in order. A failing step is recorded and
 * the run carries on with the next one.
 */
export function runReplayScript(
  repository: Repository,
  steps: ReplayStep[],
): StepResult[] {
  return steps.map((step, stepIndex): StepResult => {
    try {
      applyStep(repository, step, stepIndex);
      return { step, status: "applied" };
    } catch (error) {
      if (!(error instanceof Error)) {
        throw error;
      }
      return { step, status: "failed", error };
    }
  });
}

export function describeStep(step: ReplayStep): string {
  switch (step.op) {
    case "createBranch": {
      const base = step.base === undefined ? "" : ` from ${step.base}`;
      const boundary =
        step.lastCommit === undefined ? "" : ` at commit #${step.lastCommit}`;
      return `create branch ${step.name}${base}${boundary}`;
    }
    case "removeBranch":
      return `remove branch ${step.name}`;
    case "cloneBranch": {
      const boundary =
        step.lastCommit === undefined ? "" : ` at commit #${step.lastCommit}`;
      return `clone ${step.name} as ${step.newName}${boundary}`;
    }
    case "addCommit":
      return `commit "${step.name}" on ${step.branch} (${step.files.join(
        ", ",
      )})`;
    case "join":
      return `join ${step.source} into ${step.destination}`;
    case "undo":
    case "redo":
      return step.branch === undefined
        ? `${step.op} repository`
        : `${step.op} branch ${step.branch}`;
  }
}
