import type { Branch } from "../branch";
import type { Repository } from "../repository";
import type { BranchName, Commit } from "../shared/types";

import type { Dispatch } from "react";

import { useReducer, useEffect } from "react";
import nullthrows from "nullthrows";

import {
  randomBranchName,
  randomCommitName,
  randomFilePath,
} from "./randomNames";

export type DisplayBranch = {
  /** Backing branch */
  branch: Branch;

  name: BranchName;
  commits: readonly Commit[];

  isFocused: boolean;
  isJoinSource: boolean;
};

export type Command = {
  key: string;
  name: string;
  handler: (state: State) => State;
};

export type StatusMessage = {
  kind: "info" | "error";
  text: string;
};

type NormalModeState = {
  type: "normal";
};
type JoinModeState = {
  type: "join";
  sourceBranchName: BranchName;
};

export type State = {
  repository: Repository;
  branches: DisplayBranch[];
  modeState: NormalModeState | JoinModeState;
  keyboardCommands: Map<string, Command>;
  statusMessage: StatusMessage | null;
};

type InitializeAction = {
  type: "initialize";
  payload: {
    repository: Repository;
  };
};
type KeyAction = {
  type: "key";
  payload: {
    key: string;
  };
};
export type Action = InitializeAction | KeyAction;

function displayBranchesForRepository(
  repository: Repository,
  focusedBranchName: BranchName | undefined,
  joinSourceBranchName: BranchName | undefined,
): DisplayBranch[] {
  return repository.getBranchList().map((branch) => ({
    branch,
    name: branch.getName(),
    commits: branch.getCommitsList(),
    isFocused: branch.getName() === focusedBranchName,
    isJoinSource: branch.getName() === joinSourceBranchName,
  }));
}

function indexOfFocusedBranch(branches: Readonly<DisplayBranch[]>): number {
  return branches.findIndex(({ isFocused }) => isFocused);
}

function focusedBranch(state: State): DisplayBranch | null {
  const focusIndex = indexOfFocusedBranch(state.branches);
  return focusIndex === -1 ? null : state.branches[focusIndex];
}

function branchesWithMovedFocus(
  branches: Readonly<DisplayBranch[]>,
  focusMover: (previousFocusIndex: number | undefined) => number,
): DisplayBranch[] {
  if (branches.length === 0) {
    return [];
  }
  const existingFocusIndex = indexOfFocusedBranch(branches);
  const newFocusIndex =
    focusMover(existingFocusIndex === -1 ? undefined : existingFocusIndex) %
    branches.length;
  return branches.map((displayBranch, index) => ({
    ...displayBranch,
    isFocused: index === newFocusIndex,
  }));
}

/**
 * Rebuilds the branch list from the repository after a command has changed
 * it. Focus stays on `focusedBranchName` if that branch still exists and
 * falls back to the first branch otherwise.
 */
function refreshedState(
  state: State,
  statusMessage: StatusMessage | null,
  focusedBranchName: BranchName | undefined = focusedBranch(state)?.name,
): State {
  const joinSourceBranchName =
    state.modeState.type === "join"
      ? state.modeState.sourceBranchName
      : undefined;
  let branches = displayBranchesForRepository(
    state.repository,
    focusedBranchName,
    joinSourceBranchName,
  );
  if (indexOfFocusedBranch(branches) === -1) {
    branches = branchesWithMovedFocus(branches, () => 0);
  }
  return { ...state, branches, statusMessage };
}

export function initializedState(repository: Repository): State {
  return stateForNormalMode(
    refreshedState(
      {
        repository,
        branches: [],
        modeState: { type: "normal" },
        keyboardCommands: new Map(),
        statusMessage: null,
      },
      null,
    ),
  );
}

/**
 * Draws random branch names until one is not taken in `repository`.
 */
function unusedBranchName(repository: Repository): BranchName {
  let name = randomBranchName();
  while (repository.getBranch(name) !== null) {
    name = randomBranchName();
  }
  return name;
}

/**
 * Runs `command` against the focused branch, or reports that there is none.
 */
function withFocusedBranch(
  state: State,
  command: (displayBranch: DisplayBranch) => State,
): State {
  const displayBranch = focusedBranch(state);
  if (!displayBranch) {
    return { ...state, statusMessage: { kind: "error", text: "No branch" } };
  }
  return command(displayBranch);
}

function stateForNormalMode(state: State): State {
  return {
    ...state,
    modeState: {
      type: "normal",
    },
    keyboardCommands: new Map([
      [
        "↑",
        {
          key: "↑",
          name: "previous branch",
          handler(state) {
            const numberBranches = state.branches.length;
            return {
              ...state,
              branches: branchesWithMovedFocus(
                state.branches,
                (focusIndex) =>
                  (focusIndex ?? numberBranches) - 1 + numberBranches,
              ),
            };
          },
        },
      ],
      [
        "↓",
        {
          key: "↓",
          name: "next branch",
          handler: (state) => ({
            ...state,
            branches: branchesWithMovedFocus(state.branches, (focusIndex) =>
              focusIndex === undefined ? 0 : focusIndex + 1,
            ),
          }),
        },
      ],
      [
        "n",
        {
          key: "n",
          name: "new branch",
          handler(state) {
            const name = unusedBranchName(state.repository);
            state.repository.createBranch(name);
            return refreshedState(
              state,
              { kind: "info", text: `Created branch ${name}` },
              name,
            );
          },
        },
      ],
      [
        "b",
        {
          key: "b",
          name: "branch off",
          handler: (state) =>
            withFocusedBranch(state, ({ name: baseName }) => {
              const name = unusedBranchName(state.repository);
              state.repository.createBranch(name, baseName);
              return refreshedState(
                state,
                {
                  kind: "info",
                  text: `Created branch ${name} from ${baseName}`,
                },
                name,
              );
            }),
        },
      ],
      [
        "c",
        {
          key: "c",
          name: "add commit",
          handler: (state) =>
            withFocusedBranch(state, ({ branch, name }) => {
              const commitName = randomCommitName();
              branch.addCommit(commitName, `Work on ${name}`, [
                randomFilePath(),
              ]);
              return refreshedState(state, {
                kind: "info",
                text: `Committed "${commitName}" to ${name}`,
              });
            }),
        },
      ],
      [
        "d",
        {
          key: "d",
          name: "remove branch",
          handler: (state) =>
            withFocusedBranch(state, ({ name }) => {
              state.repository.removeBranch(name);
              return refreshedState(state, {
                kind: "info",
                text: `Removed branch ${name}`,
              });
            }),
        },
      ],
      [
        "j",
        {
          key: "j",
          name: "begin join",
          handler(state) {
            return stateForJoinMode(state);
          },
        },
      ],
      [
        "u",
        {
          key: "u",
          name: "undo repository",
          handler(state) {
            state.repository.undo();
            return refreshedState(state, { kind: "info", text: "Undone" });
          },
        },
      ],
      [
        "r",
        {
          key: "r",
          name: "redo repository",
          handler(state) {
            state.repository.redo();
            return refreshedState(state, { kind: "info", text: "Redone" });
          },
        },
      ],
      [
        "z",
        {
          key: "z",
          name: "undo branch",
          handler: (state) =>
            withFocusedBranch(state, ({ branch, name }) => {
              branch.undo();
              return refreshedState(state, {
                kind: "info",
                text: `Undone on ${name}`,
              });
            }),
        },
      ],
      [
        "y",
        {
          key: "y",
          name: "redo branch",
          handler: (state) =>
            withFocusedBranch(state, ({ branch, name }) => {
              branch.redo();
              return refreshedState(state, {
                kind: "info",
                text: `Redone on ${name}`,
              });
            }),
        },
      ],
    ]),
  };
}

function joinTargetMover(
  branches: Readonly<DisplayBranch[]>,
  step: 1 | -1,
): (focusIndex: number | undefined) => number {
  return (focusIndex) => {
    const numberBranches = branches.length;
    let proposedIndex = focusIndex ?? 0;
    let i = 0; // Prevents infinite loops
    do {
      proposedIndex = (proposedIndex + step + numberBranches) % numberBranches;
      i++;
      if (i > numberBranches) {
        return focusIndex ?? 0;
      }
    } while (branches[proposedIndex].isJoinSource);

    return proposedIndex;
  };
}

function stateForJoinMode(state: State): State {
  const source = focusedBranch(state);
  // Bail if there is nothing to join
  if (!source) {
    return stateForNormalMode(state);
  }
  if (state.branches.length < 2) {
    return stateForNormalMode({
      ...state,
      statusMessage: { kind: "error", text: "Nothing to join into" },
    });
  }

  const branches = branchesWithMovedFocus(
    state.branches.map((displayBranch) => ({
      ...displayBranch,
      isJoinSource: displayBranch.name === source.name,
    })),
    (focusIndex) => focusIndex ?? 0,
  );

  return {
    ...state,
    branches: branchesWithMovedFocus(branches, joinTargetMover(branches, 1)),
    modeState: {
      type: "join",
      sourceBranchName: source.name,
    },
    statusMessage: {
      kind: "info",
      text: `Choose a branch to join ${source.name} into`,
    },
    keyboardCommands: new Map([
      [
        "↑",
        {
          key: "↑",
          name: "previous join target",
          handler: (state) => ({
            ...state,
            branches: branchesWithMovedFocus(
              state.branches,
              joinTargetMover(state.branches, -1),
            ),
          }),
        },
      ],
      [
        "↓",
        {
          key: "↓",
          name: "next join target",
          handler: (state) => ({
            ...state,
            branches: branchesWithMovedFocus(
              state.branches,
              joinTargetMover(state.branches, 1),
            ),
          }),
        },
      ],
      [
        "a",
        {
          key: "a",
          name: "abort join",
          handler(state) {
            return exitJoinMode(state, { kind: "info", text: "Join aborted" });
          },
        },
      ],
      [
        "c",
        {
          key: "c",
          name: "confirm join",
          handler(state) {
            if (state.modeState.type !== "join") {
              return state;
            }
            const sourceBranch = nullthrows(
              state.repository.getBranch(state.modeState.sourceBranchName),
              "The join source branch cannot disappear while choosing a target",
            );
            const target = focusedBranch(state);
            // Bail if no target
            if (!target) {
              return exitJoinMode(state, null);
            }

            try {
              sourceBranch.join(target.branch);
            } catch (error) {
              if (!(error instanceof Error)) {
                throw error;
              }
              return exitJoinMode(state, { kind: "error", text: error.message });
            }
            return exitJoinMode(state, {
              kind: "info",
              text: `Joined ${sourceBranch.getName()} into ${target.name}`,
            });
          },
        },
      ],
    ]),
  };
}

function exitJoinMode(
  state: State,
  statusMessage: StatusMessage | null,
): State {
  return stateForNormalMode(
    refreshedState({ ...state, modeState: { type: "normal" } }, statusMessage),
  );
}

export function reducer(state: Readonly<State>, action: Action): State {
  switch (action.type) {
    case "initialize": {
      return initializedState(action.payload.repository);
    }

    case "key": {
      const command = state.keyboardCommands.get(action.payload.key);
      if (!command) {
        return state;
      }

      return command.handler(state);
    }
  }
}

export function useInteractionReducer(
  repository: Repository,
): [State, Dispatch<Action>] {
  const [state, dispatch] = useReducer(reducer, repository, initializedState);

  useEffect(() => {
    dispatch({ type: "initialize", payload: { repository } });
  }, [repository]);

  return [state, dispatch];
}
