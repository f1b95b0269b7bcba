import type { Repository } from "../repository";
import type { Commit } from "../shared/types";

import React from "react";
import { Text, Box, useInput, useApp } from "ink";
import {
  useInteractionReducer,
  DisplayBranch,
  Command,
  StatusMessage,
} from "./useInteractionReducer";

interface CommitLineProps {
  commit: Commit;
  isLast: boolean;
}
const CommitLine: React.FC<CommitLineProps> = ({
  commit: { name, description, createdAt, files },
  isLast,
}) => (
  <Box flexDirection="row">
    <Text color="cyan">{isLast ? "└─* " : "├─* "}</Text>
    <Box flexDirection="column">
      <Box>
        <Text color="cyan">{createdAt.toISOString()}</Text>
        <Text> {name}</Text>
      </Box>
      <Text color="gray">{description}</Text>
      {files.length > 0 && <Text color="green">{files.join(", ")}</Text>}
    </Box>
  </Box>
);

interface BranchInfoProps {
  displayBranch: DisplayBranch;
}
const BranchInfo: React.FC<BranchInfoProps> = ({
  displayBranch: { branch, name, commits, isFocused, isJoinSource },
}) => (
  <Box flexDirection="column" marginBottom={1}>
    <Box>
      <Text color="yellow">
        {isJoinSource ? "@ " : isFocused ? "> " : "  "}
      </Text>
      <Text
        bold
        color="greenBright"
        backgroundColor={isFocused ? "yellow" : undefined}>
        {name}
      </Text>
      <Text color="gray">
        {" "}
        ({commits.length} commits, undo {branch.getUndoableOperationCount()},
        redo {branch.getRedoableOperationCount()})
      </Text>
    </Box>
    <Box flexDirection="column" marginLeft={2}>
      {commits.map((commit, index) => (
        <CommitLine
          key={`${index}-${commit.name}`}
          commit={commit}
          isLast={index === commits.length - 1}
        />
      ))}
    </Box>
  </Box>
);

interface BranchListProps {
  displayBranches: DisplayBranch[];
}
const BranchList: React.FC<BranchListProps> = ({ displayBranches }) => (
  <Box flexDirection="column">
    {displayBranches.length === 0 && <Text color="gray">No branches</Text>}
    {displayBranches.map((displayBranch) => (
      <BranchInfo key={displayBranch.name} displayBranch={displayBranch} />
    ))}
  </Box>
);

interface StatusLineProps {
  statusMessage: StatusMessage | null;
}
const StatusLine: React.FC<StatusLineProps> = ({ statusMessage }) =>
  statusMessage ? (
    <Text color={statusMessage.kind === "error" ? "red" : "white"}>
      {statusMessage.text}
    </Text>
  ) : null;

const commandsPerRow = 4;

interface CommandListProps {
  commands: Command[];
}
const CommandList: React.FC<CommandListProps> = ({ commands }) => {
  const rows = Array.from(
    { length: Math.ceil(commands.length / commandsPerRow) },
    (_, rowIndex) =>
      commands.slice(
        rowIndex * commandsPerRow,
        (rowIndex + 1) * commandsPerRow,
      ),
  );
  return (
    <Box marginTop={1} flexDirection="column">
      {rows.map((rowCommands, rowIndex) => (
        <Box key={rowIndex}>
          {rowCommands.map(({ key, name }) => (
            <Box key={key} marginRight={2} flexShrink={0}>
              <Box marginRight={1} flexShrink={0}>
                <Text color="white">({key})</Text>
              </Box>
              <Text color="gray">{name}</Text>
            </Box>
          ))}
        </Box>
      ))}
    </Box>
  );
};

interface RepositoryComponentProps {
  repository: Repository;
}
export const RepositoryComponent: React.FC<RepositoryComponentProps> = ({
  repository,
}) => {
  const { exit } = useApp();

  const [state, dispatch] = useInteractionReducer(repository);

  useInput((input, key) => {
    if (input === "q") {
      exit();
    } else if (key.upArrow) {
      dispatch({ type: "key", payload: { key: "↑" } });
    } else if (key.downArrow) {
      dispatch({ type: "key", payload: { key: "↓" } });
    } else {
      dispatch({ type: "key", payload: { key: input } });
    }
  });

  return (
    <Box flexDirection="column">
      <Box marginY={1} marginLeft={1}>
        <Text bold backgroundColor="yellow" color="#000">
          {" "}
          BRANCHWORK{" "}
        </Text>
        <Text color="gray"> Repository: </Text>
        <Text color="white">{repository.getName()}</Text>
        <Text color="gray">
          {" "}
          (undo {repository.getUndoableOperationCount()}, redo{" "}
          {repository.getRedoableOperationCount()})
        </Text>
      </Box>
      <BranchList displayBranches={state.branches} />
      <StatusLine statusMessage={state.statusMessage} />
      <CommandList commands={Array.from(state.keyboardCommands.values())} />
    </Box>
  );
};
