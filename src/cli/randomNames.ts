/// <reference path="../types/random-words.d.ts" />

import randomWords from "random-words";

import type { BranchName, FilePath } from "../shared/types";

export function randomBranchName(): BranchName {
  return randomWords({ exactly: 2, join: "-" });
}

export function randomCommitName(): string {
  return randomWords({ exactly: 3, join: " " });
}

export function randomFilePath(): FilePath {
  return `src/${randomWords({ exactly: 2, join: "/" })}.ts`;
}
