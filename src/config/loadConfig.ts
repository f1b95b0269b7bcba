import fs from "fs";
import { z } from "zod";

import type { BranchName, RepositoryName } from "../shared/types";

import { ConfigError } from "../shared/errors";

export const defaultConfigFileName = "branchwork.config.json";

export interface BranchworkConfig {
  repositoryName: RepositoryName;
  defaultBranch: BranchName;
}

export const defaultConfig: BranchworkConfig = {
  repositoryName: "playground",
  defaultBranch: "main",
};

const nonEmptyString = z
  .string({ invalid_type_error: "must be a non-empty string" })
  .min(1, "must be a non-empty string");

const configFileSchema = z.object(
  {
    repositoryName: nonEmptyString.optional(),
    defaultBranch: nonEmptyString.optional(),
  },
  { invalid_type_error: "expected a JSON object" },
);

function toConfigError(
  { path, message }: z.ZodIssue,
  configPath: string,
): ConfigError {
  return new ConfigError(
    path.length === 0 ? message : `"${path.join(".")}" ${message}`,
    configPath,
  );
}

export function parseConfig(
  contents: string,
  configPath: string,
): BranchworkConfig {
  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(contents);
  } catch (error) {
    throw new ConfigError(
      `invalid JSON (${error instanceof Error ? error.message : error})`,
      configPath,
    );
  }

  const result = configFileSchema.safeParse(rawConfig);
  if (!result.success) {
    throw toConfigError(result.error.issues[0], configPath);
  }
  return {
    repositoryName:
      result.data.repositoryName ?? defaultConfig.repositoryName,
    defaultBranch: result.data.defaultBranch ?? defaultConfig.defaultBranch,
  };
}

/**
 * Loads the CLI configuration.
 *
 * @param configPath Path given by the user. If omitted, the default file in
 * `cwd` is used when it exists, and built-in defaults otherwise.
 */
export function loadConfig(
  configPath: string | undefined,
  cwd: string = process.cwd(),
): BranchworkConfig {
  const resolvedPath = configPath ?? `${cwd}/${defaultConfigFileName}`;
  if (configPath === undefined && !fs.existsSync(resolvedPath)) {
    return { ...defaultConfig };
  }

  let contents: string;
  try {
    contents = fs.readFileSync(resolvedPath).toString();
  } catch (error) {
    throw new ConfigError(
      `could not be read (${error instanceof Error ? error.message : error})`,
      resolvedPath,
    );
  }
  return parseConfig(contents, resolvedPath);
}
