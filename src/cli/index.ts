#!/usr/bin/env node

import fs from "fs";

import chalk from "chalk";
import { Command } from "commander";
import { render } from "ink";
import React from "react";

import type { BranchworkConfig } from "../config";
import type { StepResult } from "../script";

import { loadConfig } from "../config";
import { describeStep, parseReplayScript, runReplayScript } from "../script";
import { constructRepository } from "../shared/constructRepository";

import App from "./App";

interface ConfigOptions {
  config?: string;
}

function loadConfigOrExit(configPath: string | undefined): BranchworkConfig {
  try {
    return loadConfig(configPath);
  } catch (error) {
    console.error(chalk.red(error instanceof Error ? error.message : error));
    process.exit(1);
  }
}

function printStepResult(result: StepResult, stepIndex: number): void {
  const description = `${stepIndex}. ${describeStep(result.step)}`;
  if (result.status === "applied") {
    console.log(`${chalk.green("✓")} ${description}`);
  } else {
    console.log(`${chalk.red("✗")} ${description}`);
    const { name, message } = result.error;
    console.log(`    ${chalk.red(`${name}: ${message}`)}`);
  }
}

const program = new Command();

program
  .name("branchwork")
  .description(
    "branchwork: an in-memory playground for branches, commits, joins and undo/redo.",
  )
  .on("--help", function () {
    console.log("");
    console.log("Examples:");
    console.log("");
    console.log("  $ branchwork interactive");
    console.log("  $ branchwork interactive --config ./branchwork.config.json");
    console.log("  $ branchwork i");
    console.log("  $ branchwork replay ./examples/feature-branch.json");
  });

program
  .command("interactive")
  .alias("i")
  .description("branchwork's interactive terminal UI")
  .option("-c, --config <configPath>", "path to a branchwork config file")
  .action(({ config }: ConfigOptions) => {
    render(React.createElement(App, { config: loadConfigOrExit(config) }));
  });

program
  .command("replay <script>")
  .alias("r")
  .description("run a JSON script of branch operations and print the result")
  .option("-c, --config <configPath>", "path to a branchwork config file")
  .action((scriptPath: string, { config }: ConfigOptions) => {
    const repository = constructRepository(loadConfigOrExit(config));

    let results: StepResult[];
    try {
      const steps = parseReplayScript(fs.readFileSync(scriptPath).toString());
      results = runReplayScript(repository, steps);
    } catch (error) {
      console.error(chalk.red(error instanceof Error ? error.message : error));
      process.exit(1);
    }

    results.forEach(printStepResult);
    console.log("");
    repository
      .getBranchList()
      .forEach((branch) => console.log(branch.toString()));

    if (results.some(({ status }) => status === "failed")) {
      process.exitCode = 1;
    }
  });

program.parse(process.argv);
