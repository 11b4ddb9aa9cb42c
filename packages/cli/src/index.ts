#!/usr/bin/env node

import { CommanderError } from "commander";
import chalk from "chalk";
import { errorMessage } from "@skyform/adapters-common";
import { createProgram } from "./program";

const program = createProgram();

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (error: unknown) {
    if (
      error instanceof CommanderError &&
      ["commander.help", "commander.helpDisplayed", "commander.version"].includes(error.code)
    ) {
      return;
    }
    if (!(error instanceof CommanderError)) {
      console.error(chalk.red("Error:"), errorMessage(error));
    }
    process.exitCode = 1;
  }
}

void main();
