#!/usr/bin/env -S npx tsx
import chalk from "chalk";
import { errorMessage } from "seobridge";
import { createProgram } from "./index.js";

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(chalk.red(`Error: ${errorMessage(err)}`));
    process.exit(1);
  });
