#!/usr/bin/env node

import chalk from "chalk";
import { createProgram } from "./program.js";

try {
  createProgram().parse();
} catch (err) {
  console.error(chalk.red(err instanceof Error ? err.message : String(err)));
  process.exit(1);
}
