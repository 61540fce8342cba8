#!/usr/bin/env node
import { runMain } from "./cli/run-main.js";
import { formatErrorMessage } from "./errors.js";

runMain().catch((err: unknown) => {
  console.error(formatErrorMessage(err));
  process.exitCode = 1;
});
