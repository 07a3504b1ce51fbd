#!/usr/bin/env node
import { formatErrorMessage } from "../cpi/errors.js";
import { buildProgram } from "./program.js";

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    process.stderr.write(`cpi-aws: ${formatErrorMessage(err)}\n`);
    process.exitCode = 1;
  });
