#!/usr/bin/env node
/**
 * GridPlan CLI
 *
 * Usage:
 *   gridplan validate <plans...>   Check plan files against the schema
 *   gridplan classify <plan>       Show a plan's complexity analysis
 *   gridplan run <plan> -s <text>  Run a plan for a scenario
 */

import { ExitCodes, formatUnknownError } from '@gridplan/engine';
import { createProgram } from './program.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    process.stderr.write(`${formatUnknownError(error, { colors: process.stderr.isTTY })}\n`);
    process.exitCode = ExitCodes.INTERNAL_ERROR;
  });
