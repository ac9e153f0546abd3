#!/usr/bin/env node

/**
 * packplan CLI Router
 *
 * Routes commands to the resolution engine using commander.js.
 */

import { createProgram } from "@/cli/program.js";

const program = createProgram();

// Show help if no command provided
if (process.argv.length < 3) {
  program.help();
}

await program.parseAsync(process.argv);
