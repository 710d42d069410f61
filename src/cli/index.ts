#!/usr/bin/env node
/**
 * src/cli/index.ts
 * CLI entry (commander)
 */

import "dotenv/config";
import { Command } from "commander";
import { demoCommand } from "./commands/demo";
import { runCommand } from "./commands/run";

export function createCli(): Command {
  const program = new Command();

  program
    .name("memtree")
    .description("Drive an in-memory folder tree from command scripts")
    .version("0.1.0");

  program.addCommand(runCommand());
  program.addCommand(demoCommand());

  return program;
}

if (require.main === module) {
  const cli = createCli();
  cli.parse(process.argv);
}
