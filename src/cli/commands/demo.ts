/**
 * src/cli/commands/demo.ts
 * memtree demo
 */

import { Command } from "commander";
import { runScript } from "../shell";
import { addStoreOptions, createStore, StoreFlags } from "../utils/createStore";

export const DEMO_SCRIPT = [
  "write file1 file1",
  "mkdir folder1",
  "cd folder1",
  "write file2 file2",
  "write ../file3 file3",
  "pwd",
  "write file2 again",
  "cat file2",
  "cd ..",
  "tree",
  "find file3",
].join("\n");

export function demoCommand(): Command {
  const cmd = new Command("demo");
  addStoreOptions(cmd)
    .description("Run a short built-in script and print what it does")
    .action((opts: StoreFlags) => {
      const { store, logger } = createStore(opts);
      for (const line of DEMO_SCRIPT.split("\n")) {
        console.log(`$ ${line}`);
        const result = runScript(store, line, logger);
        for (const out of result.output) console.log(out);
      }
    });

  return cmd;
}
