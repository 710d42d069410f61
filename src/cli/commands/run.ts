/**
 * src/cli/commands/run.ts
 * memtree run <script>
 */

import { Command } from "commander";
import fs from "fs";
import { runScript } from "../shell";
import { addStoreOptions, createStore, StoreFlags } from "../utils/createStore";

export function runCommand(): Command {
  const cmd = new Command("run");
  addStoreOptions(cmd)
    .description("Run a command script against a fresh in-memory tree")
    .argument("<script>", "path to the script file")
    .action((script: string, opts: StoreFlags) => {
      try {
        const text = fs.readFileSync(script, "utf8");
        const { store, logger } = createStore(opts);
        const result = runScript(store, text, logger);
        for (const line of result.output) console.log(line);
        if (result.failures > 0) process.exitCode = 1;
      } catch (e) {
        console.error("Run failed:", e instanceof Error ? e.message : String(e));
        process.exit(1);
      }
    });

  return cmd;
}
