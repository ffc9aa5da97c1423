#!/usr/bin/env node

import { join } from "node:path";
import { TODO_FILE } from "../config.js";
import { parseArgs } from "./args.js";
import { help, runCommand } from "./commands.js";
import { colors, consoleOutput } from "./output.js";

const parsed = parseArgs(process.argv.slice(2));

switch (parsed.kind) {
  case "help":
    help(consoleOutput);
    break;
  case "usage-error": {
    const c = colors(consoleOutput.color);
    consoleOutput.log(c.red(parsed.message));
    consoleOutput.log(c.dim(`\nRun ${c.cyan("todo --help")} for usage\n`));
    process.exitCode = 1;
    break;
  }
  default:
    runCommand(parsed, {
      storePath: join(process.cwd(), TODO_FILE),
      output: consoleOutput,
    });
}
