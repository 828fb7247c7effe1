#!/usr/bin/env tsx
import { Command } from "commander";
import { createRequire } from "module";
import { runCommand } from "./commands/run.js";
import { checkCommand } from "./commands/check.js";
import { reportCommand } from "./commands/report.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

const program = new Command()
  .name("trip-etl")
  .description("Batch loader for the trip star schema")
  .version(pkg.version);

program.addCommand(runCommand);
program.addCommand(checkCommand);
program.addCommand(reportCommand);

await program.parseAsync();
