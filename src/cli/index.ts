#!/usr/bin/env node
import { Command } from "commander";
import { commands as sessionCommands } from "./commands/session";
import { commands as readCommands } from "./commands/read";
import { commands as writeCommands } from "./commands/write";
import { commands as dbCommands } from "./commands/db";

const program = new Command();

program
  .name("social-session")
  .description("Persistent browser sessions, reads and paced write workflows for social platforms")
  .version("0.1.0");

sessionCommands(program);
readCommands(program);
writeCommands(program);
dbCommands(program);

program.parseAsync().catch((error: unknown) => {
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
