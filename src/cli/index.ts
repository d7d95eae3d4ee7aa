#!/usr/bin/env node

import { program } from "commander";
import { sessionsCommand } from "./commands/sessions.js";
import { searchCommand } from "./commands/search.js";
import { exportCommand, importCommand } from "./commands/transfer.js";
import { getNetrecallVersion } from "../shared/version.js";

program
  .name("netrecall")
  .description("Store, filter and search captured HTTP sessions")
  .version(getNetrecallVersion())
  .option(
    "-v, --verbose",
    "increase verbosity (use -vv or -vvv for more)",
    (_, prev: number) => prev + 1,
    0
  )
  .option("-d, --dir <path>", "override project root directory");

program.addCommand(sessionsCommand);
program.addCommand(searchCommand);
program.addCommand(exportCommand);
program.addCommand(importCommand);

program.addHelpText(
  "after",
  `
Quick start:
  netrecall import capture.json   Load sessions from an export
  netrecall sessions              List stored sessions
  netrecall search api.example    Search URLs, headers and bodies`
);

await program.parseAsync();
