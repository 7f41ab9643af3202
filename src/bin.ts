#!/usr/bin/env node
// ---------------------------------------------------------------------------
// chk-isbn executable entrypoint.
// ---------------------------------------------------------------------------

import { runCli } from "./cli.js";

process.exitCode = runCli(process.argv.slice(2), {
  stdout: (line) => console.log(line),
});
