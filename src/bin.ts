#!/usr/bin/env node
import { runCli } from "./cli";
import { errorMessage } from "./errors";

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("Fatal error:", errorMessage(error));
    process.exit(2);
  });
