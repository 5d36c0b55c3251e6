#!/usr/bin/env node
import { runCli } from "./cli.js";
import { errorMessage } from "./errors.js";

runCli()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(errorMessage(error));
    process.exitCode = 1;
  });
