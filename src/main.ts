#!/usr/bin/env node
import { E_FAILED } from "./autotest.js";
import { runCli } from "./cli.js";

runCli(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((e: unknown) => {
    console.error(`ERROR [glm-netplot]: ${e instanceof Error ? e.message : String(e)}`);
    process.exit(E_FAILED);
  });
