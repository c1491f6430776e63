#!/usr/bin/env node
import { runCli } from "./index.js";

const controller = new AbortController();
process.once("SIGINT", () => {
  console.error("Interrupt received, stopping after the current request...");
  controller.abort();
});

runCli(process.argv.slice(2), { signal: controller.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
