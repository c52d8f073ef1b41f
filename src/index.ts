#!/usr/bin/env node
import { main } from "./cli";
import { log } from "./transport/log";

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch(async (error: unknown) => {
    await log({
      content: error instanceof Error ? error.message : String(error),
      group: "ERROR",
    });

    process.exitCode = 1;
  });
