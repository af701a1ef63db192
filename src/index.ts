#!/usr/bin/env node
import { run } from "./cli";
import { errorMessage } from "./errors";
import { logger } from "./logger";

run(process.argv.slice(2), process.env)
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error) => {
    logger.error(`Run aborted: ${errorMessage(error)}`);
    process.exitCode = 1;
  });
