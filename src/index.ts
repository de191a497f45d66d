#!/usr/bin/env node
import { main } from "./cli";
import { logger } from "./logger";

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error("Unexpected failure", error);
    process.exitCode = 1;
  });
