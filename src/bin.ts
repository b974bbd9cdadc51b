#!/usr/bin/env node
import { runCli } from "./cli/index.js";
import { logger } from "./util/logging.js";

runCli().catch((error: unknown) => {
  logger.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
