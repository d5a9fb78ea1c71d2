#!/usr/bin/env node
import { run } from "./program";
import { errorMessage, logger } from "./shared/logger";

async function main() {
  process.exit(await run(process.argv.slice(2)));
}

main().catch((err) => {
  logger.error("unhandled error", { err: errorMessage(err) });
  process.exit(1);
});
