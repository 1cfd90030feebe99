#!/usr/bin/env node
/**
 * Operator CLI for the skill evolution coordinator.
 *
 * Usage:
 *   npm run evolution -- status
 *   npm run evolution -- select
 *   npm run evolution -- success general web_search 6
 *   npm run evolution -- failure domain contract_review 4 tests failed
 */
import { createCoordinator } from "../evolution/factory.js";
import { loadConfig } from "../utils/config.js";
import { createLogger } from "../utils/logger.js";
import { parseCommand, runCommand, USAGE } from "./commands.js";

async function main() {
  const command = parseCommand(process.argv.slice(2));
  if ("error" in command) {
    console.error(`${command.error}\n\n${USAGE}`);
    process.exit(2);
  }

  const logger = createLogger("evolution-cli");
  const coordinator = createCoordinator(loadConfig(), logger);

  console.log(await runCommand(coordinator, command));
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
