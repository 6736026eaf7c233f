import { pathToFileURL } from "node:url";

import { loadConfig, loadEnvFile } from "./config.ts";
// ^ .env + environment variables -> validated AppConfig.

import { describeError } from "./errors.ts";

import { createLogger } from "./logger.ts";
// ^ tiny logger with log levels: debug/info/warn/error.

import { openRoster } from "./roster.ts";
// ^ Builds the in-memory roster from storage; load problems come back as values.

import { createConsoleIO, RosterShell } from "./shell.ts";
// ^ The numbered menu, reading from stdin and printing to stdout.

import { WorkbookStorage } from "./storage.ts";
// ^ Reads/writes the roster sheet of the .xlsx workbook.


async function main() {
  // ^ Entry function: config, storage, roster, then the menu loop until Exit.

  loadEnvFile();
  const config = loadConfig();
  // ^ A bad configuration throws here, before anything touches the workbook.

  const logger = createLogger(config.logLevel);
  logger.debug("Configuration loaded", { ...config });

  const io = createConsoleIO();
  const storage = new WorkbookStorage(config.rosterFile, config.rosterSheet, logger);
  const { store, issues, error } = openRoster(storage);

  if (error) {
    // ^ Missing or unreadable file: we still start, with an empty roster.
    logger.warn("Roster load failed", {
      path: error.path,
      error: describeError(error.cause ?? error),
    });
    io.print(`Warning: ${error.message}.`);
  }

  if (issues.length > 0) {
    // ^ Bad rows are skipped, good ones are kept.
    logger.warn("Roster data validation issues", { count: issues.length });
    issues.forEach((issue) => logger.warn("Skipped row", { issue }));
  }

  try {
    await new RosterShell(store, io, logger).run();
  } finally {
    io.close();
    // ^ Release stdin so the process can exit after "Exit".
  }
}


if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  // ^ Only run main() when this file is executed directly, not when imported.

  main().catch((error) => {
    // ^ Top-level fatal error handler (configuration errors end up here).
    console.error("Fatal error", error);
    process.exitCode = 1;
  });
}
