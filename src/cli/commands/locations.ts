/**
 * Locations command - geocode and create locations
 */

import { sleep } from "../../client/http.js";
import { errorMessage } from "../../errors.js";
import { loadLocationRecords } from "../../loaders/locations.js";
import {
  DEFAULT_DRY_RUN_OUTPUT,
  exitCodeFor,
  runLocationSync,
} from "../../services/sync/index.js";
import { displayRunSummary, printError, printSuccess } from "../utils/display.js";
import { startRuntime, type GlobalOptions } from "../utils/runtime.js";

import type { Command } from "commander";

interface LocationsOptions extends GlobalOptions {
  dryRunOutput: string;
}

export function registerLocationsCommand(program: Command): void {
  program
    .command("locations <csv>")
    .description(
      "Load locations from CSV, geocode (if needed), and create them in the inventory"
    )
    .option(
      "--dry-run",
      "Prepare the payload and write it to JSON, but do NOT POST"
    )
    .option(
      "--dry-run-output <file>",
      "Output JSON filename in dry run",
      DEFAULT_DRY_RUN_OUTPUT
    )
    .option(
      "--log-level <level>",
      "Logging level (trace, debug, info, warn, error). Defaults to LOG_LEVEL"
    )
    .addHelpText(
      "after",
      `
CSV FORMAT:
  id,name,address[,lat,lng]
  Rows with both lat and lng are not geocoded.`
    )
    .action(async (csvPath: string, options: LocationsOptions) => {
      const runtime = startRuntime(options);
      if (runtime === undefined) {
        return;
      }

      const { config, inventory, geocoder, logger } = runtime;
      const syncLogger = logger.child({ module: "sync" });

      try {
        const records = loadLocationRecords(csvPath, logger);
        const { outcome } = await runLocationSync(records, {
          client: inventory,
          coordinates: { geocoder, sleep, logger: syncLogger },
          logger: syncLogger,
          dryRun: config.dryRun,
          dryRunOutput: options.dryRunOutput,
        });

        displayRunSummary("Location sync", outcome);
        process.exitCode = exitCodeFor(outcome);
        if (process.exitCode === 0) {
          printSuccess(
            config.dryRun
              ? `Dry run complete. Payload written to ${options.dryRunOutput}`
              : "All locations created successfully."
          );
        }
      } catch (error) {
        logger.error({ error: errorMessage(error) }, "Fatal error");
        printError(errorMessage(error));
        process.exitCode = 1;
      }
    });
}
