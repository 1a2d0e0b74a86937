/**
 * Devices command - move devices to locations and attach tags
 */

import ora from "ora";

import { errorMessage } from "../../errors.js";
import { loadDeviceRecords } from "../../loaders/devices.js";
import {
  TagCatalog,
  fetchLocationLookup,
  fetchTagCatalog,
  type LocationLookup,
} from "../../services/references.js";
import {
  exitCodeFor,
  runDeviceSync,
  tagsInRecords,
} from "../../services/sync/index.js";
import { displayRunSummary, printError, printSuccess } from "../utils/display.js";
import { startRuntime, type GlobalOptions } from "../utils/runtime.js";

import type { DeviceRecord } from "../../types/index.js";
import type { Command } from "commander";

export function registerDevicesCommand(program: Command): void {
  program
    .command("devices <csv>")
    .description(
      "Load devices from CSV, resolve location IDs, and update device locations and tags"
    )
    .option(
      "--dry-run",
      "Parse CSV and resolve locations but do NOT perform PATCH/POST requests"
    )
    .option(
      "--log-level <level>",
      "Logging level (trace, debug, info, warn, error). Defaults to LOG_LEVEL"
    )
    .addHelpText(
      "after",
      `
CSV FORMAT:
  device,location[,tag]
  Tags may contain letters, numbers, underscores and hyphens only.`
    )
    .action(async (csvPath: string, options: GlobalOptions) => {
      const runtime = startRuntime(options);
      if (runtime === undefined) {
        return;
      }

      const { inventory, logger } = runtime;
      const syncLogger = logger.child({ module: "sync" });

      let records: DeviceRecord[];
      try {
        records = loadDeviceRecords(csvPath, logger);
      } catch (error) {
        logger.error({ error: errorMessage(error) }, "Failed to load CSV");
        printError(errorMessage(error));
        process.exitCode = 1;
        return;
      }

      const spinner = ora("Fetching locations and tags...").start();
      let lookup: LocationLookup;
      let catalog: TagCatalog;
      try {
        lookup = await fetchLocationLookup(inventory, syncLogger);
        // Tags are only fetched when the CSV uses them
        catalog =
          tagsInRecords(records).size > 0
            ? await fetchTagCatalog(inventory, syncLogger)
            : TagCatalog.empty();
        spinner.succeed(
          `Resolved ${String(lookup.size)} location(s) and ${String(catalog.size)} tag(s)`
        );
      } catch (error) {
        spinner.fail(`Failed: ${errorMessage(error)}`);
        logger.error(
          { error: errorMessage(error) },
          "Failed to fetch reference data from inventory API"
        );
        process.exitCode = 1;
        return;
      }

      const outcome = await runDeviceSync(records, lookup, catalog, {
        client: inventory,
        logger: syncLogger,
      });

      displayRunSummary("Device sync", outcome);
      process.exitCode = exitCodeFor(outcome);
      if (process.exitCode === 0) {
        printSuccess("All device updates completed successfully.");
      }
    });
}
