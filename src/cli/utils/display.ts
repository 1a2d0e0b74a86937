/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type { RunOutcome } from "../../types/index.js";

/**
 * Display per-record failures in a formatted table
 */
export function displayFailuresTable(outcome: RunOutcome): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Row"),
      chalk.cyan("Record"),
      chalk.cyan("Stage"),
      chalk.cyan("Reason"),
    ],
    colWidths: [7, 28, 18, 60],
    wordWrap: true,
  });

  for (const failure of outcome.failures) {
    table.push([
      String(failure.row),
      failure.record,
      failure.stage,
      failure.reason,
    ]);
  }

  console.log(table.toString());
}

/**
 * Display the end-of-run summary
 */
export function displayRunSummary(title: string, outcome: RunOutcome): void {
  console.log(chalk.bold(`\n${title}:\n`));
  console.log(`  Processed: ${String(outcome.processed)}`);
  console.log(`  Succeeded: ${chalk.green(String(outcome.succeeded))}`);
  console.log(
    `  Failed:    ${
      outcome.failures.length > 0
        ? chalk.red(String(outcome.failures.length))
        : chalk.gray("0")
    }`
  );
  console.log();

  if (outcome.failures.length > 0) {
    displayFailuresTable(outcome);
  }
}

/**
 * Print error message
 */
export function printError(message: string): void {
  console.error(chalk.red("Error:"), message);
}

/**
 * Print success message
 */
export function printSuccess(message: string): void {
  console.log(chalk.green("Success:"), message);
}
