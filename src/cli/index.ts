#!/usr/bin/env node

/**
 * inventory-sync CLI
 *
 * Loads devices and locations from CSV files into a network inventory API.
 */

import { Command } from "commander";

import { registerDevicesCommand } from "./commands/devices.js";
import { registerLocationsCommand } from "./commands/locations.js";

const program = new Command();

program
  .name("inventory-sync")
  .description("Sync devices and locations from CSV into a network inventory")
  .version("0.1.0");

registerDevicesCommand(program);
registerLocationsCommand(program);

program.action(() => {
  // Show help by default
  program.outputHelp();
});

await program.parseAsync();
