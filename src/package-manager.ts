#!/usr/bin/env node
import { addPackage } from "./add";
import { loadConfig } from "./config";
import { formatError } from "./errors";
import { createServices, installPackages } from "./install";

/**
 * Entry point for the package manager CLI. Processes 'add' and
 * 'install' commands.
 */
async function main(): Promise<void> {
  // Extract command line arguments, ignoring the first two (node and script path).
  const args = process.argv.slice(2);
  if (args.length === 0) {
    console.log("Usage: nestpm <command> [arguments]");
    return;
  }

  const command = args[0];
  const packageSpecifier = args[1];

  switch (command) {
    case "add": {
      // Validate the required 'add' command arguments.
      if (!packageSpecifier || args.length !== 2) {
        console.log("Usage: nestpm add <package_name>[@<version_range>]");
        process.exitCode = 1;
        return;
      }
      const config = loadConfig();
      await addPackage(packageSpecifier, config, createServices(config).registry);
      break;
    }
    case "install": {
      const config = loadConfig();
      console.time("Total time taken");
      await installPackages(config, createServices(config));
      console.timeEnd("Total time taken");
      break;
    }
    default:
      console.log("Available commands: add, install");
      break;
  }
}

main().catch((error: unknown) => {
  console.error(`An error occurred: ${formatError(error)}`);
  process.exit(1);
});
