#!/usr/bin/env node

/**
 * dscpack CLI — Entry Point
 *
 * Package DSC configurations with the modules they import, and publish
 * them to Azure blob storage.
 *
 * Commands:
 *   dscpack publish <config>                 Package and upload (or save) a configuration
 *   dscpack healthcare list                  List Azure API for FHIR services
 *   dscpack healthcare get <rg> <name>       Show one service
 *   dscpack healthcare new <rg> <name>       Create a service
 */

import { Command } from "commander";
import { registerPublishCommand } from "./commands/publish";
import { registerHealthcareCommand } from "./commands/healthcare";
import { setDebugMode } from "./output";

const program = new Command();

program
  .name("dscpack")
  .description("Package and publish PowerShell DSC configurations")
  .version("0.1.0")
  .option("--debug", "Show debug output and stack traces", false)
  .hook("preAction", (thisCommand) => {
    setDebugMode(Boolean(thisCommand.opts().debug));
  });

registerPublishCommand(program);
registerHealthcareCommand(program);

// Parse command line
program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
