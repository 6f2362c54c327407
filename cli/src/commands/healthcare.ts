/**
 * dscpack CLI -- Healthcare Commands
 *
 * Manage Azure API for FHIR services (Microsoft.HealthcareApis/services).
 *
 * Usage:
 *   dscpack healthcare list [--resource-group <rg>]
 *   dscpack healthcare get <resourceGroup> <name>
 *   dscpack healthcare get --resource-id <id>
 *   dscpack healthcare new <resourceGroup> <name> --location <region>
 *
 * Add --json to any of them for machine-readable output.
 */

import { Command } from "commander";
import { resolveSettings } from "../config";
import { HealthcareCommand } from "../healthcare/base-command";
import { defaultAccountContext } from "../healthcare/client";
import {
  DEFAULT_OFFER_THROUGHPUT,
  GetServiceCommand,
  ListServicesCommand,
  NewServiceCommand,
} from "../healthcare/commands";
import { CommandError, reportCommandError } from "../output";

async function run(create: (json: boolean) => HealthcareCommand, json: boolean): Promise<void> {
  try {
    await create(json).execute();
  } catch (err: unknown) {
    process.exit(reportCommandError(err));
  }
}

function account() {
  return defaultAccountContext(resolveSettings().subscriptionId);
}

function parseThroughput(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new CommandError("InvalidArgument", `Invalid --offer-throughput value '${value}'.`);
  }
  return parsed;
}

export function registerHealthcareCommand(program: Command): void {
  const healthcare = program
    .command("healthcare")
    .description("Manage Azure API for FHIR services");

  healthcare
    .command("list")
    .description("List healthcare services in the subscription or a resource group")
    .option("-g, --resource-group <rg>", "Only services in this resource group")
    .option("--json", "Print JSON", false)
    .action(async (opts: { resourceGroup?: string; json: boolean }) => {
      await run(
        (json) => new ListServicesCommand({ account: account(), json }, opts.resourceGroup),
        opts.json,
      );
    });

  healthcare
    .command("get [resourceGroup] [name]")
    .description("Show one healthcare service")
    .option("--resource-id <id>", "Full resource id of the service")
    .option("--json", "Print JSON", false)
    .action(
      async (
        resourceGroup: string | undefined,
        name: string | undefined,
        opts: { resourceId?: string; json: boolean },
      ) => {
        await run(
          (json) =>
            new GetServiceCommand(
              { account: account(), json },
              { resourceGroup, name, resourceId: opts.resourceId },
            ),
          opts.json,
        );
      },
    );

  healthcare
    .command("new <resourceGroup> <name>")
    .description("Create a FHIR R4 healthcare service")
    .requiredOption("-l, --location <region>", "Azure region, e.g. westus2")
    .option(
      "--offer-throughput <ru>",
      "Cosmos DB throughput in RU/s",
      String(DEFAULT_OFFER_THROUGHPUT),
    )
    .option("--access-policy-object-id <id...>", "Object ids granted access (default: you)")
    .option("--json", "Print JSON", false)
    .action(
      async (
        resourceGroup: string,
        name: string,
        opts: {
          location: string;
          offerThroughput: string;
          accessPolicyObjectId?: string[];
          json: boolean;
        },
      ) => {
        await run(
          (json) =>
            new NewServiceCommand(
              { account: account(), json },
              {
                resourceGroup,
                name,
                location: opts.location,
                offerThroughput: parseThroughput(opts.offerThroughput),
                accessPolicyObjectIds: opts.accessPolicyObjectId ?? [],
              },
            ),
          opts.json,
        );
      },
    );
}
