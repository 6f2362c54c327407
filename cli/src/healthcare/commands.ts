/**
 * dscpack CLI — Healthcare service commands
 */

import type { ServicesDescription } from "@azure/arm-healthcareapis";
import { CommandError, printDebug } from "../output";
import { HealthcareCommand, HealthcareCommandOptions, toHealthcareServices } from "./base-command";

// ─── list ───────────────────────────────────────────────────

export class ListServicesCommand extends HealthcareCommand {
  constructor(
    options: HealthcareCommandOptions,
    private resourceGroup?: string,
  ) {
    super(options);
  }

  async execute(): Promise<void> {
    const services = await this.runCommand(() => {
      const pages = this.resourceGroup
        ? this.client.services.listByResourceGroup(this.resourceGroup)
        : this.client.services.list();
      return toHealthcareServices(pages);
    });
    this.writeServiceList(services);
  }
}

// ─── get ────────────────────────────────────────────────────

export interface ServiceSelector {
  resourceGroup?: string;
  name?: string;
  resourceId?: string;
}

export class GetServiceCommand extends HealthcareCommand {
  constructor(
    options: HealthcareCommandOptions,
    private selector: ServiceSelector,
  ) {
    super(options);
  }

  async execute(): Promise<void> {
    const { resourceGroupName, resourceName } = this.resolveName();
    const service = await this.runCommand(() =>
      this.client.services.get(resourceGroupName, resourceName),
    );
    this.writeService(service);
  }

  private resolveName(): { resourceGroupName: string; resourceName: string } {
    const { resourceGroup, name, resourceId } = this.selector;

    if (resourceId) {
      if (resourceGroup || name) {
        throw new CommandError(
          "InvalidArgument",
          "Specify either --resource-id or a resource group and name, not both.",
        );
      }
      const parsed = this.validateAndExtractName(resourceId);
      if (!parsed) {
        throw new CommandError(
          "InvalidArgument",
          `'${resourceId}' is not a Microsoft.HealthcareApis/services resource id.`,
        );
      }
      return parsed;
    }

    if (!resourceGroup || !name) {
      throw new CommandError(
        "InvalidArgument",
        "A resource group and a service name (or --resource-id) are required.",
      );
    }
    return { resourceGroupName: resourceGroup, resourceName: name };
  }
}

// ─── new ────────────────────────────────────────────────────

export interface NewServiceSettings {
  resourceGroup: string;
  name: string;
  location: string;
  /** Cosmos DB throughput in RU/s */
  offerThroughput: number;
  /** Object ids granted access; defaults to the signed-in principal */
  accessPolicyObjectIds: string[];
}

export const DEFAULT_OFFER_THROUGHPUT = 400;

export class NewServiceCommand extends HealthcareCommand {
  constructor(
    options: HealthcareCommandOptions,
    private settings: NewServiceSettings,
  ) {
    super(options);
  }

  /** The service description sent to the management API */
  async buildDescription(): Promise<ServicesDescription> {
    const { name, location, offerThroughput, accessPolicyObjectIds } = this.settings;
    const objectIds =
      accessPolicyObjectIds.length > 0 ? accessPolicyObjectIds : [await this.accessPolicyId()];
    const tenantId = await this.tenantId();

    return {
      kind: "fhir-R4",
      location,
      properties: {
        accessPolicies: objectIds.map((objectId) => ({ objectId })),
        cosmosDbConfiguration: { offerThroughput },
        authenticationConfiguration: {
          authority: `https://login.microsoftonline.com/${tenantId}`,
          audience: `https://${name}.azurehealthcareapis.com`,
          smartProxyEnabled: false,
        },
      },
    };
  }

  async execute(): Promise<void> {
    const description = await this.buildDescription();
    printDebug(`Creating ${this.settings.name} in ${this.settings.resourceGroup}`);
    const service = await this.runCommand(() =>
      this.client.services.beginCreateOrUpdateAndWait(
        this.settings.resourceGroup,
        this.settings.name,
        description,
      ),
    );
    this.writeService(service);
  }
}
