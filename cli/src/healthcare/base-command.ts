/**
 * dscpack CLI — Healthcare command base
 *
 * Shared plumbing for the `dscpack healthcare` commands: a lazily created
 * management client, the signed-in principal's ids, error mapping for
 * management API failures, and output of service descriptions.
 */

import * as crypto from "crypto";
import type { ServicesDescription } from "@azure/arm-healthcareapis";
import { RestError } from "@azure/core-rest-pipeline";
import { CommandError, colors, printDetail, printInfo, printTable } from "../output";
import {
  AzureAccountContext,
  HealthcareManagementClient,
  PrincipalClaims,
  createManagementClient,
  getSignedInPrincipal,
} from "./client";
import { HealthcareService, toHealthcareService } from "./models";
import { HealthcareResourceName, parseHealthcareResourceId } from "./resource-id";

export interface HealthcareCommandOptions {
  account: AzureAccountContext;
  /** Print JSON instead of tables and detail lines */
  json?: boolean;
}

export abstract class HealthcareCommand {
  private _client: HealthcareManagementClient | undefined;
  private _principal: Promise<PrincipalClaims | null> | undefined;
  protected readonly account: AzureAccountContext;
  protected readonly json: boolean;

  constructor(options: HealthcareCommandOptions) {
    this.account = options.account;
    this.json = options.json ?? false;
  }

  abstract execute(): Promise<void>;

  // ─── Client ───────────────────────────────────────────────

  get client(): HealthcareManagementClient {
    if (!this._client) {
      const { credential, subscriptionId } = this.account;
      if (!credential || !subscriptionId) {
        throw new CommandError(
          "InvalidOperation",
          "No Azure subscription selected. Set AZURE_SUBSCRIPTION_ID or healthcare.subscriptionId in config.yaml.",
        );
      }
      this._client = createManagementClient(credential, subscriptionId);
    }
    return this._client;
  }

  set client(client: HealthcareManagementClient) {
    this._client = client;
  }

  // ─── Signed-in principal ──────────────────────────────────

  private principal(): Promise<PrincipalClaims | null> {
    if (!this._principal) {
      this._principal = getSignedInPrincipal(this.account.credential);
    }
    return this._principal;
  }

  /** Object id of the signed-in principal, or a random UUID */
  async accessPolicyId(): Promise<string> {
    return (await this.principal())?.objectId ?? crypto.randomUUID();
  }

  /** Tenant of the signed-in principal, or a random UUID */
  async tenantId(): Promise<string> {
    return (await this.principal())?.tenantId ?? crypto.randomUUID();
  }

  // ─── Execution ────────────────────────────────────────────

  /**
   * Run a management operation. API failures surface as InvalidOperation.
   */
  protected async runCommand<T>(action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (err: unknown) {
      if (err instanceof RestError) {
        throw new CommandError("InvalidOperation", err.message, { cause: err });
      }
      throw err;
    }
  }

  // ─── Output ───────────────────────────────────────────────

  protected writeService(description: ServicesDescription | undefined): void {
    if (!description) return;
    const service = toHealthcareService(description);

    if (this.json) {
      console.log(JSON.stringify(service, null, 2));
      return;
    }

    console.log(colors.bold(service.name));
    const details: Array<[string, string | undefined]> = [
      ["Resource group", service.resourceGroupName],
      ["Location", service.location],
      ["Kind", service.kind],
      ["State", service.provisioningState],
      ["Authority", service.authority],
      ["Audience", service.audience],
      ["Access policies", service.accessPolicies.join(", ")],
      ["Cosmos DB RU/s", service.cosmosDbOfferThroughput?.toString()],
      ["Id", service.id],
    ];
    for (const [label, value] of details) {
      if (value) printDetail(label, value);
    }
  }

  protected writeServiceList(services: HealthcareService[]): void {
    if (this.json) {
      console.log(JSON.stringify(services, null, 2));
      return;
    }
    if (services.length === 0) {
      printInfo("No healthcare services found.");
      return;
    }

    printTable({
      head: ["Name", "Resource group", "Location", "Kind", "State"],
      rows: services.map((s) => [
        s.name,
        s.resourceGroupName,
        s.location,
        s.kind,
        s.provisioningState ?? "",
      ]),
    });
  }

  // ─── Helpers ──────────────────────────────────────────────

  protected validateAndExtractName(resourceId: string): HealthcareResourceName | null {
    return parseHealthcareResourceId(resourceId);
  }
}

/**
 * Collect every service description from a paged listing.
 */
export async function toHealthcareServices(
  pages: AsyncIterable<ServicesDescription>,
): Promise<HealthcareService[]> {
  const services: HealthcareService[] = [];
  for await (const description of pages) {
    services.push(toHealthcareService(description));
  }
  return services;
}
