/**
 * dscpack CLI — Healthcare command tests
 *
 * The management client is replaced by an in-memory fake; nothing here
 * talks to Azure.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { ServicesDescription } from "@azure/arm-healthcareapis";
import { RestError } from "@azure/core-rest-pipeline";
import type { TokenCredential } from "@azure/identity";
import {
  HealthcareManagementClient,
  decodeTokenClaims,
  getSignedInPrincipal,
} from "../src/healthcare/client";
import { toHealthcareServices } from "../src/healthcare/base-command";
import {
  GetServiceCommand,
  ListServicesCommand,
  NewServiceCommand,
} from "../src/healthcare/commands";
import { toHealthcareService } from "../src/healthcare/models";
import { parseHealthcareResourceId } from "../src/healthcare/resource-id";
import { CommandError } from "../src/output";

const SERVICE_ID =
  "/subscriptions/sub-1/resourceGroups/rg-health/providers/Microsoft.HealthcareApis/services/fhir-dev";

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

function sampleService(): ServicesDescription {
  return {
    id: SERVICE_ID,
    name: "fhir-dev",
    kind: "fhir-R4",
    location: "westus2",
    tags: { env: "dev" },
    properties: {
      provisioningState: "Succeeded",
      accessPolicies: [{ objectId: "obj-1" }],
      cosmosDbConfiguration: { offerThroughput: 400 },
      authenticationConfiguration: {
        authority: "https://login.microsoftonline.com/tenant-1",
        audience: "https://fhir-dev.azurehealthcareapis.com",
        smartProxyEnabled: false,
      },
    },
  };
}

function tokenFor(claims: Record<string, string>): string {
  const payload = Buffer.from(JSON.stringify(claims)).toString("base64url");
  return `header.${payload}.signature`;
}

function fakeCredential(claims: Record<string, string>): TokenCredential {
  return {
    getToken: async () => ({
      token: tokenFor(claims),
      expiresOnTimestamp: Date.now() + 3_600_000,
    }),
  };
}

async function* pagesOf<T>(items: T[]): AsyncGenerator<T> {
  yield* items;
}

class FakeHealthcareClient implements HealthcareManagementClient {
  calls: string[] = [];
  failWith: Error | undefined;
  created: ServicesDescription | undefined;

  constructor(private items: ServicesDescription[]) {}

  services = {
    list: () => {
      this.calls.push("list");
      return pagesOf(this.items);
    },
    listByResourceGroup: (resourceGroupName: string) => {
      this.calls.push(`listByResourceGroup ${resourceGroupName}`);
      return pagesOf(this.items);
    },
    get: async (resourceGroupName: string, resourceName: string) => {
      this.calls.push(`get ${resourceGroupName}/${resourceName}`);
      if (this.failWith) throw this.failWith;
      return this.items[0];
    },
    beginCreateOrUpdateAndWait: async (
      resourceGroupName: string,
      resourceName: string,
      description: ServicesDescription,
    ) => {
      this.calls.push(`create ${resourceGroupName}/${resourceName}`);
      this.created = description;
      return { ...description, id: SERVICE_ID, name: resourceName };
    },
  };
}

function printedJson(): unknown {
  const calls = vi.mocked(console.log).mock.calls;
  expect(calls).toHaveLength(1);
  return JSON.parse(String(calls[0][0]));
}

// ─── Resource ids ───────────────────────────────────────────

describe("parseHealthcareResourceId", () => {
  it("extracts resource group and name", () => {
    expect(parseHealthcareResourceId(SERVICE_ID)).toEqual({
      resourceGroupName: "rg-health",
      resourceName: "fhir-dev",
    });
  });

  it("ignores case in provider and segment names", () => {
    expect(
      parseHealthcareResourceId(
        "/subscriptions/sub-1/resourcegroups/rg-health/PROVIDERS/microsoft.healthcareapis/Services/fhir-dev",
      ),
    ).toEqual({ resourceGroupName: "rg-health", resourceName: "fhir-dev" });
  });

  it("rejects other providers and incomplete ids", () => {
    expect(
      parseHealthcareResourceId(
        "/subscriptions/sub-1/resourceGroups/rg-health/providers/Microsoft.Storage/storageAccounts/acct",
      ),
    ).toBeNull();
    expect(
      parseHealthcareResourceId(
        "/subscriptions/sub-1/resourceGroups/rg-health/providers/Microsoft.HealthcareApis/services",
      ),
    ).toBeNull();
    expect(
      parseHealthcareResourceId(`${SERVICE_ID}/privateEndpointConnections/pe-1`),
    ).toBeNull();
    expect(parseHealthcareResourceId("fhir-dev")).toBeNull();
  });
});

// ─── Output model ───────────────────────────────────────────

describe("toHealthcareService", () => {
  it("flattens a service description", () => {
    expect(toHealthcareService(sampleService())).toEqual({
      id: SERVICE_ID,
      name: "fhir-dev",
      resourceGroupName: "rg-health",
      location: "westus2",
      kind: "fhir-R4",
      etag: undefined,
      tags: { env: "dev" },
      provisioningState: "Succeeded",
      accessPolicies: ["obj-1"],
      cosmosDbOfferThroughput: 400,
      authority: "https://login.microsoftonline.com/tenant-1",
      audience: "https://fhir-dev.azurehealthcareapis.com",
      smartProxyEnabled: false,
      corsOrigins: [],
      publicNetworkAccess: undefined,
    });
  });

  it("collects every page of a listing", async () => {
    const services = await toHealthcareServices(
      pagesOf([sampleService(), { ...sampleService(), name: "fhir-test" }]),
    );
    expect(services.map((s) => s.name)).toEqual(["fhir-dev", "fhir-test"]);
  });
});

// ─── Signed-in principal ────────────────────────────────────

describe("signed-in principal", () => {
  it("decodes object and tenant ids from a token", () => {
    expect(decodeTokenClaims(tokenFor({ oid: "obj-1", tid: "tenant-1" }))).toEqual({
      objectId: "obj-1",
      tenantId: "tenant-1",
    });
    expect(decodeTokenClaims("not-a-token")).toEqual({});
  });

  it("is null without a usable credential", async () => {
    expect(await getSignedInPrincipal(undefined)).toBeNull();

    const failing: TokenCredential = {
      getToken: async () => {
        throw new Error("no account");
      },
    };
    expect(await getSignedInPrincipal(failing)).toBeNull();
  });
});

// ─── Commands ───────────────────────────────────────────────

describe("healthcare commands", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("lists services in the subscription as JSON", async () => {
    const client = new FakeHealthcareClient([sampleService()]);
    const command = new ListServicesCommand({ account: {}, json: true });
    command.client = client;

    await command.execute();

    expect(client.calls).toEqual(["list"]);
    expect(printedJson()).toEqual([
      {
        id: SERVICE_ID,
        name: "fhir-dev",
        resourceGroupName: "rg-health",
        location: "westus2",
        kind: "fhir-R4",
        tags: { env: "dev" },
        provisioningState: "Succeeded",
        accessPolicies: ["obj-1"],
        cosmosDbOfferThroughput: 400,
        authority: "https://login.microsoftonline.com/tenant-1",
        audience: "https://fhir-dev.azurehealthcareapis.com",
        smartProxyEnabled: false,
        corsOrigins: [],
      },
    ]);
  });

  it("lists one resource group when given", async () => {
    const client = new FakeHealthcareClient([]);
    const command = new ListServicesCommand({ account: {} }, "rg-health");
    command.client = client;

    await command.execute();

    expect(client.calls).toEqual(["listByResourceGroup rg-health"]);
  });

  it("gets a service by resource id", async () => {
    const client = new FakeHealthcareClient([sampleService()]);
    const command = new GetServiceCommand({ account: {}, json: true }, { resourceId: SERVICE_ID });
    command.client = client;

    await command.execute();

    expect(client.calls).toEqual(["get rg-health/fhir-dev"]);
    expect(printedJson()).toMatchObject({ name: "fhir-dev", resourceGroupName: "rg-health" });
  });

  it("rejects a resource id of another type", async () => {
    const client = new FakeHealthcareClient([sampleService()]);
    const command = new GetServiceCommand(
      { account: {} },
      { resourceId: "/subscriptions/sub-1/resourceGroups/rg/providers/Microsoft.Web/sites/app" },
    );
    command.client = client;

    await expect(command.execute()).rejects.toThrow(
      "'/subscriptions/sub-1/resourceGroups/rg/providers/Microsoft.Web/sites/app' is not a Microsoft.HealthcareApis/services resource id.",
    );
    expect(client.calls).toEqual([]);
  });

  it("requires either a resource id or a group and name", async () => {
    const both = new GetServiceCommand(
      { account: {} },
      { resourceGroup: "rg-health", resourceId: SERVICE_ID },
    );
    await expect(both.execute()).rejects.toThrow(
      "Specify either --resource-id or a resource group and name, not both.",
    );

    const neither = new GetServiceCommand({ account: {} }, { resourceGroup: "rg-health" });
    await expect(neither.execute()).rejects.toThrow(
      "A resource group and a service name (or --resource-id) are required.",
    );
  });

  it("reports management API failures as InvalidOperation", async () => {
    const client = new FakeHealthcareClient([]);
    client.failWith = new RestError("The resource was not found.", { statusCode: 404 });
    const command = new GetServiceCommand(
      { account: {} },
      { resourceGroup: "rg-health", name: "missing" },
    );
    command.client = client;

    const error = await command.execute().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CommandError);
    expect(error).toMatchObject({
      category: "InvalidOperation",
      message: "The resource was not found.",
    });
  });

  it("needs a subscription before creating a client", async () => {
    const command = new ListServicesCommand({ account: {} });
    await expect(command.execute()).rejects.toThrow(
      "No Azure subscription selected. Set AZURE_SUBSCRIPTION_ID or healthcare.subscriptionId in config.yaml.",
    );
  });
});

describe("NewServiceCommand", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const settings = {
    resourceGroup: "rg-health",
    name: "fhir-new",
    location: "eastus",
    offerThroughput: 1000,
    accessPolicyObjectIds: [],
  };

  it("grants the signed-in principal access in its tenant", async () => {
    const command = new NewServiceCommand(
      { account: { credential: fakeCredential({ oid: "obj-7", tid: "tenant-7" }) } },
      settings,
    );

    expect(await command.buildDescription()).toEqual({
      kind: "fhir-R4",
      location: "eastus",
      properties: {
        accessPolicies: [{ objectId: "obj-7" }],
        cosmosDbConfiguration: { offerThroughput: 1000 },
        authenticationConfiguration: {
          authority: "https://login.microsoftonline.com/tenant-7",
          audience: "https://fhir-new.azurehealthcareapis.com",
          smartProxyEnabled: false,
        },
      },
    });
  });

  it("uses explicit object ids when given", async () => {
    const command = new NewServiceCommand(
      { account: { credential: fakeCredential({ oid: "obj-7", tid: "tenant-7" }) } },
      { ...settings, accessPolicyObjectIds: ["obj-a", "obj-b"] },
    );

    const description = await command.buildDescription();
    expect(description.properties?.accessPolicies).toEqual([
      { objectId: "obj-a" },
      { objectId: "obj-b" },
    ]);
  });

  it("falls back to random ids when nobody is signed in", async () => {
    const command = new NewServiceCommand({ account: {} }, settings);

    const objectId = await command.accessPolicyId();
    const tenantId = await command.tenantId();
    expect(objectId).toMatch(UUID_PATTERN);
    expect(tenantId).toMatch(UUID_PATTERN);
  });

  it("creates the service through the management API", async () => {
    const client = new FakeHealthcareClient([]);
    const command = new NewServiceCommand(
      { account: { credential: fakeCredential({ oid: "obj-7", tid: "tenant-7" }) }, json: true },
      settings,
    );
    command.client = client;

    await command.execute();

    expect(client.calls).toEqual(["create rg-health/fhir-new"]);
    expect(client.created?.properties?.accessPolicies).toEqual([{ objectId: "obj-7" }]);
    expect(printedJson()).toMatchObject({
      name: "fhir-new",
      resourceGroupName: "rg-health",
      location: "eastus",
      cosmosDbOfferThroughput: 1000,
    });
  });
});
