/**
 * dscpack CLI — Healthcare service output model
 *
 * Flattened view of a Microsoft.HealthcareApis/services resource as the
 * healthcare commands print it.
 */

import type { ServicesDescription } from "@azure/arm-healthcareapis";
import { parseHealthcareResourceId } from "./resource-id";

export interface HealthcareService {
  id: string;
  name: string;
  resourceGroupName: string;
  location: string;
  kind: string;
  etag?: string;
  tags: Record<string, string>;
  provisioningState?: string;
  /** Object ids allowed to access the FHIR service */
  accessPolicies: string[];
  cosmosDbOfferThroughput?: number;
  authority?: string;
  audience?: string;
  smartProxyEnabled: boolean;
  corsOrigins: string[];
  publicNetworkAccess?: string;
}

export function toHealthcareService(description: ServicesDescription): HealthcareService {
  const id = description.id ?? "";
  const properties = description.properties;
  const auth = properties?.authenticationConfiguration;

  return {
    id,
    name: description.name ?? "",
    resourceGroupName: parseHealthcareResourceId(id)?.resourceGroupName ?? "",
    location: description.location ?? "",
    kind: description.kind ?? "",
    etag: description.etag,
    tags: description.tags ?? {},
    provisioningState: properties?.provisioningState,
    accessPolicies: (properties?.accessPolicies ?? []).map((policy) => policy.objectId),
    cosmosDbOfferThroughput: properties?.cosmosDbConfiguration?.offerThroughput,
    authority: auth?.authority,
    audience: auth?.audience,
    smartProxyEnabled: auth?.smartProxyEnabled ?? false,
    corsOrigins: properties?.corsConfiguration?.origins ?? [],
    publicNetworkAccess: properties?.publicNetworkAccess,
  };
}
