/**
 * dscpack CLI — Healthcare management client
 *
 * The healthcare commands only use the `services` operations of the
 * Azure Healthcare APIs management client; tests substitute any object of
 * the same shape.
 */

import { HealthcareApisManagementClient } from "@azure/arm-healthcareapis";
import type { ServicesDescription } from "@azure/arm-healthcareapis";
import { DefaultAzureCredential } from "@azure/identity";
import type { TokenCredential } from "@azure/identity";
import { z } from "zod";

export const MANAGEMENT_SCOPE = "https://management.azure.com/.default";

export interface HealthcareServicesOperations {
  list(): AsyncIterable<ServicesDescription>;
  listByResourceGroup(resourceGroupName: string): AsyncIterable<ServicesDescription>;
  get(resourceGroupName: string, resourceName: string): Promise<ServicesDescription>;
  beginCreateOrUpdateAndWait(
    resourceGroupName: string,
    resourceName: string,
    serviceDescription: ServicesDescription,
  ): Promise<ServicesDescription>;
}

export interface HealthcareManagementClient {
  services: HealthcareServicesOperations;
}

/** Who the commands act as */
export interface AzureAccountContext {
  subscriptionId?: string;
  /** Absent when nobody is signed in */
  credential?: TokenCredential;
}

export function defaultAccountContext(subscriptionId?: string): AzureAccountContext {
  return { subscriptionId, credential: new DefaultAzureCredential() };
}

export function createManagementClient(
  credential: TokenCredential,
  subscriptionId: string,
): HealthcareManagementClient {
  return new HealthcareApisManagementClient(credential, subscriptionId);
}

// ─── Signed-in principal ────────────────────────────────────

const TokenClaimsSchema = z.object({
  oid: z.string().optional(),
  tid: z.string().optional(),
});

export interface PrincipalClaims {
  objectId?: string;
  tenantId?: string;
}

/** Read the object and tenant ids from a JWT access token */
export function decodeTokenClaims(token: string): PrincipalClaims {
  const payload = token.split(".")[1];
  if (!payload) return {};
  let json: unknown;
  try {
    json = JSON.parse(Buffer.from(payload, "base64url").toString("utf-8"));
  } catch {
    return {};
  }
  const parsed = TokenClaimsSchema.safeParse(json);
  if (!parsed.success) return {};
  return { objectId: parsed.data.oid, tenantId: parsed.data.tid };
}

/**
 * Claims of the signed-in principal, or null when no credential can
 * produce a management token.
 */
export async function getSignedInPrincipal(
  credential: TokenCredential | undefined,
): Promise<PrincipalClaims | null> {
  if (!credential) return null;
  let token: string | undefined;
  try {
    token = (await credential.getToken(MANAGEMENT_SCOPE))?.token;
  } catch {
    return null;
  }
  return token ? decodeTokenClaims(token) : null;
}
