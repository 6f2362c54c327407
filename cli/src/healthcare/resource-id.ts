/**
 * dscpack CLI — Azure resource ids for healthcare services
 *
 *   /subscriptions/{sub}/resourceGroups/{rg}/providers/Microsoft.HealthcareApis/services/{name}
 */

export const RESOURCE_PROVIDER_NAME = "Microsoft.HealthcareApis";
export const RESOURCE_TYPE_NAME = "services";

export interface HealthcareResourceName {
  resourceGroupName: string;
  resourceName: string;
}

function equalsIgnoreCase(a: string | undefined, b: string): boolean {
  return a !== undefined && a.toLowerCase() === b.toLowerCase();
}

/**
 * Extract resource group and name from a healthcare service resource id.
 * Returns null for ids of any other provider or resource type, child
 * resources included.
 */
export function parseHealthcareResourceId(
  resourceId: string,
): HealthcareResourceName | null {
  const segments = resourceId.split("/").filter((s) => s.length > 0);

  const groupIdx = segments.findIndex((s) => equalsIgnoreCase(s, "resourceGroups"));
  const providerIdx = segments.findIndex((s) => equalsIgnoreCase(s, "providers"));
  if (groupIdx === -1 || providerIdx === -1) return null;
  // Child resources (services/<name>/<childType>/...) are other types
  if (segments.length !== providerIdx + 4) return null;

  const resourceGroupName = segments[groupIdx + 1];
  const provider = segments[providerIdx + 1];
  const type = segments[providerIdx + 2];
  const resourceName = segments[providerIdx + 3];

  if (
    !equalsIgnoreCase(provider, RESOURCE_PROVIDER_NAME) ||
    !equalsIgnoreCase(type, RESOURCE_TYPE_NAME) ||
    !resourceGroupName ||
    !resourceName
  ) {
    return null;
  }

  return { resourceGroupName, resourceName };
}
