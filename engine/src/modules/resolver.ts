/**
 * dscpack Engine — Module Resolution
 *
 * Finds the installed folder of a PowerShell module so the staging step can
 * copy it. The default implementation asks PowerShell (Get-Module
 * -ListAvailable); anything that can map (name, version) to a folder can
 * stand in.
 */

import { PublishError, ErrorIds } from "../errors";
import { PowerShellRunner, quotePowerShellString } from "../powershell";

export interface ModuleResolver {
  /**
   * @param name - Module name
   * @param version - Exact version, or null for the first installed one
   * @returns Absolute path of the module's folder
   */
  resolve(name: string, version: string | null): Promise<string>;
}

/**
 * Build the lookup script. Arguments are passed as single-quoted literals
 * to a function so a module name can never be interpreted as script.
 */
export function buildResolveModuleScript(
  name: string,
  version: string | null,
): string {
  return [
    "function Resolve-ModuleFolder([string]$moduleName, [string]$moduleVersion) {",
    "  $modules = Get-Module -ListAvailable -Name $moduleName",
    "  if (-not [String]::IsNullOrEmpty($moduleVersion)) {",
    "    $modules = $modules | Where-Object { $_.Version -eq $moduleVersion }",
    "  }",
    "  $module = $modules | Select-Object -First 1",
    "  if ($null -ne $module) { Split-Path -Parent $module.Path }",
    "}",
    `Resolve-ModuleFolder -moduleName ${quotePowerShellString(name)} -moduleVersion ${quotePowerShellString(version ?? "")}`,
  ].join("\n");
}

export class PowerShellModuleResolver implements ModuleResolver {
  constructor(private runner: PowerShellRunner) {}

  async resolve(name: string, version: string | null): Promise<string> {
    const output = await this.runner.run(buildResolveModuleScript(name, version));
    const folder = output.split(/\r?\n/)[0]?.trim() ?? "";

    if (!folder) {
      const wanted = version ? `${name} (version ${version})` : name;
      throw new PublishError(
        "InvalidOperation",
        ErrorIds.MODULE_NOT_FOUND,
        `Required module ${wanted} is not installed on this machine.`,
      );
    }

    return folder;
  }
}
