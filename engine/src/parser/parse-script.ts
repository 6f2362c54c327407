/**
 * PowerShell side of the configuration parser.
 *
 * Parses a configuration file with the PowerShell AST parser and prints a
 * single compressed JSON document:
 *
 *   { "requiredModules": { "<name>": "<version>" | null },
 *     "errors": [ "<parse error>" ],
 *     "resourceErrors": [ "<resource lookup error>" ] }
 *
 * Modules come from every Import-DscResource statement: -ModuleName as a
 * string, array or module specification hashtable (with -ModuleVersion
 * applying to plain names), and -Name resources mapped to their module
 * through Get-DscResource.
 */

import { quotePowerShellString } from "../powershell";

const PARSE_FUNCTION = [
  "function Get-DscConfigurationModules([string]$Path) {",
  "  $tokens = $null",
  "  $parseErrors = $null",
  "  $ast = [System.Management.Automation.Language.Parser]::ParseFile($Path, [ref]$tokens, [ref]$parseErrors)",
  "  $errors = @($parseErrors | ForEach-Object { $_.ToString() })",
  "  $resourceErrors = @()",
  "  $modules = @{}",
  "",
  "  $imports = $ast.FindAll({",
  "    param($node)",
  "    $node -is [System.Management.Automation.Language.CommandAst] -and",
  "      $node.GetCommandName() -eq 'Import-DscResource'",
  "  }, $true)",
  "",
  "  foreach ($import in $imports) {",
  "    $bound = [System.Management.Automation.Language.StaticParameterBinder]::BindCommand($import, $true)",
  "    $moduleVersion = $null",
  "    if ($bound.BoundParameters.ContainsKey('ModuleVersion')) {",
  "      $moduleVersion = [string]$bound.BoundParameters['ModuleVersion'].Value.SafeGetValue()",
  "    }",
  "",
  "    if ($bound.BoundParameters.ContainsKey('ModuleName')) {",
  "      try {",
  "        $moduleNames = $bound.BoundParameters['ModuleName'].Value.SafeGetValue()",
  "      } catch {",
  "        $errors += \"Import-DscResource -ModuleName must be a constant value: $($import.Extent.Text)\"",
  "        continue",
  "      }",
  "      foreach ($item in @($moduleNames)) {",
  "        if ($item -is [System.Collections.IDictionary]) {",
  "          $version = $null",
  "          if ($item['RequiredVersion']) { $version = [string]$item['RequiredVersion'] }",
  "          elseif ($item['ModuleVersion']) { $version = [string]$item['ModuleVersion'] }",
  "          $modules[[string]$item['ModuleName']] = $version",
  "        } else {",
  "          $modules[[string]$item] = $moduleVersion",
  "        }",
  "      }",
  "    } elseif ($bound.BoundParameters.ContainsKey('Name')) {",
  "      foreach ($resourceName in @($bound.BoundParameters['Name'].Value.SafeGetValue())) {",
  "        try {",
  "          $resource = Get-DscResource -Name $resourceName -ErrorAction Stop | Select-Object -First 1",
  "          if ($null -ne $resource -and $resource.ModuleName) { $modules[[string]$resource.ModuleName] = $null }",
  "        } catch {",
  "          $resourceErrors += \"Cannot read DSC resource '$resourceName': $($_.Exception.Message)\"",
  "        }",
  "      }",
  "    }",
  "  }",
  "",
  "  [pscustomobject]@{",
  "    requiredModules = $modules",
  "    errors = $errors",
  "    resourceErrors = $resourceErrors",
  "  } | ConvertTo-Json -Compress -Depth 5",
  "}",
];

export function buildParseConfigurationScript(configurationPath: string): string {
  return [
    ...PARSE_FUNCTION,
    `Get-DscConfigurationModules -Path ${quotePowerShellString(configurationPath)}`,
  ].join("\n");
}
