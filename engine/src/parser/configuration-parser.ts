/**
 * dscpack Engine — Configuration Parser
 *
 * Extracts the modules a DSC configuration imports. The parse itself is
 * delegated to PowerShell; this module validates what comes back and turns
 * parser failures into publish errors.
 */

import { z } from "zod";
import {
  PublishError,
  ResourceAccessError,
  ErrorIds,
  permissionDenied,
} from "../errors";
import { PowerShellRunner } from "../powershell";
import { ConfigurationParseResult } from "../types";
import { Logger } from "../utils/logger";
import { buildParseConfigurationScript } from "./parse-script";

/** Always present on the target machine, and the newest copy wins there */
export const BUILT_IN_DSC_MODULE = "PSDesiredStateConfiguration";

export interface ConfigurationParser {
  /**
   * @throws ResourceAccessError when a DSC resource cannot be read
   */
  parse(configurationPath: string): Promise<ConfigurationParseResult>;
}

/** PowerShell collapses single-item arrays and emits null for empty ones */
const stringList = z.preprocess(
  (value) => (value == null ? [] : Array.isArray(value) ? value : [value]),
  z.array(z.string()),
);

const ParseOutputSchema = z.object({
  requiredModules: z.record(z.string().nullable()).default({}),
  errors: stringList,
  resourceErrors: stringList,
});

export class PowerShellConfigurationParser implements ConfigurationParser {
  constructor(private runner: PowerShellRunner) {}

  async parse(configurationPath: string): Promise<ConfigurationParseResult> {
    const output = await this.runner.run(
      buildParseConfigurationScript(configurationPath),
    );
    return parseParserOutput(output);
  }
}

/**
 * Validate the parser script's JSON output. The document is the last
 * non-empty line; host warnings may precede it.
 *
 * @throws ResourceAccessError when the script reported resource lookup errors
 */
export function parseParserOutput(output: string): ConfigurationParseResult {
  const lines = output.split(/\r?\n/).filter((line) => line.trim().length > 0);
  const document = lines.length > 0 ? lines[lines.length - 1] : "";
  let json: unknown;
  try {
    json = JSON.parse(document);
  } catch {
    throw new Error(`Configuration parser returned invalid output: ${output}`);
  }

  const parsed = ParseOutputSchema.parse(json);

  if (parsed.resourceErrors.length > 0) {
    throw new ResourceAccessError(parsed.resourceErrors.join("\n"));
  }

  const requiredModules = new Map<string, string | null>();
  for (const [name, version] of Object.entries(parsed.requiredModules)) {
    requiredModules.set(name, version ? version : null);
  }

  return { requiredModules, errors: parsed.errors };
}

/**
 * Parse a configuration file and return the modules to ship with it.
 *
 * - Resource access failures → PermissionDenied
 * - Any parse error → ParserError listing every message
 * - PSDesiredStateConfiguration is removed from the result
 */
export async function parseConfiguration(
  parser: ConfigurationParser,
  configurationPath: string,
  logger: Logger,
): Promise<Map<string, string | null>> {
  logger.info({ path: configurationPath }, "Parsing configuration script");

  let result: ConfigurationParseResult;
  try {
    result = await parser.parse(configurationPath);
  } catch (err: unknown) {
    if (err instanceof ResourceAccessError) {
      throw permissionDenied(
        ErrorIds.CANNOT_ACCESS_DSC_RESOURCE,
        err.message,
        err,
      );
    }
    throw err;
  }

  if (result.errors.length > 0) {
    throw new PublishError(
      "ParserError",
      ErrorIds.PARSE_ERROR,
      `Configuration file '${configurationPath}' contained parse errors:\n` +
        result.errors.join("\n"),
    );
  }

  const modules = new Map<string, string | null>();
  for (const [name, version] of result.requiredModules) {
    if (name.toLowerCase() === BUILT_IN_DSC_MODULE.toLowerCase()) continue;
    modules.set(name, version);
  }

  logger.info(
    { modules: Object.fromEntries(modules) },
    `Required modules: ${formatModuleList(modules)}`,
  );

  return modules;
}

export function formatModuleList(modules: Map<string, string | null>): string {
  if (modules.size === 0) return "(none)";
  return Array.from(modules, ([name, version]) =>
    version ? `${name} ${version}` : name,
  ).join(", ");
}
