/**
 * dscpack CLI — Configuration
 *
 * Central location for CLI paths, defaults, and environment detection.
 * All dscpack data lives under ~/.dscpack (DSCPACK_HOME overrides it).
 *
 * Settings come from, highest precedence first:
 *   command-line flag > environment variable > config.yaml > default
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import {
  DEFAULT_CONTAINER_NAME,
  EngineOptions,
  StorageContext,
  defaultPowerShellExecutable,
} from "@dscpack/engine";
import { CommandError } from "./output";

type Env = Record<string, string | undefined>;

export function getDscpackHome(env: Env = process.env): string {
  return env.DSCPACK_HOME || path.join(os.homedir(), ".dscpack");
}

export function getConfigPath(env: Env = process.env): string {
  return path.join(getDscpackHome(env), "config.yaml");
}

// ─── config.yaml ────────────────────────────────────────────

const StorageSettingsSchema = z.object({
  connectionString: z.string().min(1).optional(),
  accountName: z.string().min(1).optional(),
  accountKey: z.string().min(1).optional(),
  sasToken: z.string().min(1).optional(),
  endpointSuffix: z.string().min(1).optional(),
});

export type StorageSettings = z.infer<typeof StorageSettingsSchema>;

const ConfigFileSchema = z.object({
  defaultContainer: z.string().min(1).optional(),
  powershell: z.string().min(1).optional(),
  storage: StorageSettingsSchema.optional(),
  healthcare: z
    .object({ subscriptionId: z.string().min(1).optional() })
    .optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Read and validate config.yaml. A missing or empty file is an empty
 * configuration.
 */
export function loadConfigFile(filePath: string): ConfigFile {
  if (!fs.existsSync(filePath)) return {};

  let raw: unknown;
  try {
    raw = parseYaml(fs.readFileSync(filePath, "utf-8"));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new CommandError(
      "InvalidArgument",
      `Could not read ${filePath}: ${msg}`,
      { cause: err },
    );
  }
  if (raw == null) return {};

  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new CommandError("InvalidArgument", `Invalid configuration in ${filePath}: ${issues}`);
  }
  return result.data;
}

// ─── Resolved settings ──────────────────────────────────────

export interface CliSettings {
  defaultContainer: string;
  powershell: string;
  /** Storage settings from the environment, else from config.yaml */
  storage?: StorageSettings;
  subscriptionId?: string;
}

function storageFromEnv(env: Env): StorageSettings | undefined {
  const settings: StorageSettings = {
    connectionString: env.AZURE_STORAGE_CONNECTION_STRING || undefined,
    accountName: env.AZURE_STORAGE_ACCOUNT || undefined,
    accountKey: env.AZURE_STORAGE_KEY || undefined,
    sasToken: env.AZURE_STORAGE_SAS_TOKEN || undefined,
  };
  return hasStorageSettings(settings) ? settings : undefined;
}

export function hasStorageSettings(settings: StorageSettings | undefined): boolean {
  if (!settings) return false;
  return Boolean(
    settings.connectionString ||
      settings.accountName ||
      settings.accountKey ||
      settings.sasToken ||
      settings.endpointSuffix,
  );
}

/**
 * Merge environment and config file over the built-in defaults.
 */
export function resolveSettings(
  env: Env = process.env,
  file: ConfigFile = loadConfigFile(getConfigPath(env)),
): CliSettings {
  return {
    defaultContainer:
      env.DSCPACK_DEFAULT_CONTAINER || file.defaultContainer || DEFAULT_CONTAINER_NAME,
    powershell:
      env.DSCPACK_POWERSHELL || file.powershell || defaultPowerShellExecutable(),
    storage: storageFromEnv(env) ?? file.storage,
    subscriptionId: env.AZURE_SUBSCRIPTION_ID || file.healthcare?.subscriptionId,
  };
}

/**
 * Pick the first source that has any storage setting, and turn it into a
 * storage context. A source with an account name but neither key nor token,
 * or only an endpoint suffix, yields no context; the engine reports the
 * missing credentials.
 */
export function toStorageContext(
  ...sources: Array<StorageSettings | undefined>
): StorageContext | undefined {
  const settings = sources.find(hasStorageSettings);
  if (!settings) return undefined;

  if (settings.connectionString) {
    return { connectionString: settings.connectionString };
  }
  if (settings.accountName && settings.accountKey) {
    return {
      accountName: settings.accountName,
      accountKey: settings.accountKey,
      endpointSuffix: settings.endpointSuffix,
    };
  }
  if (settings.accountName && settings.sasToken) {
    return {
      accountName: settings.accountName,
      sasToken: settings.sasToken,
      endpointSuffix: settings.endpointSuffix,
    };
  }
  return undefined;
}

/**
 * Build EngineOptions from CLI configuration.
 */
export function getEngineOptions(
  settings: CliSettings,
  verbose: boolean = false,
): EngineOptions {
  return {
    verbose,
    default_container: settings.defaultContainer,
    powershell: settings.powershell,
  };
}
