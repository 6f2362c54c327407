/**
 * dscpack Engine — Request Validation
 *
 * Turns a PublishRequest into a ValidatedRequest: absolute paths, allowed
 * extension for the mode, storage credentials and container for uploads.
 * Nothing here parses the configuration or touches storage.
 */

import * as fs from "fs";
import * as path from "path";
import { ErrorIds, invalidArgument } from "./errors";
import {
  PublishMode,
  PublishRequest,
  StorageContext,
  StorageCredentials,
  ValidatedRequest,
} from "./types";

export const DEFAULT_CONTAINER_NAME = "windows-powershell-dsc";
export const DEFAULT_ENDPOINT_SUFFIX = "core.windows.net";

export const ALLOWED_EXTENSIONS: Record<PublishMode, readonly string[]> = {
  upload: [".ps1", ".psm1", ".zip"],
  archive: [".ps1", ".psm1"],
};

export interface ValidationContext {
  /** Base for relative paths */
  cwd: string;
  /** Container used when an upload request names none */
  defaultContainer?: string;
}

export function validateRequest(
  request: PublishRequest,
  context: ValidationContext,
): ValidatedRequest {
  const configurationPath = path.resolve(context.cwd, request.configurationPath);

  if (!fs.existsSync(configurationPath) || !fs.statSync(configurationPath).isFile()) {
    throw invalidArgument(
      ErrorIds.CONFIGURATION_FILE_NOT_FOUND,
      `Configuration file '${configurationPath}' does not exist.`,
    );
  }

  const extension = path.extname(configurationPath).toLowerCase();
  const allowed = ALLOWED_EXTENSIONS[request.mode];
  if (!allowed.includes(extension)) {
    throw invalidArgument(
      ErrorIds.INVALID_EXTENSION,
      `Configuration file '${configurationPath}' must have one of the ` +
        `extensions ${allowed.join(", ")} to ${request.mode === "upload" ? "be uploaded" : "be archived"}.`,
    );
  }

  switch (request.mode) {
    case "upload":
      return {
        mode: "upload",
        configurationPath,
        containerName:
          request.containerName ?? context.defaultContainer ?? DEFAULT_CONTAINER_NAME,
        credentials: resolveStorageCredentials(request.storage),
        force: request.force ?? false,
      };
    case "archive":
      return {
        mode: "archive",
        configurationPath,
        archivePath: path.resolve(context.cwd, request.archivePath),
        force: request.force ?? false,
      };
  }
}

/**
 * Read the account name out of a storage connection string.
 */
export function accountNameFromConnectionString(
  connectionString: string,
): string | undefined {
  for (const part of connectionString.split(";")) {
    const [key, ...rest] = part.split("=");
    if (key.trim().toLowerCase() === "accountname") {
      return rest.join("=").trim();
    }
  }
  return undefined;
}

export function resolveStorageCredentials(
  context: StorageContext | undefined,
): StorageCredentials {
  if (context && "connectionString" in context && context.connectionString) {
    return {
      kind: "connection_string",
      connectionString: context.connectionString,
      accountName:
        accountNameFromConnectionString(context.connectionString) ?? "",
    };
  }

  if (context && "accountName" in context && context.accountName) {
    if ("accountKey" in context && context.accountKey) {
      return {
        kind: "account_key",
        accountName: context.accountName,
        accountKey: context.accountKey,
        endpointSuffix: context.endpointSuffix ?? DEFAULT_ENDPOINT_SUFFIX,
      };
    }
    if ("sasToken" in context && context.sasToken) {
      return {
        kind: "sas_token",
        accountName: context.accountName,
        sasToken: context.sasToken,
        endpointSuffix: context.endpointSuffix ?? DEFAULT_ENDPOINT_SUFFIX,
      };
    }
  }

  throw invalidArgument(
    ErrorIds.STORAGE_CONTEXT_MISSING,
    "A storage context is required to upload a configuration. Provide a " +
      "connection string, or an account name with an account key or SAS token.",
  );
}
