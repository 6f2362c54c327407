/**
 * dscpack Engine — Errors
 *
 * Every failure of the publish pipeline is terminating and surfaces as a
 * PublishError with a category (what kind of failure) and an error id
 * (which failure exactly).
 */

import { ErrorCategory } from "./types";

export const ErrorIds = {
  CONFIGURATION_FILE_NOT_FOUND: "ConfigurationFileNotFound",
  INVALID_EXTENSION: "InvalidConfigurationFileExtension",
  STORAGE_CONTEXT_MISSING: "StorageContextMissing",
  PARAMETER_SET_CONFLICT: "AmbiguousParameterSet",
  INVALID_POWERSHELL_VERSION: "InvalidPowerShellVersion",
  CANNOT_ACCESS_DSC_RESOURCE: "CannotAccessDscResource",
  PARSE_ERROR: "DscConfigurationParseError",
  MODULE_NOT_FOUND: "ModuleNotFound",
  FILE_ALREADY_EXISTS: "FileAlreadyExists",
  BLOB_ALREADY_EXISTS: "StorageBlobAlreadyExists",
  UNEXPECTED: "UnexpectedError",
} as const;

export type ErrorId = (typeof ErrorIds)[keyof typeof ErrorIds];

export class PublishError extends Error {
  constructor(
    public readonly category: ErrorCategory,
    public readonly errorId: ErrorId,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PublishError";
  }
}

export function invalidArgument(errorId: ErrorId, message: string): PublishError {
  return new PublishError("InvalidArgument", errorId, message);
}

export function permissionDenied(
  errorId: ErrorId,
  message: string,
  cause?: unknown,
): PublishError {
  return new PublishError("PermissionDenied", errorId, message, { cause });
}

/**
 * Thrown by a configuration parser when a DSC resource (or the module that
 * provides it) cannot be read.
 */
export class ResourceAccessError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ResourceAccessError";
  }
}

/**
 * Coerce any thrown value into a PublishError. Unknown failures are
 * reported as InvalidOperation.
 */
export function toPublishError(err: unknown): PublishError {
  if (err instanceof PublishError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new PublishError("InvalidOperation", ErrorIds.UNEXPECTED, message, {
    cause: err,
  });
}
