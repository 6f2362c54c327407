/**
 * dscpack Engine — Public API
 *
 * This is the single entry point for the engine package.
 * The CLI imports from here — never from internal modules.
 */

// Main engine class
export { PublishEngine, defaultPowerShellExecutable } from "./engine";
export type {
  EngineOptions,
  EngineDependencies,
  PublishOptions,
} from "./engine";

// All types
export type {
  // Request types
  PublishMode,
  PublishRequest,
  ArchiveRequest,
  UploadRequest,
  StorageContext,
  ConnectionStringContext,
  AccountKeyContext,
  SasTokenContext,
  StorageCredentials,
  ValidatedRequest,
  ValidatedArchiveRequest,
  ValidatedUploadRequest,

  // Pipeline types
  ConfigurationParseResult,
  ArchiveInfo,

  // Execution types
  PublishState,
  PublishResult,
  PublishFailure,
  ErrorCategory,
  CleanupFailure,
  CleanupReport,

  // Events
  EngineEvent,
  EngineEventType,
  EngineEventHandler,
  StateChangeData,
  LogData,
} from "./types";

// Errors
export {
  PublishError,
  ResourceAccessError,
  ErrorIds,
  invalidArgument,
  permissionDenied,
  toPublishError,
} from "./errors";
export type { ErrorId } from "./errors";

// Pipeline pieces (exposed for advanced use / testing)
export {
  validateRequest,
  resolveStorageCredentials,
  accountNameFromConnectionString,
  ALLOWED_EXTENSIONS,
  DEFAULT_CONTAINER_NAME,
  DEFAULT_ENDPOINT_SUFFIX,
} from "./validate";
export { createConfirmationGate, formatWhatIf } from "./confirm";
export type {
  ConfirmHandler,
  ConfirmationGate,
  PendingAction,
} from "./confirm";
export { TempResourceTracker, deleteFile, deleteDirectory } from "./cleanup";
export { createArchive, describeArchive, isZipFile } from "./archive";
export { buildStagingDirectory } from "./staging";
export {
  ArchiveModeHandler,
  UploadModeHandler,
  CREATE_ARCHIVE_ACTION,
  uploadAction,
} from "./modes";
export {
  PowerShellConfigurationParser,
  parseConfiguration,
  parseParserOutput,
  formatModuleList,
  buildParseConfigurationScript,
  BUILT_IN_DSC_MODULE,
} from "./parser";
export type { ConfigurationParser } from "./parser";
export {
  PowerShellModuleResolver,
  buildResolveModuleScript,
} from "./modules/resolver";
export type { ModuleResolver } from "./modules/resolver";
export {
  ProcessPowerShellRunner,
  PowerShellError,
  quotePowerShellString,
  encodePowerShellCommand,
  checkPowerShellVersion,
  MIN_POWERSHELL_MAJOR_VERSION,
} from "./powershell";
export type { PowerShellRunner } from "./powershell";
export { AzureBlobStore, createBlobServiceClient } from "./storage";
export type { BlobContainer, BlobStore } from "./storage";

// Utilities
export { createLogger } from "./utils/logger";
export type { Logger, LogLevel } from "./utils/logger";
