/**
 * dscpack Engine — Core Type Definitions
 *
 * A publish request is a tagged variant: either build a local archive
 * ("archive") or build/reuse an archive and upload it to blob storage
 * ("upload"). Each variant has its own handler in ./modes.
 */

// ─── Requests ────────────────────────────────────────────────────

export type PublishMode = "archive" | "upload";

export interface ConnectionStringContext {
  connectionString: string;
}

export interface AccountKeyContext {
  accountName: string;
  accountKey: string;
  /** Defaults to core.windows.net */
  endpointSuffix?: string;
}

export interface SasTokenContext {
  accountName: string;
  sasToken: string;
  endpointSuffix?: string;
}

/** Credentials for the storage account the archive is uploaded to */
export type StorageContext =
  | ConnectionStringContext
  | AccountKeyContext
  | SasTokenContext;

export interface ArchiveRequest {
  mode: "archive";
  configurationPath: string;
  /** Local ZIP file to write */
  archivePath: string;
  /** Overwrite an existing archive */
  force?: boolean;
}

export interface UploadRequest {
  mode: "upload";
  configurationPath: string;
  /** Falls back to the engine's default container */
  containerName?: string;
  storage?: StorageContext;
  /** Overwrite an existing blob */
  force?: boolean;
}

export type PublishRequest = ArchiveRequest | UploadRequest;

// ─── Validated requests ──────────────────────────────────────────

export type StorageCredentials =
  | { kind: "connection_string"; connectionString: string; accountName: string }
  | {
      kind: "account_key";
      accountName: string;
      accountKey: string;
      endpointSuffix: string;
    }
  | {
      kind: "sas_token";
      accountName: string;
      sasToken: string;
      endpointSuffix: string;
    };

export interface ValidatedArchiveRequest {
  mode: "archive";
  configurationPath: string;
  archivePath: string;
  force: boolean;
}

export interface ValidatedUploadRequest {
  mode: "upload";
  configurationPath: string;
  containerName: string;
  credentials: StorageCredentials;
  force: boolean;
}

export type ValidatedRequest = ValidatedArchiveRequest | ValidatedUploadRequest;

// ─── Configuration parsing ───────────────────────────────────────

export interface ConfigurationParseResult {
  /** Module name → exact version, or null for "any installed version" */
  requiredModules: Map<string, string | null>;
  errors: string[];
}

// ─── Archive ─────────────────────────────────────────────────────

export interface ArchiveInfo {
  path: string;
  size_bytes: number;
  sha256: string;
}

// ─── Execution Lifecycle ─────────────────────────────────────────

export type PublishState =
  | "PENDING"
  | "VALIDATING"
  | "PARSING"
  | "STAGING"
  | "ARCHIVING"
  | "CONFIRMING"
  | "UPLOADING"
  | "CLEANING_UP"
  | "COMPLETED"
  | "SKIPPED"
  | "FAILED";

export type ErrorCategory =
  | "InvalidArgument"
  | "InvalidOperation"
  | "PermissionDenied"
  | "ParserError"
  | "PreconditionFailure";

export interface PublishFailure {
  category: ErrorCategory;
  /** Machine readable id, e.g. "FileAlreadyExists" */
  error_id: string;
  message: string;
  state: PublishState;
}

export interface CleanupFailure {
  path: string;
  message: string;
}

export interface CleanupReport {
  deleted: string[];
  failed: CleanupFailure[];
}

export interface PublishResult {
  execution_id: string;
  mode: PublishMode;
  final_state: PublishState;
  started_at: string;
  finished_at: string;
  what_if: boolean;
  configuration_path: string;
  /** Final archive (archive mode, or the uploaded file in upload mode) */
  archive?: ArchiveInfo;
  /** Blob URL the archive was (or would have been) uploaded to */
  blob_url?: string;
  /** Modules copied into the archive, PSDesiredStateConfiguration excluded */
  required_modules: Record<string, string | null>;
  error?: PublishFailure;
  cleanup: CleanupReport;
}

// ─── Engine Events ───────────────────────────────────────────────

export type EngineEventType = "state_change" | "log" | "warning";

export interface StateChangeData {
  execution_id: string;
  state: PublishState;
  message?: string;
}

export interface LogData {
  execution_id: string;
  message: string;
}

export interface EngineEvent {
  type: EngineEventType;
  timestamp: string;
  data: StateChangeData | LogData;
}

export type EngineEventHandler = (event: EngineEvent) => void;
