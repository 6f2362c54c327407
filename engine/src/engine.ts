/**
 * dscpack Engine — Main Engine Class
 *
 * Orchestrates one publish run:
 *
 *   archive: PENDING → VALIDATING → CONFIRMING → PARSING → STAGING →
 *            ARCHIVING → CLEANING_UP → COMPLETED
 *   upload:  PENDING → VALIDATING → [PARSING → STAGING → ARCHIVING] →
 *            CONFIRMING → UPLOADING → CLEANING_UP → COMPLETED
 *
 * A declined confirmation ends in SKIPPED, any error in FAILED. Every run
 * passes through CLEANING_UP, which deletes the run's temp files.
 *
 * The engine has NO UI logic. It communicates via return values and event
 * callbacks.
 */

import * as crypto from "crypto";
import { TempResourceTracker } from "./cleanup";
import { ConfirmHandler, createConfirmationGate } from "./confirm";
import { toPublishError } from "./errors";
import { runMode } from "./modes";
import { ModuleResolver, PowerShellModuleResolver } from "./modules/resolver";
import { ConfigurationParser, PowerShellConfigurationParser } from "./parser";
import {
  PowerShellRunner,
  ProcessPowerShellRunner,
  checkPowerShellVersion,
} from "./powershell";
import { AzureBlobStore, BlobStore } from "./storage";
import {
  ArchiveInfo,
  CleanupReport,
  EngineEvent,
  EngineEventHandler,
  PublishFailure,
  PublishRequest,
  PublishResult,
  PublishState,
  ValidatedRequest,
} from "./types";
import { createLogger, Logger } from "./utils/logger";
import { validateRequest } from "./validate";

export interface EngineOptions {
  /** Enable debug logging to stderr */
  verbose: boolean;
  /** Base for relative paths (default: process.cwd()) */
  cwd?: string;
  /** Container for uploads that name none */
  default_container?: string;
  /** PowerShell executable for the default runner */
  powershell?: string;
  /** Parent of the run's temp folders (default: os.tmpdir()) */
  temp_dir?: string;
  /** Check the PowerShell version before publishing (default: true) */
  check_powershell_version?: boolean;
}

/** Collaborators; anything omitted gets the PowerShell/Azure default */
export interface EngineDependencies {
  logger?: Logger;
  powershell?: PowerShellRunner;
  parser?: ConfigurationParser;
  resolver?: ModuleResolver;
  blobStore?: BlobStore;
}

export interface PublishOptions {
  /** Report the side-effecting action instead of running it */
  what_if?: boolean;
  /** Asked before the side-effecting action; default approves */
  confirm?: ConfirmHandler;
}

export function defaultPowerShellExecutable(): string {
  return process.platform === "win32" ? "powershell" : "pwsh";
}

export class PublishEngine {
  private options: EngineOptions;
  private logger: Logger;
  private powershell: PowerShellRunner;
  private parser: ConfigurationParser;
  private resolver: ModuleResolver;
  private blobStore: BlobStore;
  private eventHandlers: EngineEventHandler[] = [];

  constructor(options: EngineOptions, dependencies: EngineDependencies = {}) {
    this.options = options;
    this.logger =
      dependencies.logger ??
      createLogger({ level: options.verbose ? "debug" : "silent" });
    this.powershell =
      dependencies.powershell ??
      new ProcessPowerShellRunner({
        executable: options.powershell ?? defaultPowerShellExecutable(),
        logger: this.logger,
      });
    this.parser =
      dependencies.parser ?? new PowerShellConfigurationParser(this.powershell);
    this.resolver =
      dependencies.resolver ?? new PowerShellModuleResolver(this.powershell);
    this.blobStore = dependencies.blobStore ?? new AzureBlobStore(this.logger);
  }

  // ─── Event System ────────────────────────────────────────────

  /**
   * Register an event handler. The CLI uses this for progress output.
   */
  on(handler: EngineEventHandler): void {
    this.eventHandlers.push(handler);
  }

  private emit(event: EngineEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (err: unknown) {
        // A broken handler must not change the run's outcome
        this.logger.debug(
          { error: err instanceof Error ? err.message : String(err) },
          "Event handler threw",
        );
      }
    }
  }

  // ─── Core: Publish ───────────────────────────────────────────

  async publish(
    request: PublishRequest,
    options: PublishOptions = {},
  ): Promise<PublishResult> {
    const executionId = crypto.randomUUID();
    const startedAt = new Date().toISOString();
    const whatIf = options.what_if ?? false;
    const tracker = new TempResourceTracker(this.logger, this.options.temp_dir);

    const transition = (state: PublishState, message?: string) => {
      this.logger.debug({ execution: executionId, state }, "State change");
      this.emit({
        type: "state_change",
        timestamp: new Date().toISOString(),
        data: { execution_id: executionId, state, message },
      });
    };

    const log = (message: string) => {
      this.emit({
        type: "log",
        timestamp: new Date().toISOString(),
        data: { execution_id: executionId, message },
      });
    };

    const gate = createConfirmationGate({
      whatIf,
      confirm: options.confirm,
      report: (message) => {
        this.logger.info(message);
        log(message);
      },
    });

    let validated: ValidatedRequest | undefined;
    let failedIn: PublishState = "PENDING";
    let failure: PublishFailure | undefined;
    let completed = false;
    let archive: ArchiveInfo | undefined;
    let blobUrl: string | undefined;
    let modules = new Map<string, string | null>();
    let cleanup: CleanupReport = { deleted: [], failed: [] };

    // ─── PENDING ───
    transition("PENDING");
    this.logger.info(
      { execution: executionId, mode: request.mode, whatIf },
      `Publishing ${request.configurationPath}`,
    );

    try {
      // ─── VALIDATING ───
      failedIn = "VALIDATING";
      transition("VALIDATING");
      validated = validateRequest(request, {
        cwd: this.options.cwd ?? process.cwd(),
        defaultContainer: this.options.default_container,
      });

      if (this.options.check_powershell_version ?? true) {
        const major = await checkPowerShellVersion(this.powershell);
        this.logger.debug({ major }, "PowerShell version accepted");
      }

      // ─── Mode-specific states ───
      const outcome = await runMode(validated, {
        parser: this.parser,
        resolver: this.resolver,
        blobStore: this.blobStore,
        tracker,
        gate,
        logger: this.logger,
        transition: (state) => {
          failedIn = state;
          transition(state);
        },
      });

      completed = outcome.completed;
      archive = outcome.archive;
      blobUrl = outcome.blob_url;
      modules = outcome.modules;

      if (completed && blobUrl) {
        log(`Configuration published to ${blobUrl}`);
      }
    } catch (err: unknown) {
      const error = toPublishError(err);
      failure = {
        category: error.category,
        error_id: error.errorId,
        message: error.message,
        state: failedIn,
      };
      this.logger.error(
        { state: failedIn, category: error.category, error: error.message },
        "Publish failed",
      );
    } finally {
      // ─── CLEANING_UP ───
      transition("CLEANING_UP");
      cleanup = await tracker.release((cleanupFailure) => {
        this.emit({
          type: "warning",
          timestamp: new Date().toISOString(),
          data: {
            execution_id: executionId,
            message: `Could not delete ${cleanupFailure.path}: ${cleanupFailure.message}`,
          },
        });
      });
    }

    const finalState: PublishState = failure
      ? "FAILED"
      : completed
        ? "COMPLETED"
        : "SKIPPED";
    transition(finalState);

    // A temp archive does not outlive the run
    const keptArchive =
      archive && !cleanup.deleted.includes(archive.path) ? archive : undefined;

    return {
      execution_id: executionId,
      mode: request.mode,
      final_state: finalState,
      started_at: startedAt,
      finished_at: new Date().toISOString(),
      what_if: whatIf,
      configuration_path: validated?.configurationPath ?? request.configurationPath,
      archive: keptArchive,
      blob_url: blobUrl,
      required_modules: Object.fromEntries(modules),
      error: failure,
      cleanup,
    };
  }
}
