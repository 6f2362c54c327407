/**
 * dscpack CLI -- Publish Command
 *
 * Packages a DSC configuration with the modules it imports, and either
 * writes the archive locally or uploads it to Azure blob storage.
 *
 * Usage:
 *   dscpack publish demo.ps1 --archive-path demo.zip    Write a local archive
 *   dscpack publish demo.ps1 --account-name acct ...    Upload to storage
 *   dscpack publish demo.zip --connection-string ...    Upload a prebuilt archive
 *   dscpack publish demo.ps1 ... --what-if              Show what would happen
 *
 * Output:
 *
 *   Publishing demo.ps1
 *
 *     ✔ Validated parameters
 *     ✔ Parsed configuration
 *     ✔ Collected modules
 *     ✔ Created archive
 *     ✔ Uploaded archive
 *
 *   ✔ Published to https://acct.blob.core.windows.net/windows-powershell-dsc/demo.ps1.zip in 3.1s
 */

import * as path from "path";
import * as readline from "readline";
import { Command } from "commander";
import {
  ConfirmHandler,
  EngineEvent,
  ErrorIds,
  PublishEngine,
  PublishError,
  PublishRequest,
  PublishResult,
  PublishState,
} from "@dscpack/engine";
import {
  CliSettings,
  StorageSettings,
  getEngineOptions,
  resolveSettings,
  toStorageContext,
} from "../config";
import {
  colors,
  createSpinner,
  formatBytes,
  formatDuration,
  formatErrorCategory,
  formatState,
  isDebugMode,
  printBlank,
  printDebug,
  printDetail,
  printError,
  printHeader,
  printInfo,
  printStageSuccess,
  printSuccess,
  printWarn,
  printWhatIf,
  reportCommandError,
} from "../output";

/** Stages the spinner cycles through */
const STAGE_MESSAGES: Partial<Record<PublishState, string>> = {
  VALIDATING: "Validating parameters...",
  PARSING: "Parsing configuration...",
  STAGING: "Collecting modules...",
  ARCHIVING: "Creating archive...",
  UPLOADING: "Uploading archive...",
  CLEANING_UP: "Removing temporary files...",
};

/** After each stage completes, print a check-marked line */
const STAGE_DONE: Partial<Record<PublishState, string>> = {
  VALIDATING: "Validated parameters",
  PARSING: "Parsed configuration",
  STAGING: "Collected modules",
  ARCHIVING: "Created archive",
  UPLOADING: "Uploaded archive",
};

export interface PublishCommandOptions {
  archivePath?: string;
  container?: string;
  connectionString?: string;
  accountName?: string;
  accountKey?: string;
  sasToken?: string;
  endpointSuffix?: string;
  force: boolean;
  whatIf: boolean;
  yes: boolean;
  verbose: boolean;
}

const UPLOAD_FLAGS: Array<[keyof PublishCommandOptions, string]> = [
  ["container", "--container"],
  ["connectionString", "--connection-string"],
  ["accountName", "--account-name"],
  ["accountKey", "--account-key"],
  ["sasToken", "--sas-token"],
  ["endpointSuffix", "--endpoint-suffix"],
];

/**
 * Turn command-line options into a publish request. --archive-path selects
 * archive mode and cannot be combined with any upload option.
 */
export function buildPublishRequest(
  configurationPath: string,
  opts: PublishCommandOptions,
  settings: Pick<CliSettings, "storage">,
): PublishRequest {
  if (opts.archivePath !== undefined) {
    const conflicting = UPLOAD_FLAGS.filter(([key]) => opts[key] !== undefined).map(
      ([, flag]) => flag,
    );
    if (conflicting.length > 0) {
      throw new PublishError(
        "InvalidArgument",
        ErrorIds.PARAMETER_SET_CONFLICT,
        `Parameter set cannot be resolved: --archive-path cannot be used with ${conflicting.join(", ")}.`,
      );
    }
    return {
      mode: "archive",
      configurationPath,
      archivePath: opts.archivePath,
      force: opts.force,
    };
  }

  const fromFlags: StorageSettings = {
    connectionString: opts.connectionString,
    accountName: opts.accountName,
    accountKey: opts.accountKey,
    sasToken: opts.sasToken,
    endpointSuffix: opts.endpointSuffix,
  };

  return {
    mode: "upload",
    configurationPath,
    containerName: opts.container,
    storage: toStorageContext(fromFlags, settings.storage),
    force: opts.force,
  };
}

/**
 * Ask on the terminal before the side-effecting step. Anything but y/yes
 * declines, and so does input that ends before an answer.
 */
export function createPromptConfirm(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): ConfirmHandler {
  return async (action) => {
    const rl = readline.createInterface({ input, output });
    try {
      const answer = await new Promise<string | undefined>((resolve) => {
        rl.once("close", () => resolve(undefined));
        rl.question(
          `${action.description}\n  Target: ${action.target}\nContinue? [y/N] `,
          resolve,
        );
      });
      return answer !== undefined && /^y(es)?$/i.test(answer.trim());
    } finally {
      rl.close();
    }
  };
}

export function registerPublishCommand(program: Command): void {
  program
    .command("publish <configurationPath>")
    .description(
      "Package a DSC configuration with its modules into a ZIP archive and upload it or save it locally",
    )
    .option("--archive-path <path>", "Write the archive to this local path instead of uploading")
    .option("--container <name>", "Blob container to upload to")
    .option("--connection-string <cs>", "Storage account connection string")
    .option("--account-name <name>", "Storage account name")
    .option("--account-key <key>", "Storage account key")
    .option("--sas-token <token>", "Shared access signature for the storage account")
    .option("--endpoint-suffix <suffix>", "Storage endpoint suffix (default: core.windows.net)")
    .option("--force", "Overwrite an existing archive or blob", false)
    .option("--what-if", "Show what would be published without doing it", false)
    .option("-y, --yes", "Do not ask for confirmation", false)
    .option("--verbose", "Show detailed output", false)
    .action(async (configurationPath: string, opts: PublishCommandOptions) => {
      let settings: CliSettings;
      let request: PublishRequest;
      try {
        settings = resolveSettings();
        request = buildPublishRequest(configurationPath, opts, settings);
      } catch (err: unknown) {
        process.exit(reportCommandError(err));
      }

      const verbose = opts.verbose || isDebugMode();
      const engine = new PublishEngine(getEngineOptions(settings, verbose));

      const name = path.basename(configurationPath);
      if (opts.whatIf) {
        printWhatIf(`What if: publishing ${name}`);
      } else {
        printHeader(`Publishing ${colors.file(name)}`);
      }

      // Wire up progress display. A stage is checked off once the next
      // one starts; the last one waits until the run is known to succeed.
      const spinner = createSpinner("Starting...");
      let pendingStage: PublishState | undefined;

      engine.on((event: EngineEvent) => {
        const data = event.data;
        if ("state" in data) {
          const state = data.state;
          const done = pendingStage ? STAGE_DONE[pendingStage] : undefined;
          if (state === "FAILED" || state === "SKIPPED") {
            pendingStage = undefined;
          } else if (done && state !== "CLEANING_UP") {
            spinner.stop();
            printStageSuccess(done);
            spinner.start();
            pendingStage = undefined;
          }
          if (STAGE_DONE[state]) {
            pendingStage = state;
          }

          const stageMsg = STAGE_MESSAGES[state];
          if (stageMsg) {
            spinner.text = stageMsg;
          }
          printDebug(`state: ${state}`);
          return;
        }

        spinner.stop();
        if (event.type === "warning") {
          printWarn(data.message);
        } else if (data.message.startsWith("What if:")) {
          printWhatIf(data.message);
        } else {
          printDebug(data.message);
        }
        spinner.start();
      });

      const confirm: ConfirmHandler | undefined = opts.yes
        ? undefined
        : async (action) => {
            spinner.stop();
            const approved = await createPromptConfirm()(action);
            spinner.start();
            return approved;
          };

      spinner.start();
      const startTime = Date.now();

      let result: PublishResult;
      try {
        result = await engine.publish(request, {
          what_if: opts.whatIf,
          confirm,
        });
      } catch (err: unknown) {
        spinner.stop();
        printBlank();
        process.exit(reportCommandError(err));
      }

      spinner.stop();
      process.exitCode = printPublishResult(result, Date.now() - startTime);
    });
}

/**
 * Print the outcome of a run.
 *
 * @returns Exit code for the process
 */
export function printPublishResult(result: PublishResult, elapsed: number): number {
  printBlank();

  if (result.final_state === "COMPLETED") {
    if (result.blob_url) {
      printSuccess(
        `Published to ${colors.url(result.blob_url)} in ${formatDuration(elapsed)}`,
      );
    } else if (result.archive) {
      printSuccess(
        `Created ${colors.file(result.archive.path)} (${formatBytes(result.archive.size_bytes)}) in ${formatDuration(elapsed)}`,
      );
    }
    const modules = Object.keys(result.required_modules);
    if (modules.length > 0) {
      printDetail("Modules", modules.join(", "));
    }
    if (result.archive) {
      printDetail("SHA-256", result.archive.sha256);
    }
    return 0;
  }

  if (result.final_state === "SKIPPED") {
    printInfo(
      result.what_if ? "Nothing was changed (--what-if)." : "Cancelled; nothing was changed.",
    );
    return 0;
  }

  printError(`Failed to publish ${colors.file(result.configuration_path)}`);
  if (result.error) {
    printDetail("Reason", formatErrorCategory(result.error.category));
    printDetail("Details", result.error.message);
    printDetail("Stage", formatState(result.error.state));

    if (
      result.error.error_id === ErrorIds.FILE_ALREADY_EXISTS ||
      result.error.error_id === ErrorIds.BLOB_ALREADY_EXISTS
    ) {
      printBlank();
      printInfo(`Use ${colors.bold("--force")} to overwrite it.`);
    }
  }
  return 1;
}
