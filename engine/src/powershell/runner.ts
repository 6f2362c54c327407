/**
 * dscpack Engine — PowerShell Host
 *
 * Everything the pipeline needs from PowerShell (version check, module
 * lookup, configuration parsing) goes through a PowerShellRunner so tests
 * can substitute a fake and the executable stays configurable.
 */

import { execFile } from "child_process";
import { promisify } from "util";
import { Logger } from "../utils/logger";

const execFileAsync = promisify(execFile);

export interface PowerShellRunner {
  /** Run a script and return its trimmed standard output */
  run(script: string): Promise<string>;
}

export interface ProcessPowerShellRunnerOptions {
  /** pwsh, powershell, or an absolute path */
  executable: string;
  logger: Logger;
  /** Milliseconds before the process is killed (default 2 minutes) */
  timeout?: number;
}

export class PowerShellError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
  ) {
    super(message);
    this.name = "PowerShellError";
  }
}

/**
 * Quote a value as a PowerShell single-quoted string literal.
 * Single quotes inside the value are doubled.
 */
export function quotePowerShellString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Encode a script for -EncodedCommand (UTF-16LE, base64) so it never
 * passes through shell quoting.
 */
export function encodePowerShellCommand(script: string): string {
  return Buffer.from(script, "utf16le").toString("base64");
}

export class ProcessPowerShellRunner implements PowerShellRunner {
  private executable: string;
  private logger: Logger;
  private timeout: number;

  constructor(options: ProcessPowerShellRunnerOptions) {
    this.executable = options.executable;
    this.logger = options.logger;
    this.timeout = options.timeout ?? 120000;
  }

  async run(script: string): Promise<string> {
    const args = [
      "-NoProfile",
      "-NonInteractive",
      "-ExecutionPolicy",
      "Bypass",
      "-EncodedCommand",
      encodePowerShellCommand(script),
    ];

    this.logger.debug(
      { executable: this.executable, scriptLength: script.length },
      "Invoking PowerShell",
    );

    try {
      const { stdout } = await execFileAsync(this.executable, args, {
        windowsHide: true,
        timeout: this.timeout,
        maxBuffer: 16 * 1024 * 1024,
      });
      return stdout.trim();
    } catch (error: unknown) {
      let exitCode: number | null = null;
      let stderr = "";
      let message = "PowerShell invocation failed";

      if (error && typeof error === "object") {
        if ("code" in error && typeof error.code === "number") {
          exitCode = error.code;
        }
        if ("stderr" in error) {
          stderr = String(error.stderr).trim();
        }
        if (stderr) {
          message = stderr;
        } else if (error instanceof Error) {
          message = error.message;
        }
      }

      this.logger.debug({ exitCode, error: message }, "PowerShell failed");
      throw new PowerShellError(message, exitCode, stderr);
    }
  }
}
