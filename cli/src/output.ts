/**
 * dscpack CLI -- Output Helpers
 *
 * Centralized formatting for all CLI output: colors, spinners, tables.
 * Uses chalk (v4, CommonJS compatible) for ANSI colors,
 * ora for spinners, and cli-table3 for tabular data.
 *
 * All user-visible output flows through this module.
 */

import chalk from "chalk";
import ora, { Ora } from "ora";
import Table from "cli-table3";
import { ErrorCategory, PublishError } from "@dscpack/engine";

// ─── Force UTF-8 encoding on Windows ───────────────────────
// Prevents broken characters when terminals default to legacy codepages.
if (process.platform === "win32") {
  try {
    if (process.stdout.setEncoding) process.stdout.setEncoding("utf8");
    if (process.stderr.setEncoding) process.stderr.setEncoding("utf8");
  } catch {
    /* swallow: some environments don't support setEncoding on stdout */
  }
}

// ─── Debug Mode ─────────────────────────────────────────────

let _debugMode = false;

export function setDebugMode(enabled: boolean): void {
  _debugMode = enabled;
}

export function isDebugMode(): boolean {
  return _debugMode;
}

// ─── Color Shortcuts ────────────────────────────────────────

export const colors = {
  success: chalk.green,
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.cyan,
  dim: chalk.gray,
  bold: chalk.bold,
  file: chalk.bold.white,
  url: chalk.cyan.underline,
  muted: chalk.gray,
};

// ─── Symbols (safe for Windows terminals) ───────────────────

export const symbols = {
  success: chalk.green("\u2714"), // ✔
  error: chalk.red("\u2716"), // ✖
  warn: chalk.yellow("\u26A0"), // ⚠
  info: chalk.cyan("\u2139"), // ℹ
  arrow: chalk.gray("\u2192"), // →
};

// ─── Print Helpers ──────────────────────────────────────────

export function printSuccess(msg: string): void {
  console.log(`${symbols.success} ${msg}`);
}

export function printError(msg: string): void {
  console.error(`${symbols.error} ${msg}`);
}

export function printWarn(msg: string): void {
  console.log(`${symbols.warn}  ${msg}`);
}

export function printInfo(msg: string): void {
  console.log(`${symbols.info} ${msg}`);
}

export function printWhatIf(msg: string): void {
  console.log(colors.warn(msg));
}

/**
 * Print a debug message. Only visible with --debug flag.
 */
export function printDebug(msg: string): void {
  if (_debugMode) {
    console.log(colors.muted(`  [debug] ${msg}`));
  }
}

export function printBlank(): void {
  console.log();
}

/**
 * Print an indented detail line (for sub-items under a stage).
 */
export function printDetail(label: string, value: string): void {
  console.log(`  ${colors.dim(label + ":")} ${value}`);
}

// ─── Stage Output ───────────────────────────────────────────

/**
 * Print a completed stage line with ✔ prefix.
 *
 *   ✔ Validated parameters
 *   ✔ Parsed configuration
 *   ✔ Created archive
 */
export function printStageSuccess(msg: string): void {
  console.log(`  ${symbols.success} ${msg}`);
}

export function printHeader(msg: string): void {
  console.log();
  console.log(`  ${colors.bold(msg)}`);
  console.log();
}

// ─── Spinner ────────────────────────────────────────────────

export function createSpinner(text: string): Ora {
  return ora({ text, color: "cyan" });
}

// ─── Tables ─────────────────────────────────────────────────

/**
 * Detect whether to use ASCII-only box drawing characters.
 * On Windows cmd/PowerShell without TERM set, Unicode borders corrupt.
 */
export function shouldUseAsciiBorders(): boolean {
  return process.platform === "win32" && !process.env.TERM;
}

const ASCII_BORDERS = {
  top: "-",
  "top-mid": "+",
  "top-left": "+",
  "top-right": "+",
  bottom: "-",
  "bottom-mid": "+",
  "bottom-left": "+",
  "bottom-right": "+",
  left: "|",
  "left-mid": "+",
  mid: "-",
  "mid-mid": "+",
  right: "|",
  "right-mid": "+",
  middle: "|",
};

export interface TableOptions {
  head: string[];
  rows: string[][];
}

export function printTable({ head, rows }: TableOptions): void {
  const ascii = shouldUseAsciiBorders();
  const table = new Table({
    head: head.map((h) => chalk.bold.cyan(h)),
    style: { head: [], border: ascii ? [] : ["gray"] },
    wordWrap: false,
    ...(ascii ? { chars: ASCII_BORDERS } : {}),
  });
  for (const row of rows) {
    table.push(row);
  }
  console.log(table.toString());
}

// ─── State Badge ────────────────────────────────────────────

const STATE_COLORS: Record<string, chalk.Chalk> = {
  PENDING: chalk.gray,
  VALIDATING: chalk.cyan,
  PARSING: chalk.cyan,
  STAGING: chalk.blue,
  ARCHIVING: chalk.blue,
  CONFIRMING: chalk.magenta,
  UPLOADING: chalk.yellow,
  CLEANING_UP: chalk.gray,
  COMPLETED: chalk.green,
  SKIPPED: chalk.yellow,
  FAILED: chalk.red,
};

/** Human-friendly state labels */
const STATE_LABELS: Record<string, string> = {
  PENDING: "Starting",
  VALIDATING: "Validating",
  PARSING: "Parsing configuration",
  STAGING: "Collecting modules",
  ARCHIVING: "Creating archive",
  CONFIRMING: "Confirming",
  UPLOADING: "Uploading",
  CLEANING_UP: "Cleaning up",
  COMPLETED: "Done",
  SKIPPED: "Skipped",
  FAILED: "Failed",
};

export function stateLabel(state: string): string {
  return STATE_LABELS[state] || state;
}

export function formatState(state: string): string {
  const colorFn = STATE_COLORS[state] || chalk.white;
  return colorFn(stateLabel(state));
}

// ─── Errors ─────────────────────────────────────────────────

/** Failure of a CLI command that never reached the publish engine */
export class CommandError extends Error {
  constructor(
    public readonly category: ErrorCategory,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "CommandError";
  }
}

// ─── Error Category Labels ──────────────────────────────────

const ERROR_LABELS: Record<string, string> = {
  InvalidArgument: "Invalid argument",
  InvalidOperation: "Operation failed",
  PermissionDenied: "Permission denied",
  ParserError: "Configuration script has errors",
  PreconditionFailure: "Unsupported environment",
};

export function formatErrorCategory(category: string): string {
  return ERROR_LABELS[category] || category;
}

/**
 * Report an error thrown outside the engine (argument checks, config
 * file, management API) and return the exit code to use.
 */
export function reportCommandError(err: unknown): number {
  if (err instanceof PublishError || err instanceof CommandError) {
    printError(formatErrorCategory(err.category));
    printDetail("Details", err.message);
  } else {
    printError("Unexpected error");
    printDetail("Message", err instanceof Error ? err.message : String(err));
  }

  if (isDebugMode() && err instanceof Error && err.stack) {
    console.error(err.stack);
  } else {
    printInfo(`Use ${colors.bold("--debug")} to see the full stack trace.`);
  }
  return 1;
}

// ─── Byte Formatting ────────────────────────────────────────

export function formatBytes(bytes: number): string {
  if (bytes === 0) return "0 B";
  const units = ["B", "KB", "MB", "GB"];
  const i = Math.floor(Math.log(bytes) / Math.log(1024));
  return `${(bytes / Math.pow(1024, i)).toFixed(1)} ${units[i]}`;
}

// ─── Duration ───────────────────────────────────────────────

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const mins = Math.floor(ms / 60_000);
  const secs = Math.round((ms % 60_000) / 1000);
  return `${mins}m ${secs}s`;
}
