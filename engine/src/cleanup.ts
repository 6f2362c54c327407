/**
 * dscpack Engine — Temporary Resource Tracking
 *
 * Each publish run owns one tracker. Every temp file and directory the run
 * creates is registered here and deleted by release(), whatever the
 * outcome of the run.
 *
 * Deletion order: files first, then directories, each in reverse order of
 * registration. A path is attempted once; a delete that fails on
 * permissions is retried after clearing the read-only bit. Failures are
 * reported, never thrown.
 */

import * as crypto from "crypto";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { CleanupFailure, CleanupReport } from "./types";
import { Logger } from "./utils/logger";

export type CleanupFailureHandler = (failure: CleanupFailure) => void;

export class TempResourceTracker {
  private files: string[] = [];
  private directories: string[] = [];

  constructor(
    private logger: Logger,
    private tempRoot: string = os.tmpdir(),
  ) {}

  /**
   * Create a uniquely named directory under the temp root and register it.
   */
  async createTempDirectory(): Promise<string> {
    const dir = path.join(this.tempRoot, crypto.randomUUID());
    await fs.promises.mkdir(dir, { recursive: true });
    this.registerDirectory(dir);
    this.logger.info({ dir }, `Created temporary folder ${dir}`);
    return dir;
  }

  registerFile(filePath: string): void {
    this.files.push(filePath);
  }

  registerDirectory(dirPath: string): void {
    this.directories.push(dirPath);
  }

  /** Paths still waiting for release(), files first */
  get pending(): string[] {
    return [...this.files, ...this.directories];
  }

  /**
   * Delete everything registered so far. Safe to call more than once;
   * later calls only see paths registered after the previous release.
   */
  async release(onFailure?: CleanupFailureHandler): Promise<CleanupReport> {
    const report: CleanupReport = { deleted: [], failed: [] };
    const files = [...this.files].reverse();
    const directories = [...this.directories].reverse();
    this.files = [];
    this.directories = [];

    const attempt = async (
      target: string,
      remove: (p: string) => Promise<void>,
    ): Promise<void> => {
      try {
        await remove(target);
        report.deleted.push(target);
        this.logger.info({ path: target }, `Deleted ${target}`);
      } catch (err: unknown) {
        const failure = {
          path: target,
          message: err instanceof Error ? err.message : String(err),
        };
        report.failed.push(failure);
        this.logger.warn(
          { path: target, error: failure.message },
          `Failed to delete ${target}`,
        );
        onFailure?.(failure);
      }
    };

    for (const file of files) {
      await attempt(file, deleteFile);
    }
    for (const dir of directories) {
      await attempt(dir, deleteDirectory);
    }

    return report;
  }
}

// ─── Deletion helpers ─────────────────────────────────────────

function isPermissionError(err: unknown): boolean {
  if (!err || typeof err !== "object" || !("code" in err)) return false;
  return err.code === "EPERM" || err.code === "EACCES";
}

function isMissing(err: unknown): boolean {
  return (
    !!err && typeof err === "object" && "code" in err && err.code === "ENOENT"
  );
}

/**
 * Delete a file. On a permission failure, clear the read-only bit and try
 * once more. A file that is already gone counts as deleted.
 */
export async function deleteFile(filePath: string): Promise<void> {
  try {
    await fs.promises.unlink(filePath);
  } catch (err: unknown) {
    if (isMissing(err)) return;
    if (!isPermissionError(err)) throw err;
    await deleteReadOnlyFile(filePath);
  }
}

async function deleteReadOnlyFile(filePath: string): Promise<void> {
  // lstat and no chmod on links: chmod follows them out of the temp tree
  const stats = await fs.promises.lstat(filePath);
  if (!stats.isSymbolicLink() && (stats.mode & 0o200) === 0) {
    await fs.promises.chmod(filePath, stats.mode | 0o200);
  }
  // The containing directory may be the read-only one
  const parent = path.dirname(filePath);
  const parentStats = await fs.promises.lstat(parent);
  if (parentStats.isDirectory() && (parentStats.mode & 0o200) === 0) {
    await fs.promises.chmod(parent, parentStats.mode | 0o700);
  }
  await fs.promises.unlink(filePath);
}

/**
 * Delete a directory tree. On a permission failure, walk the tree
 * depth-first clearing read-only bits and delete it entry by entry.
 */
export async function deleteDirectory(dirPath: string): Promise<void> {
  try {
    await fs.promises.rm(dirPath, { recursive: true });
  } catch (err: unknown) {
    if (isMissing(err)) return;
    if (!isPermissionError(err)) throw err;
    await deleteReadOnlyDirectory(dirPath);
  }
}

async function deleteReadOnlyDirectory(dirPath: string): Promise<void> {
  const stats = await fs.promises.lstat(dirPath);
  if (stats.isSymbolicLink()) {
    await fs.promises.unlink(dirPath);
    return;
  }
  if ((stats.mode & 0o700) !== 0o700) {
    await fs.promises.chmod(dirPath, stats.mode | 0o700);
  }

  const entries = await fs.promises.readdir(dirPath, { withFileTypes: true });
  for (const entry of entries) {
    const child = path.join(dirPath, entry.name);
    if (entry.isDirectory()) {
      await deleteReadOnlyDirectory(child);
    }
  }
  // Links report isDirectory() false and are unlinked, not followed
  for (const entry of entries) {
    if (!entry.isDirectory()) {
      await deleteReadOnlyFile(path.join(dirPath, entry.name));
    }
  }

  await fs.promises.rmdir(dirPath);
}
