/**
 * dscpack Engine — Temporary Resource Tracker Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { TempResourceTracker, deleteDirectory, deleteFile } from "../src/cleanup";
import { CleanupFailure } from "../src/types";
import { createLogger } from "../src/utils/logger";
import { listTree, makeTempDir } from "./helpers";

const logger = createLogger();

let root: string;

beforeEach(() => {
  root = makeTempDir("dscpack-cleanup");
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(root, { recursive: true, force: true });
});

function permissionError(code: "EPERM" | "EACCES"): NodeJS.ErrnoException {
  const err: NodeJS.ErrnoException = new Error(`${code}: operation not permitted`);
  err.code = code;
  return err;
}

function modeOf(target: string): number {
  return fs.statSync(target).mode & 0o777;
}

describe("TempResourceTracker", () => {
  it("creates temp directories under its root", async () => {
    const tracker = new TempResourceTracker(logger, root);
    const dir = await tracker.createTempDirectory();

    expect(path.dirname(dir)).toBe(root);
    expect(fs.statSync(dir).isDirectory()).toBe(true);
    expect(tracker.pending).toEqual([dir]);
  });

  it("deletes files first, then directories, newest first", async () => {
    const tracker = new TempResourceTracker(logger, root);
    const first = await tracker.createTempDirectory();
    const second = await tracker.createTempDirectory();
    const fileA = path.join(first, "a.txt");
    const fileB = path.join(second, "b.txt");
    fs.writeFileSync(fileA, "a");
    fs.writeFileSync(fileB, "b");
    tracker.registerFile(fileA);
    tracker.registerFile(fileB);

    const report = await tracker.release();

    expect(report.deleted).toEqual([fileB, fileA, second, first]);
    expect(report.failed).toEqual([]);
    expect(listTree(root)).toEqual([]);
  });

  it("attempts each path once", async () => {
    const tracker = new TempResourceTracker(logger, root);
    await tracker.createTempDirectory();

    const first = await tracker.release();
    const second = await tracker.release();

    expect(first.deleted).toHaveLength(1);
    expect(second).toEqual({ deleted: [], failed: [] });
    expect(tracker.pending).toEqual([]);
  });

  it("counts an already deleted path as deleted", async () => {
    const tracker = new TempResourceTracker(logger, root);
    const gone = path.join(root, "gone.txt");
    tracker.registerFile(gone);

    const report = await tracker.release();
    expect(report.deleted).toEqual([gone]);
  });

  it("reports failures without throwing", async () => {
    const tracker = new TempResourceTracker(logger, root);
    // A directory registered as a file cannot be unlinked
    const dir = path.join(root, "not-a-file");
    fs.mkdirSync(dir);
    tracker.registerFile(dir);
    const failures: CleanupFailure[] = [];

    const report = await tracker.release((failure) => failures.push(failure));

    expect(report.deleted).toEqual([]);
    expect(report.failed).toHaveLength(1);
    expect(report.failed[0].path).toBe(dir);
    expect(failures).toEqual(report.failed);
  });
});

describe("deleteFile / deleteDirectory", () => {
  it("deletes a read-only file", async () => {
    const file = path.join(root, "locked.txt");
    fs.writeFileSync(file, "locked");
    fs.chmodSync(file, 0o444);

    await deleteFile(file);
    expect(fs.existsSync(file)).toBe(false);
  });

  it("deletes a tree containing read-only entries", async () => {
    const dir = path.join(root, "module");
    fs.mkdirSync(path.join(dir, "DSCResources"), { recursive: true });
    const nested = path.join(dir, "DSCResources", "Bar.psm1");
    fs.writeFileSync(nested, "x");
    fs.chmodSync(nested, 0o444);

    await deleteDirectory(dir);
    expect(fs.existsSync(dir)).toBe(false);
  });

  it("clears the read-only bits and retries when unlink is refused", async () => {
    const dir = path.join(root, "locked-dir");
    fs.mkdirSync(dir);
    const file = path.join(dir, "locked.txt");
    fs.writeFileSync(file, "locked");
    fs.chmodSync(file, 0o444);
    fs.chmodSync(dir, 0o555);
    const unlink = vi.spyOn(fs.promises, "unlink").mockRejectedValueOnce(permissionError("EACCES"));

    await deleteFile(file);

    expect(unlink).toHaveBeenCalledTimes(2);
    expect(fs.existsSync(file)).toBe(false);
    expect(modeOf(dir)).toBe(0o755);
  });

  it("walks a read-only tree depth-first when rm is refused", async () => {
    const stage = path.join(root, "stage");
    const resources = path.join(stage, "Foo", "DSCResources");
    fs.mkdirSync(resources, { recursive: true });
    fs.writeFileSync(path.join(resources, "Bar.psm1"), "x");
    fs.writeFileSync(path.join(stage, "demo.ps1"), "configuration Demo {}");
    fs.chmodSync(path.join(resources, "Bar.psm1"), 0o444);
    fs.chmodSync(resources, 0o555);
    const rm = vi.spyOn(fs.promises, "rm").mockRejectedValueOnce(permissionError("EPERM"));

    await deleteDirectory(stage);

    expect(rm).toHaveBeenCalledTimes(1);
    expect(fs.existsSync(stage)).toBe(false);
  });

  it("unlinks symlinks in the tree without touching their targets", async () => {
    const outside = path.join(root, "installed.psm1");
    fs.writeFileSync(outside, "installed module");
    fs.chmodSync(outside, 0o444);

    const stage = path.join(root, "stage");
    const locked = path.join(stage, "Foo");
    fs.mkdirSync(locked, { recursive: true });
    fs.symlinkSync(outside, path.join(locked, "Linked.psm1"));
    fs.symlinkSync(path.join(root, "missing.psm1"), path.join(stage, "Dangling.psm1"));
    fs.chmodSync(locked, 0o555);
    vi.spyOn(fs.promises, "rm").mockRejectedValueOnce(permissionError("EPERM"));

    await deleteDirectory(stage);

    expect(fs.existsSync(stage)).toBe(false);
    expect(fs.readFileSync(outside, "utf-8")).toBe("installed module");
    expect(modeOf(outside)).toBe(0o444);
  });

  it("ignores a directory that does not exist", async () => {
    await expect(deleteDirectory(path.join(root, "absent"))).resolves.toBeUndefined();
  });
});
