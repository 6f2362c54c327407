/**
 * dscpack Engine — Configuration Archive
 *
 * Picks where the ZIP goes and writes it from the staging directory.
 */

import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";
import archiver from "archiver";
import { TempResourceTracker } from "./cleanup";
import { ErrorIds, permissionDenied } from "./errors";
import { ArchiveInfo } from "./types";
import { Logger } from "./utils/logger";

export const ZIP_EXTENSION = ".zip";

export function isZipFile(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === ZIP_EXTENSION;
}

/**
 * Resolve the archive target for archive mode: the caller's path, unless a
 * file is already there and overwriting was not requested.
 */
export function prepareLocalArchiveTarget(
  archivePath: string,
  force: boolean,
): string {
  if (!force && fs.existsSync(archivePath)) {
    throw permissionDenied(
      ErrorIds.FILE_ALREADY_EXISTS,
      `Configuration archive '${archivePath}' already exists. ` +
        `Use --force to overwrite it.`,
    );
  }
  return archivePath;
}

/**
 * Resolve the archive target for upload mode: <temp dir>/<config name>.zip.
 * Both the directory and the file are registered for cleanup.
 */
export async function prepareTemporaryArchiveTarget(
  configurationPath: string,
  tracker: TempResourceTracker,
): Promise<string> {
  const dir = await tracker.createTempDirectory();
  const archivePath = path.join(
    dir,
    path.basename(configurationPath) + ZIP_EXTENSION,
  );
  tracker.registerFile(archivePath);
  return archivePath;
}

/**
 * Write a ZIP of `sourceDir`. Entry names are the paths relative to
 * `sourceDir`, with forward slashes.
 */
export async function createArchive(
  sourceDir: string,
  archivePath: string,
): Promise<void> {
  const output = fs.createWriteStream(archivePath);
  const archive = archiver("zip", { zlib: { level: 6 } });

  const finished = new Promise<void>((resolve, reject) => {
    output.on("close", resolve);
    output.on("error", reject);
    archive.on("error", reject);
  });

  archive.pipe(output);
  archive.directory(sourceDir, false);
  await archive.finalize();
  await finished;
}

/**
 * Write the archive to `archivePath`, replacing any file already there.
 */
export async function writeConfigurationArchive(
  stagingDir: string,
  archivePath: string,
  logger: Logger,
): Promise<ArchiveInfo> {
  await fs.promises.rm(archivePath, { force: true });
  await fs.promises.mkdir(path.dirname(archivePath), { recursive: true });

  await createArchive(stagingDir, archivePath);
  const info = await describeArchive(archivePath);

  logger.info(
    { archive: archivePath, bytes: info.size_bytes },
    `Created configuration archive ${archivePath}`,
  );
  return info;
}

export async function describeArchive(archivePath: string): Promise<ArchiveInfo> {
  const stats = await fs.promises.stat(archivePath);
  const sha256 = await new Promise<string>((resolve, reject) => {
    const hash = crypto.createHash("sha256");
    const stream = fs.createReadStream(archivePath);
    stream.on("data", (chunk) => hash.update(chunk));
    stream.on("end", () => resolve(hash.digest("hex")));
    stream.on("error", reject);
  });
  return { path: archivePath, size_bytes: stats.size, sha256 };
}
