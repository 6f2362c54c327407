/**
 * dscpack Engine — Upload Mode
 *
 * Builds the archive in a temp folder (or takes the caller's .zip as is)
 * and uploads it to a blob container. Only the upload runs behind the
 * confirmation gate.
 */

import * as path from "path";
import {
  describeArchive,
  isZipFile,
  prepareTemporaryArchiveTarget,
} from "../archive";
import { ErrorIds, permissionDenied } from "../errors";
import { ArchiveInfo, ValidatedUploadRequest } from "../types";
import { BaseModeHandler, ModeContext, ModeOutcome } from "./base-handler";

export function uploadAction(archivePath: string): string {
  return `Upload '${archivePath}' to Azure blob storage`;
}

export class UploadModeHandler extends BaseModeHandler<ValidatedUploadRequest> {
  readonly mode = "upload" as const;

  async execute(
    request: ValidatedUploadRequest,
    context: ModeContext,
  ): Promise<ModeOutcome> {
    const { logger, tracker } = context;

    let archive: ArchiveInfo;
    let modules = new Map<string, string | null>();

    if (isZipFile(request.configurationPath)) {
      logger.info(
        { path: request.configurationPath },
        "Configuration is already an archive; uploading it as is",
      );
      archive = await describeArchive(request.configurationPath);
    } else {
      const built = await this.buildArchive(
        request.configurationPath,
        () => prepareTemporaryArchiveTarget(request.configurationPath, tracker),
        context,
      );
      archive = built.archive;
      modules = built.modules;
    }

    const container = context.blobStore.getContainer(
      request.credentials,
      request.containerName,
    );
    const blobName = path.basename(archive.path);
    const blobUrl = container.blobUrl(blobName);

    context.transition("CONFIRMING");
    const approved = await context.gate({
      description: uploadAction(archive.path),
      target: blobUrl,
    });
    if (!approved) {
      return { completed: false, archive, blob_url: blobUrl, modules };
    }

    context.transition("UPLOADING");
    await container.createIfNotExists();

    if (!request.force && (await container.exists(blobName))) {
      throw permissionDenied(
        ErrorIds.BLOB_ALREADY_EXISTS,
        `Storage blob '${blobUrl}' already exists. Use --force to overwrite it.`,
      );
    }

    await container.uploadFile(blobName, archive.path);
    logger.info({ url: blobUrl }, `Configuration published to ${blobUrl}`);

    return { completed: true, archive, blob_url: blobUrl, modules };
  }
}
