/**
 * dscpack Engine — Archive Mode
 *
 * Builds the configuration archive at a caller-chosen path. The whole
 * build runs behind the confirmation gate.
 */

import { prepareLocalArchiveTarget } from "../archive";
import { ValidatedArchiveRequest } from "../types";
import { BaseModeHandler, ModeContext, ModeOutcome } from "./base-handler";

export const CREATE_ARCHIVE_ACTION = "Create configuration archive";

export class ArchiveModeHandler extends BaseModeHandler<ValidatedArchiveRequest> {
  readonly mode = "archive" as const;

  async execute(
    request: ValidatedArchiveRequest,
    context: ModeContext,
  ): Promise<ModeOutcome> {
    context.transition("CONFIRMING");
    const approved = await context.gate({
      description: CREATE_ARCHIVE_ACTION,
      target: request.archivePath,
    });
    if (!approved) {
      return { completed: false, modules: new Map() };
    }

    const { archive, modules } = await this.buildArchive(
      request.configurationPath,
      async () => prepareLocalArchiveTarget(request.archivePath, request.force),
      context,
    );

    return { completed: true, archive, modules };
  }
}
