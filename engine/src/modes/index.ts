/**
 * dscpack Engine — Mode Handler Registry
 *
 * The only place a publish mode is mapped to its handler.
 */

import { PublishMode, ValidatedRequest } from "../types";
import { ArchiveModeHandler } from "./archive-handler";
import { BaseModeHandler, ModeContext, ModeOutcome } from "./base-handler";
import { UploadModeHandler } from "./upload-handler";

export { BaseModeHandler } from "./base-handler";
export type { ModeContext, ModeOutcome } from "./base-handler";
export { ArchiveModeHandler, CREATE_ARCHIVE_ACTION } from "./archive-handler";
export { UploadModeHandler, uploadAction } from "./upload-handler";

type HandlerRegistry = {
  [M in PublishMode]: BaseModeHandler<Extract<ValidatedRequest, { mode: M }>>;
};

const handlers: HandlerRegistry = {
  archive: new ArchiveModeHandler(),
  upload: new UploadModeHandler(),
};

/**
 * Run the handler registered for the request's mode.
 */
export function runMode(
  request: ValidatedRequest,
  context: ModeContext,
): Promise<ModeOutcome> {
  switch (request.mode) {
    case "archive":
      return handlers.archive.execute(request, context);
    case "upload":
      return handlers.upload.execute(request, context);
  }
}
