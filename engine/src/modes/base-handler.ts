/**
 * dscpack Engine — Mode Handler Base
 *
 * One handler per publish mode ("archive", "upload"). Handlers run the
 * mode-specific part of the pipeline; validation, state bookkeeping and
 * cleanup stay in the engine.
 */

import { TempResourceTracker } from "../cleanup";
import { ConfirmationGate } from "../confirm";
import { ModuleResolver } from "../modules/resolver";
import { ConfigurationParser, parseConfiguration } from "../parser";
import { buildStagingDirectory } from "../staging";
import { BlobStore } from "../storage";
import { writeConfigurationArchive } from "../archive";
import {
  ArchiveInfo,
  PublishMode,
  PublishState,
  ValidatedRequest,
} from "../types";
import { Logger } from "../utils/logger";

export interface ModeContext {
  parser: ConfigurationParser;
  resolver: ModuleResolver;
  blobStore: BlobStore;
  /** Owns every temp path of this run */
  tracker: TempResourceTracker;
  gate: ConfirmationGate;
  logger: Logger;
  /** Record that the run entered a new state */
  transition: (state: PublishState) => void;
}

export interface ModeOutcome {
  /** False when the confirmation gate declined (or what-if) */
  completed: boolean;
  archive?: ArchiveInfo;
  blob_url?: string;
  modules: Map<string, string | null>;
}

export abstract class BaseModeHandler<R extends ValidatedRequest> {
  abstract readonly mode: PublishMode;

  abstract execute(request: R, context: ModeContext): Promise<ModeOutcome>;

  /**
   * PARSING → STAGING → ARCHIVING, shared by both modes.
   *
   * @param target - Picks the archive path once the staging directory exists
   */
  protected async buildArchive(
    configurationPath: string,
    target: () => Promise<string>,
    context: ModeContext,
  ): Promise<{ archive: ArchiveInfo; modules: Map<string, string | null> }> {
    context.transition("PARSING");
    const modules = await parseConfiguration(
      context.parser,
      configurationPath,
      context.logger,
    );

    context.transition("STAGING");
    const stagingDir = await buildStagingDirectory({
      configurationPath,
      modules,
      resolver: context.resolver,
      tracker: context.tracker,
      logger: context.logger,
    });

    context.transition("ARCHIVING");
    const archivePath = await target();
    const archive = await writeConfigurationArchive(
      stagingDir,
      archivePath,
      context.logger,
    );

    return { archive, modules };
  }
}
