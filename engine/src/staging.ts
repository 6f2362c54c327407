/**
 * dscpack Engine — Staging Directory
 *
 * Assembles the archive layout in a fresh temp directory:
 *
 *   <staging>/
 *     <configuration file>
 *     <ModuleA>/...      full tree of the installed module
 *     <ModuleB>/...
 */

import * as fs from "fs";
import * as path from "path";
import { TempResourceTracker } from "./cleanup";
import { ModuleResolver } from "./modules/resolver";
import { Logger } from "./utils/logger";

export interface StagingOptions {
  configurationPath: string;
  /** Modules to copy, PSDesiredStateConfiguration already removed */
  modules: Map<string, string | null>;
  resolver: ModuleResolver;
  tracker: TempResourceTracker;
  logger: Logger;
}

/**
 * @returns Path of the staging directory (registered with the tracker)
 */
export async function buildStagingDirectory(
  options: StagingOptions,
): Promise<string> {
  const { configurationPath, modules, resolver, tracker, logger } = options;

  const stagingDir = await tracker.createTempDirectory();

  const configurationName = path.basename(configurationPath);
  const configurationDestination = path.join(stagingDir, configurationName);
  logger.info(
    { from: configurationPath, to: configurationDestination },
    `Copying ${configurationPath} to ${configurationDestination}`,
  );
  await fs.promises.copyFile(configurationPath, configurationDestination);

  for (const [name, version] of modules) {
    const moduleFolder = await resolver.resolve(name, version);
    const destination = path.join(stagingDir, name);
    logger.info(
      { module: name, version, from: moduleFolder, to: destination },
      `Copying module ${name} to ${stagingDir}`,
    );
    await fs.promises.cp(moduleFolder, destination, { recursive: true });
  }

  return stagingDir;
}
