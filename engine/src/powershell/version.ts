/**
 * dscpack Engine — PowerShell version precondition
 *
 * Import-DscResource and the DSC parser need Windows PowerShell 4 or later.
 */

import { PublishError, ErrorIds } from "../errors";
import { PowerShellRunner } from "./runner";

export const MIN_POWERSHELL_MAJOR_VERSION = 4;

/**
 * Read $PSVersionTable.PSVersion.Major from the host and fail with
 * PreconditionFailure when it is below the supported minimum.
 *
 * @returns The detected major version
 */
export async function checkPowerShellVersion(
  runner: PowerShellRunner,
): Promise<number> {
  const output = await runner.run("$PSVersionTable.PSVersion.Major");
  const major = parseInt(output, 10);
  const detected = Number.isNaN(major) ? 0 : major;

  if (detected < MIN_POWERSHELL_MAJOR_VERSION) {
    throw new PublishError(
      "PreconditionFailure",
      ErrorIds.INVALID_POWERSHELL_VERSION,
      `PowerShell ${MIN_POWERSHELL_MAJOR_VERSION} or later is required to ` +
        `publish a DSC configuration. The current version is ${detected}.`,
    );
  }

  return detected;
}
