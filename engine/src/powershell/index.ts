export {
  ProcessPowerShellRunner,
  PowerShellError,
  quotePowerShellString,
  encodePowerShellCommand,
  type PowerShellRunner,
  type ProcessPowerShellRunnerOptions,
} from "./runner";
export {
  checkPowerShellVersion,
  MIN_POWERSHELL_MAJOR_VERSION,
} from "./version";
