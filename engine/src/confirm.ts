/**
 * dscpack Engine — Confirmation Gate
 *
 * Side-effecting actions (writing the archive, uploading the blob) are
 * described to a gate before they run. The gate either simulates them
 * (what-if), asks the caller, or lets them through.
 */

export interface PendingAction {
  /** e.g. "Upload 'C:\\demo.ps1.zip' to Azure blob storage" */
  description: string;
  /** Path or URL the action operates on */
  target: string;
}

/** Return true to let the action run */
export type ConfirmHandler = (action: PendingAction) => Promise<boolean>;

export interface ConfirmationGateOptions {
  /** Report what would happen without doing it */
  whatIf?: boolean;
  /** Asked before every action; default approves everything */
  confirm?: ConfirmHandler;
  /** Receives the what-if line */
  report?: (message: string) => void;
}

export type ConfirmationGate = (action: PendingAction) => Promise<boolean>;

export function formatWhatIf(action: PendingAction): string {
  return `What if: Performing the operation "${action.description}" on target "${action.target}".`;
}

export function createConfirmationGate(
  options: ConfirmationGateOptions = {},
): ConfirmationGate {
  return async (action) => {
    if (options.whatIf) {
      options.report?.(formatWhatIf(action));
      return false;
    }
    if (!options.confirm) return true;
    return options.confirm(action);
  };
}
