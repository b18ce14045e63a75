/**
 * Terminal status of a sync run. Each member doubles as the process exit code.
 */
export enum RunStatus {
  Success = 0,
  ScratchCreateFailed = 1,
  BackupFailed = 2,
  ListWriteFailed = 3,
  CountFetchFailed = 4,
  PageFetchFailed = 5,
  LogInitFailed = 99
}

export const RUN_STATUS_MESSAGES: Record<RunStatus, string> = {
  [RunStatus.Success]: 'Package list updated',
  [RunStatus.ScratchCreateFailed]: 'Could not create the scratch directory',
  [RunStatus.BackupFailed]: 'Could not back up the existing package list',
  [RunStatus.ListWriteFailed]: 'Could not write the new package list',
  [RunStatus.CountFetchFailed]: 'Could not fetch the result count page',
  [RunStatus.PageFetchFailed]: 'Could not fetch a result page',
  [RunStatus.LogInitFailed]: 'Could not open the log file'
};

export type FailureStatus = Exclude<RunStatus, RunStatus.Success>;

/**
 * Outcome of a single pipeline stage. Failures carry the status the run
 * terminates with and a human-readable detail.
 */
export type StageResult<T> =
  | { success: true; value: T }
  | { success: false; status: FailureStatus; error: string };

export function ok<T>(value: T): StageResult<T> {
  return { success: true, value };
}

export function fail<T = never>(status: FailureStatus, error: string): StageResult<T> {
  return { success: false, status, error };
}

export function describeStatus(status: RunStatus): string {
  return RUN_STATUS_MESSAGES[status];
}
