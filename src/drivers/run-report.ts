import type { Notifier } from '../providers/desktop-notifier.js';
import { RunStatus, describeStatus, fail, ok, type StageResult } from '../types/run-status.js';
import { errorMessage } from '../utils/error-handlers.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('run-report');

export interface RunReporter {
  finish(status: RunStatus, detail?: string): Promise<void>;
}

/**
 * Attach the run's log file. Any failure here is reported as the
 * pre-flight status; no run is attempted afterwards.
 */
export function openRunLog(path: string): StageResult<void> {
  try {
    logger.attachFile(path);
  } catch (error) {
    return fail(RunStatus.LogInitFailed, `${path}: ${errorMessage(error)}`);
  }
  log.debug(`Logging to ${path}`);
  return ok(undefined);
}

/**
 * Writes the terminal status to the log, surfaces the whole log on failure,
 * and sends a desktop notification either way.
 */
export class LogRunReporter implements RunReporter {
  constructor(
    private readonly notifier: Notifier,
    private readonly dump: (text: string) => void = text => {
      process.stderr.write(text);
    }
  ) {}

  async finish(status: RunStatus, detail?: string): Promise<void> {
    const message = describeStatus(status);
    const line = `Exit ${status}: ${message}${detail ? ` (${detail})` : ''}`;

    if (status === RunStatus.Success) {
      log.quiet(line);
    } else {
      log.error(line);
      const contents = logger.readFile();
      if (contents) {
        this.dump(`\n----- ${logger.getFilePath()} -----\n${contents}`);
      }
    }

    await this.notifier.notify(
      status === RunStatus.Success ? 'Package list updated' : 'Package list sync failed',
      detail ? `${message}: ${detail}` : message,
      status === RunStatus.Success ? 'low' : 'critical'
    );
  }
}
