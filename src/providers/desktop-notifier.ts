/**
 * Desktop Notifier Provider
 *
 * Best-effort notifications through `notify-send`. A missing binary or a
 * failed call is logged and otherwise ignored.
 */

import { execFile } from 'child_process';
import { promisify } from 'node:util';
import { errorMessage } from '../utils/error-handlers.js';
import { logger } from '../utils/logger.js';

const execFileAsync = promisify(execFile);
const log = logger.createContext('desktop-notifier');

export type NotificationUrgency = 'low' | 'normal' | 'critical';

export interface Notifier {
  notify(title: string, body: string, urgency: NotificationUrgency): Promise<void>;
}

export class DesktopNotifier implements Notifier {
  constructor(private readonly command: string = 'notify-send') {}

  async notify(title: string, body: string, urgency: NotificationUrgency): Promise<void> {
    try {
      await execFileAsync(this.command, ['--urgency', urgency, '--app-name', 'pkglist-sync', title, body]);
    } catch (error) {
      log.debug(`Notification not delivered: ${errorMessage(error)}`);
    }
  }
}

/** Used when notifications are switched off. */
export class SilentNotifier implements Notifier {
  async notify(): Promise<void> {}
}
