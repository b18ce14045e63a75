import { logger } from './logger.js';

const log = logger.createContext('error-handlers');

/**
 * Transport-level failure from the Fetcher. Carries no structured detail
 * beyond the URL; callers classify it by the stage that issued the request.
 */
export class FetchError extends Error {
  constructor(
    readonly url: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'FetchError';
  }
}

/**
 * Install global process error handlers.
 * This should be called once at application startup
 */
export function installGlobalErrorHandlers(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    log.error('Unhandled Promise Rejection:', reason);
  });

  process.on('uncaughtException', (err: Error, origin: string) => {
    log.error('FATAL: Uncaught Exception:', err);
    log.error('Origin:', origin);
    // Must exit - the process is in an undefined state
    process.exit(1);
  });

  log.debug('Global error handlers installed');
}

/**
 * Normalize a caught value into a single-line message for logs and results.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return code && !error.message.includes(code) ? `${code}: ${error.message}` : error.message;
  }
  return String(error);
}
