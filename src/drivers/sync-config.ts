import { homedir } from 'os';
import { join } from 'path';
import { DEFAULT_PACKAGE_PATH_PREFIX } from '../core/name-extractor.js';
import { DEFAULT_ORPHAN_MARKER } from '../core/orphan-filter.js';
import { DEFAULT_PAGE_SIZE } from '../core/paginator.js';
import { SyncConfigSchema, type SyncConfig, type SyncConfigOverrides } from '../types/sync-config.js';
import { LogLevel, parseLogLevel } from '../utils/logger.js';

export const DEFAULT_SEARCH_URL = 'https://aur.archlinux.org/packages?SeB=nd&K=&SB=n&SO=a&PP=250';
export const DEFAULT_OFFSET_PARAM = 'O';
export const DEFAULT_USER_AGENT = 'pkglist-sync/0.1';

export function defaultDataDir(): string {
  return join(homedir(), '.local', 'share', 'pkglist-sync');
}

function envNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

/**
 * Build the immutable run configuration. Precedence, lowest first:
 * built-in defaults, environment, explicit overrides (CLI flags).
 * Throws with every validation issue listed when the result is invalid.
 */
export function resolveSyncConfig(
  overrides: SyncConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): SyncConfig {
  const dataDir = overrides.dataDir ?? env.PKGLIST_DATA_DIR ?? defaultDataDir();
  const listFile = overrides.listFile ?? join(dataDir, 'packages.txt');

  const candidate = {
    searchUrl: overrides.searchUrl ?? env.PKGLIST_SEARCH_URL ?? DEFAULT_SEARCH_URL,
    offsetParam: overrides.offsetParam ?? DEFAULT_OFFSET_PARAM,
    pageSize: overrides.pageSize ?? envNumber(env.PKGLIST_PAGE_SIZE) ?? DEFAULT_PAGE_SIZE,
    orphanMarker: overrides.orphanMarker ?? DEFAULT_ORPHAN_MARKER,
    packagePathPrefix: DEFAULT_PACKAGE_PATH_PREFIX,
    dataDir,
    listFile,
    backupFile: `${listFile}.bak`,
    // Beside the list so the commit rename never crosses filesystems
    scratchDir: `${listFile}.tmp`,
    logFile: overrides.logFile ?? join(dataDir, 'pkglist-sync.log'),
    notify: overrides.notify ?? true,
    logLevel: overrides.logLevel ?? (env.LOG_LEVEL ? parseLogLevel(env.LOG_LEVEL) : LogLevel.NORMAL),
    userAgent: DEFAULT_USER_AGENT
  };

  const parsed = SyncConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  return Object.freeze(parsed.data);
}
