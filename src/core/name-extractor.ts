import type { PackageList } from '../types/package-list.js';

export const DEFAULT_PACKAGE_PATH_PREFIX = '/packages/';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Matches an anchor pointing at a package detail page and captures its link
 * text, e.g. `<a href="/packages/foo/">foo</a>`.
 */
export function packageLinkPattern(pathPrefix: string = DEFAULT_PACKAGE_PATH_PREFIX): RegExp {
  return new RegExp(`<a\\s[^>]*?href=["']${escapeRegExp(pathPrefix)}[^"']*["'][^>]*>([^<]+)</a>`, 'i');
}

/**
 * Pull one package name per matching line, in scan order. Lines without a
 * package link are skipped. No deduplication.
 */
export function extractNames(
  lines: readonly string[],
  pathPrefix: string = DEFAULT_PACKAGE_PATH_PREFIX
): PackageList {
  const pattern = packageLinkPattern(pathPrefix);
  const names: string[] = [];

  for (const line of lines) {
    const match = line.match(pattern);
    if (match) {
      names.push(match[1]);
    }
  }

  return names;
}
