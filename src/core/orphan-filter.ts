export const DEFAULT_ORPHAN_MARKER = 'orphan';

/** Lines per catalog entry: the marker-bearing line plus the five after it. */
export const ENTRY_LINES = 6;

// Characters that continue a package name or path around the marker
const NAME_CHARS = String.raw`[\w.+/-]`;

/**
 * Case-insensitive matcher for `marker` standing on its own, so a package
 * such as `orphan-finder` or `/packages/lib-orphan/` is not taken for one.
 */
export function orphanMarkerPattern(marker: string): RegExp {
  const escaped = marker.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`(?<!${NAME_CHARS})${escaped}(?!${NAME_CHARS})`, 'i');
}

/**
 * Drop every entry whose block starts with a line carrying `marker`.
 * The marker line and the following `blockLines - 1` lines are removed;
 * a truncated block at the end drops what remains. Lines inside a dropped
 * block are not checked for the marker again.
 */
export function removeOrphanBlocks(
  lines: readonly string[],
  marker: string = DEFAULT_ORPHAN_MARKER,
  blockLines: number = ENTRY_LINES
): string[] {
  const pattern = orphanMarkerPattern(marker);
  const kept: string[] = [];
  let skip = 0;

  for (const line of lines) {
    if (skip > 0) {
      skip--;
      continue;
    }
    if (pattern.test(line)) {
      skip = blockLines - 1;
      continue;
    }
    kept.push(line);
  }

  return kept;
}
