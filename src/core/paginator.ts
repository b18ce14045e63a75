import type { Fetcher } from '../providers/http-fetcher.js';
import type { PageRequest, UrlBuilder } from '../types/package-list.js';
import { RunStatus, fail, ok, type StageResult } from '../types/run-status.js';
import { errorMessage } from '../utils/error-handlers.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('paginator');

export const DEFAULT_PAGE_SIZE = 250;

const COUNT_PATTERN = /(\d[\d,.]*)\s+packages?\s+found/i;

/**
 * Ordered, append-only page bodies. Fragments are joined in fetch order,
 * each terminated by a newline so lines never merge across pages.
 */
export class RawCorpus {
  private readonly fragments: string[] = [];

  append(fragment: string): void {
    this.fragments.push(fragment);
  }

  get size(): number {
    return this.fragments.length;
  }

  toText(): string {
    return this.fragments
      .map(fragment => (fragment.endsWith('\n') || fragment === '' ? fragment : `${fragment}\n`))
      .join('');
  }

  toLines(): string[] {
    return splitLines(this.toText());
  }
}

/** Split text into lines, dropping the empty element after a final newline. */
export function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Parse the "<N> packages found" banner. Returns 0 when the banner is absent;
 * throws a RangeError when the count is too large to be exact.
 */
export function parseTotalCount(body: string): number {
  const match = body.match(COUNT_PATTERN);
  if (!match) return 0;
  const digits = match[1].replace(/[,.]/g, '');
  const value = Number(digits);
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`Result count out of range: ${digits.length > 20 ? `${digits.slice(0, 20)}...` : digits}`);
  }
  return value;
}

/**
 * Number of result pages the loop requests. Always one past the exact
 * division: catalog counts can move between the count request and the page fetches.
 */
export function pageCount(totalCount: number, pageSize: number): number {
  assertPageArgs(totalCount, pageSize);
  return Math.floor(totalCount / pageSize) + 1;
}

/** Page windows in request order, produced one at a time. */
export function* pageRequests(totalCount: number, pageSize: number): Generator<PageRequest> {
  const count = pageCount(totalCount, pageSize);
  for (let index = 0; index < count; index++) {
    yield Object.freeze({ offset: (index + 1) * pageSize, pageSize });
  }
}

/**
 * Fetch offset 0 and read the total count from it. This request only sizes
 * the loop; its body is returned for logging and tests, never for the corpus.
 */
export async function fetchCount(
  fetcher: Fetcher,
  urlBuilder: UrlBuilder
): Promise<StageResult<{ totalCount: number; body: string }>> {
  const url = urlBuilder(0);
  let body: string;
  try {
    body = await fetcher.fetch(url);
  } catch (error) {
    log.error(`Count page fetch failed: ${url}`, errorMessage(error));
    return fail(RunStatus.CountFetchFailed, errorMessage(error));
  }

  let totalCount: number;
  try {
    totalCount = parseTotalCount(body);
  } catch (error) {
    log.error(`Unusable result count on ${url}`, errorMessage(error));
    return fail(RunStatus.CountFetchFailed, errorMessage(error));
  }
  if (totalCount === 0) {
    log.verbose('No result count found on first page, assuming 0');
  }
  return ok({ totalCount, body });
}

/**
 * Fetch every result page in order, one request at a time, appending each
 * body to `corpus`. Empty pages are kept. The first failure aborts the loop.
 */
export async function fetchAll(
  fetcher: Fetcher,
  totalCount: number,
  pageSize: number,
  urlBuilder: UrlBuilder,
  corpus: RawCorpus = new RawCorpus()
): Promise<StageResult<RawCorpus>> {
  const total = pageCount(totalCount, pageSize);
  log.verbose(`Fetching ${total} page(s) for ${totalCount} result(s)`);

  let index = 0;
  for (const request of pageRequests(totalCount, pageSize)) {
    index++;
    const url = urlBuilder(request.offset);
    try {
      const body = await fetcher.fetch(url);
      corpus.append(body);
      log.debug(`Page ${index}/${total} (offset ${request.offset}): ${body.length} chars`);
    } catch (error) {
      log.error(`Page fetch failed at offset ${request.offset}: ${url}`, errorMessage(error));
      return fail(RunStatus.PageFetchFailed, `offset ${request.offset}: ${errorMessage(error)}`);
    }
  }

  return ok(corpus);
}

function assertPageArgs(totalCount: number, pageSize: number): void {
  if (!Number.isInteger(totalCount) || totalCount < 0) {
    throw new RangeError(`totalCount must be a non-negative integer, got ${totalCount}`);
  }
  if (!Number.isInteger(pageSize) || pageSize <= 0) {
    throw new RangeError(`pageSize must be a positive integer, got ${pageSize}`);
  }
}
