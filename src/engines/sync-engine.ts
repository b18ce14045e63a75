import { extractNames } from '../core/name-extractor.js';
import { removeOrphanBlocks } from '../core/orphan-filter.js';
import { fetchAll, fetchCount } from '../core/paginator.js';
import { createUrlBuilder, getBaseUrl } from '../core/utils/url-utils.js';
import type { RunReporter } from '../drivers/run-report.js';
import type { Fetcher } from '../providers/http-fetcher.js';
import { CommitManager, TxState, type CommitFileSystem, type RunOutcome } from '../services/commit-manager.js';
import type { PackageList } from '../types/package-list.js';
import { RunStatus, fail, ok, type FailureStatus, type StageResult } from '../types/run-status.js';
import type { SyncConfig } from '../types/sync-config.js';
import { errorMessage } from '../utils/error-handlers.js';
import { formatTime, logger } from '../utils/logger.js';

const log = logger.createContext('sync-engine');

export interface SyncEngineDeps {
  fetcher: Fetcher;
  reporter: RunReporter;
  fileSystem?: CommitFileSystem;
}

export interface SyncStats {
  totalCount: number;
  pagesFetched: number;
  linesScanned: number;
  orphanLinesRemoved: number;
}

// Status a thrown error maps to, by the stage that was running
interface Progress {
  failureStatus: FailureStatus;
}

export interface SyncResult {
  status: RunStatus;
  packages: PackageList;
  stats: SyncStats;
  duration: number;
}

/**
 * Runs one sync: back up, fetch every page, drop orphan entries, extract
 * names, commit. Every path ends in CommitManager.rollbackAndFinish.
 */
export class SyncEngine {
  constructor(
    private readonly config: SyncConfig,
    private readonly deps: SyncEngineDeps
  ) {}

  async run(): Promise<SyncResult> {
    const startTime = Date.now();
    const stats: SyncStats = { totalCount: 0, pagesFetched: 0, linesScanned: 0, orphanLinesRemoved: 0 };
    const tx = new CommitManager(
      {
        listFile: this.config.listFile,
        backupFile: this.config.backupFile,
        scratchDir: this.config.scratchDir
      },
      this.deps.reporter,
      this.deps.fileSystem
    );

    log.normal(`Syncing package list from ${getBaseUrl(this.config.searchUrl)}`);
    log.verbose(`  List file: ${this.config.listFile}`);
    log.verbose(`  Page size: ${this.config.pageSize}`);
    log.verbose(`  Orphan marker: "${this.config.orphanMarker}"`);

    const progress: Progress = { failureStatus: RunStatus.ScratchCreateFailed };
    let result: StageResult<PackageList>;
    try {
      result = await this.pipeline(tx, stats, progress);
    } catch (error) {
      log.error('Sync run aborted', errorMessage(error));
      result = fail(progress.failureStatus, errorMessage(error));
    }
    const outcome: RunOutcome = result.success
      ? { status: RunStatus.Success, packages: result.value.length }
      : { status: result.status, error: result.error };
    const status = await tx.rollbackAndFinish(outcome);

    const duration = Date.now() - startTime;
    log.verbose(`Run finished in ${formatTime(duration)}`);

    return {
      status,
      packages: result.success ? result.value : [],
      stats,
      duration
    };
  }

  private async pipeline(
    tx: CommitManager,
    stats: SyncStats,
    progress: Progress
  ): Promise<StageResult<PackageList>> {
    const began = await tx.begin();
    if (!began.success) return began;

    const urlBuilder = createUrlBuilder(this.config.searchUrl, this.config.offsetParam);

    progress.failureStatus = RunStatus.CountFetchFailed;
    const counted = await fetchCount(this.deps.fetcher, urlBuilder);
    if (!counted.success) return counted;
    stats.totalCount = counted.value.totalCount;
    log.normal(`Catalog reports ${stats.totalCount} package(s)`);

    progress.failureStatus = RunStatus.PageFetchFailed;
    const fetched = await fetchAll(this.deps.fetcher, stats.totalCount, this.config.pageSize, urlBuilder);
    if (!fetched.success) return fetched;
    stats.pagesFetched = fetched.value.size;
    tx.advance(TxState.Fetched);
    // Nothing past here can produce a new list
    progress.failureStatus = RunStatus.ListWriteFailed;

    const lines = fetched.value.toLines();
    const filtered = removeOrphanBlocks(lines, this.config.orphanMarker);
    stats.linesScanned = lines.length;
    stats.orphanLinesRemoved = lines.length - filtered.length;
    log.verbose(`Removed ${stats.orphanLinesRemoved} orphan line(s) of ${lines.length}`);
    tx.advance(TxState.Filtered);

    const packages = extractNames(filtered, this.config.packagePathPrefix);
    log.normal(`Extracted ${packages.length} package name(s)`);
    tx.advance(TxState.Extracted);

    const committed = await tx.commit(packages);
    if (!committed.success) return committed;

    return ok(packages);
  }
}
