import { copyFile, mkdir, readFile, rename, rm, stat, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import type { RunReporter } from '../drivers/run-report.js';
import type { PackageList } from '../types/package-list.js';
import { RunStatus, fail, ok, type FailureStatus, type StageResult } from '../types/run-status.js';
import { errorMessage } from '../utils/error-handlers.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('commit-manager');

export enum TxState {
  Init = 'init',
  ScratchReady = 'scratch-ready',
  BackedUp = 'backed-up',
  Fetched = 'fetched',
  Filtered = 'filtered',
  Extracted = 'extracted',
  Committed = 'committed',
  Failed = 'failed'
}

const PIPELINE_ORDER: readonly TxState[] = [
  TxState.Init,
  TxState.ScratchReady,
  TxState.BackedUp,
  TxState.Fetched,
  TxState.Filtered,
  TxState.Extracted,
  TxState.Committed
];

export type RunOutcome =
  | { status: RunStatus.Success; packages: number }
  | { status: FailureStatus; error: string };

/**
 * Filesystem operations the manager relies on. Swappable so tests can
 * inject failures at a single step.
 */
export interface CommitFileSystem {
  exists(path: string): Promise<boolean>;
  removeDir(path: string): Promise<void>;
  makeDir(path: string): Promise<void>;
  copyFile(from: string, to: string): Promise<void>;
  removeFile(path: string): Promise<void>;
  writeFile(path: string, contents: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  readFile(path: string): Promise<string>;
}

export const nodeFileSystem: CommitFileSystem = {
  async exists(path) {
    try {
      await stat(path);
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  },
  removeDir: path => rm(path, { recursive: true, force: true }),
  async makeDir(path) {
    await mkdir(path, { recursive: true });
  },
  copyFile: (from, to) => copyFile(from, to),
  removeFile: path => rm(path, { force: true }),
  writeFile: (path, contents) => writeFile(path, contents, 'utf-8'),
  rename: (from, to) => rename(from, to),
  readFile: path => readFile(path, 'utf-8')
};

export interface CommitPaths {
  listFile: string;
  backupFile: string;
  scratchDir: string;
}

export function serializeList(list: PackageList): string {
  return list.length === 0 ? '' : `${list.join('\n')}\n`;
}

export function parseList(contents: string): PackageList {
  return contents.split(/\r?\n/).filter(line => line.length > 0);
}

/** Read a persisted list; a missing file reads as an empty list. */
export async function readPackageList(
  path: string,
  fs: CommitFileSystem = nodeFileSystem
): Promise<PackageList> {
  if (!(await fs.exists(path))) return [];
  return parseList(await fs.readFile(path));
}

/**
 * Owns the live package list, its single backup and the scratch directory.
 * A run calls begin() once, commit() on success, and rollbackAndFinish()
 * exactly once whatever happened.
 */
export class CommitManager {
  private state: TxState = TxState.Init;
  private finished = false;
  // Set once the live path holds nothing the backup does not also hold
  private ownsLivePath = false;
  private restoreError: string | undefined;

  constructor(
    private readonly paths: CommitPaths,
    private readonly reporter: RunReporter,
    private readonly fs: CommitFileSystem = nodeFileSystem
  ) {}

  getState(): TxState {
    return this.state;
  }

  /**
   * Recreate the scratch directory, then move the live list aside into the
   * backup slot. Without a live list the previous backup is kept.
   */
  async begin(): Promise<StageResult<void>> {
    this.expectState(TxState.Init);

    try {
      await this.fs.removeDir(this.paths.scratchDir);
      await this.fs.makeDir(this.paths.scratchDir);
      await this.fs.makeDir(dirname(this.paths.listFile));
    } catch (error) {
      log.error(`Cannot prepare scratch directory ${this.paths.scratchDir}`, errorMessage(error));
      return this.failWith(RunStatus.ScratchCreateFailed, errorMessage(error));
    }
    this.state = TxState.ScratchReady;

    try {
      if (await this.fs.exists(this.paths.listFile)) {
        await this.fs.copyFile(this.paths.listFile, this.paths.backupFile);
        await this.fs.removeFile(this.paths.listFile);
        this.ownsLivePath = true;
        log.verbose(`Backed up ${this.paths.listFile} to ${this.paths.backupFile}`);
      } else {
        this.ownsLivePath = true;
        log.verbose(`No existing list at ${this.paths.listFile}, nothing to back up`);
      }
    } catch (error) {
      log.error(`Cannot back up ${this.paths.listFile}`, errorMessage(error));
      return this.failWith(RunStatus.BackupFailed, errorMessage(error));
    }
    this.state = TxState.BackedUp;

    return ok(undefined);
  }

  /** Record progress through the fetch/filter/extract stages. */
  advance(next: TxState.Fetched | TxState.Filtered | TxState.Extracted): void {
    const expected = PIPELINE_ORDER[PIPELINE_ORDER.indexOf(next) - 1];
    this.expectState(expected);
    this.state = next;
  }

  /**
   * Write the list into scratch, then rename it over the live path. On
   * failure the backup is put back before the error is reported.
   */
  async commit(list: PackageList): Promise<StageResult<void>> {
    this.expectState(TxState.Extracted);
    const staged = join(this.paths.scratchDir, basename(this.paths.listFile));
    this.ownsLivePath = true;

    try {
      await this.fs.writeFile(staged, serializeList(list));
      await this.fs.rename(staged, this.paths.listFile);
    } catch (error) {
      log.error(`Cannot write ${this.paths.listFile}`, errorMessage(error));
      await this.restoreBackup();
      return this.failWith(RunStatus.ListWriteFailed, errorMessage(error));
    }

    this.state = TxState.Committed;
    log.verbose(`Committed ${list.length} package(s) to ${this.paths.listFile}`);
    return ok(undefined);
  }

  /**
   * Single exit point of a run. Failures restore the backup (again, if
   * commit already did), then the outcome is reported and its status returned.
   */
  async rollbackAndFinish(outcome: RunOutcome): Promise<RunStatus> {
    if (this.finished) {
      throw new Error('rollbackAndFinish called more than once');
    }
    this.finished = true;

    if (outcome.status === RunStatus.Success) {
      this.expectState(TxState.Committed);
    } else {
      this.state = TxState.Failed;
      await this.restoreBackup();
    }

    await this.cleanupScratch();

    let detail = outcome.status === RunStatus.Success
      ? `${outcome.packages} package(s)`
      : outcome.error;
    if (this.restoreError !== undefined) {
      detail += `; backup not restored, previous list is at ${this.paths.backupFile}: ${this.restoreError}`;
    }
    await this.reporter.finish(outcome.status, detail);
    return outcome.status;
  }

  async readList(): Promise<PackageList> {
    return readPackageList(this.paths.listFile, this.fs);
  }

  async readBackup(): Promise<PackageList> {
    return readPackageList(this.paths.backupFile, this.fs);
  }

  /**
   * Put the backup back on the live path through a staged copy. With no
   * backup there is nothing to return to, so any live file is removed.
   * A live file this run never moved aside is left as it is.
   */
  private async restoreBackup(): Promise<void> {
    if (!this.ownsLivePath) {
      log.debug('Live list was never moved aside, nothing to restore');
      return;
    }
    this.restoreError = undefined;
    try {
      if (!(await this.fs.exists(this.paths.backupFile))) {
        await this.fs.removeFile(this.paths.listFile);
        log.verbose('No backup to restore, live list left absent');
        return;
      }
      const staged = `${this.paths.listFile}.restore`;
      await this.fs.copyFile(this.paths.backupFile, staged);
      await this.fs.rename(staged, this.paths.listFile);
      log.normal(`Restored ${this.paths.listFile} from backup`);
    } catch (error) {
      this.restoreError = errorMessage(error);
      log.error(`Backup restore failed, previous list is still at ${this.paths.backupFile}`, this.restoreError);
    }
  }

  private async cleanupScratch(): Promise<void> {
    try {
      await this.fs.removeDir(this.paths.scratchDir);
    } catch (error) {
      log.error(`Cannot remove scratch directory ${this.paths.scratchDir}`, errorMessage(error));
    }
  }

  private failWith<T>(status: FailureStatus, error: string): StageResult<T> {
    this.state = TxState.Failed;
    return fail(status, error);
  }

  private expectState(expected: TxState): void {
    if (this.state !== expected) {
      throw new Error(`Invalid transaction state: expected ${expected}, was ${this.state}`);
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
