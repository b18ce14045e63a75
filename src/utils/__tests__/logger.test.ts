import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { LogLevel, formatTime, logger, parseLogLevel } from '../logger.js';

describe('logger file sink', () => {
  let dir: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    dir = await mkdtemp(join(tmpdir(), 'logger-'));
    logger.setLevel(LogLevel.NORMAL);
  });

  afterEach(async () => {
    logger.detachFile();
    logger.setLevel(LogLevel.NORMAL);
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('should append context-prefixed lines to the attached file', async () => {
    const path = join(dir, 'logs', 'run.log');
    logger.attachFile(path);

    logger.createContext('paginator').normal('fetched page');

    const contents = await readFile(path, 'utf-8');
    expect(contents).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z INFO  \[paginator\] fetched page\n$/);
    expect(logger.getFilePath()).toBe(path);
    expect(logger.readFile()).toBe(contents);
  });

  it('should append to an existing file', async () => {
    const path = join(dir, 'run.log');
    await writeFile(path, 'earlier run\n');
    logger.attachFile(path);

    logger.normal('next run');

    const lines = (await readFile(path, 'utf-8')).split('\n');
    expect(lines[0]).toBe('earlier run');
    expect(lines[1]).toMatch(/INFO  next run$/);
  });

  it('should read back only what was written since attaching', async () => {
    const path = join(dir, 'run.log');
    await writeFile(path, 'earlier run\nERROR old failure\n');
    logger.attachFile(path);

    logger.normal('this run');

    expect(logger.readFile()).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z INFO  this run\n$/);
  });

  it('should skip lines above the configured level', async () => {
    const path = join(dir, 'run.log');
    logger.attachFile(path);

    logger.debug('hidden');
    logger.setLevel(LogLevel.DEBUG);
    logger.debug('shown');

    const contents = await readFile(path, 'utf-8');
    expect(contents).not.toContain('hidden');
    expect(contents).toMatch(/DEBUG shown\n$/);
  });

  it('should record errors even in quiet mode', async () => {
    const path = join(dir, 'run.log');
    logger.attachFile(path);
    logger.setLevel(LogLevel.QUIET);

    logger.createContext('commit-manager').error('write failed', 'ENOSPC');

    expect(await readFile(path, 'utf-8')).toMatch(/ERROR \[commit-manager\] write failed ENOSPC\n$/);
    expect(console.error).not.toHaveBeenCalled();
  });

  it('should format structured data on one line', async () => {
    const path = join(dir, 'run.log');
    logger.attachFile(path);

    logger.normal('stats', undefined, { pages: 2 });

    expect(await readFile(path, 'utf-8')).toMatch(/INFO  stats \{ pages: 2 \}\n$/);
  });

  it('should stop writing once detached', async () => {
    const path = join(dir, 'run.log');
    logger.attachFile(path);
    logger.detachFile();

    logger.normal('after detach');

    expect(await readFile(path, 'utf-8')).toBe('');
    expect(logger.getFilePath()).toBeUndefined();
    expect(logger.readFile()).toBe('');
  });

  it('should throw when the file cannot be opened', async () => {
    const blocker = join(dir, 'not-a-dir');
    await writeFile(blocker, '');

    expect(() => logger.attachFile(join(blocker, 'run.log'))).toThrow();
    expect(logger.getFilePath()).toBeUndefined();
  });
});

describe('parseLogLevel', () => {
  it('should accept names and short forms', () => {
    expect(parseLogLevel('quiet')).toBe(LogLevel.QUIET);
    expect(parseLogLevel('v')).toBe(LogLevel.VERBOSE);
    expect(parseLogLevel('DEBUG')).toBe(LogLevel.DEBUG);
  });

  it('should fall back to normal', () => {
    expect(parseLogLevel(undefined)).toBe(LogLevel.NORMAL);
    expect(parseLogLevel('loud')).toBe(LogLevel.NORMAL);
  });
});

describe('formatTime', () => {
  it('should pick a unit by magnitude', () => {
    expect(formatTime(500)).toBe('500ms');
    expect(formatTime(1500)).toBe('1.5s');
    expect(formatTime(125000)).toBe('2m 5s');
  });
});
