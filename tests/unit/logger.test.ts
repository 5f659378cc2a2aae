/**
 * Unit tests for the structured logger
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Logger, isLogLevel } from '../../src/lib/logger.js';
import { VectorIndexError } from '../../src/services/vector-index/index-interface.js';
import { TransientExternalError } from '../../src/lib/errors/TasteStoreErrors.js';

function readEntries(file: string): unknown[] {
  return readFileSync(file, 'utf8')
    .trim()
    .split('\n')
    .map((line) => {
      const entry: unknown = JSON.parse(line);
      return entry;
    });
}

describe('Logger', () => {
  let logDir: string;

  beforeEach(() => {
    logDir = mkdtempSync(join(tmpdir(), 'taste-logs-'));
  });

  afterEach(() => {
    rmSync(logDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('should append general entries as JSON lines', () => {
    const logger = new Logger({ logDir, console: false });

    logger.info('Ingestion finished', { upserted: 2 });
    logger.warn('Record r1: amount "a pinch" is not numeric; stored as text');

    const entries = readEntries(join(logDir, 'general.jsonl'));
    expect(entries).toHaveLength(2);
    expect(entries[0]).toMatchObject({
      level: 'info',
      type: 'general',
      message: 'Ingestion finished',
      context: { upserted: 2 },
    });
  });

  it('should record index errors with their code', () => {
    const logger = new Logger({ logDir, console: false });

    logger.logIndexError('upsert', new TransientExternalError('upsert', 'database is locked'), { namespace: 'prod' });
    logger.logIndexError('query', new VectorIndexError('disk I/O error'));

    const entries = readEntries(join(logDir, 'index-errors.jsonl'));
    expect(entries[0]).toMatchObject({
      type: 'index_error',
      operation: 'upsert',
      namespace: 'prod',
      error_code: 'EXTERNAL_FAILURE',
      error_message: 'upsert failed: database is locked',
    });
    expect(entries[1]).toMatchObject({ error_code: 'UNKNOWN', error_message: 'disk I/O error' });
  });

  it('should record slow queries with rounded durations', () => {
    const logger = new Logger({ logDir, console: false });

    logger.logSlowQuery('find', 312.7, 250, { resultCount: 3 });

    expect(readEntries(join(logDir, 'slow-queries.jsonl'))[0]).toMatchObject({
      type: 'slow_query',
      level: 'warn',
      duration_ms: 313,
      threshold_ms: 250,
      result_count: 3,
    });
  });

  it('should only echo entries at or above the console level', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = new Logger({ consoleLevel: 'warn' });

    logger.debug('hidden');
    logger.warn('shown');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[1]).toBe('shown');
  });

  it('should not create files without a log directory', () => {
    const logger = new Logger({ console: false });
    logger.error('nowhere');

    expect(existsSync(join(process.cwd(), 'general.jsonl'))).toBe(false);
  });

  it('should recognise log levels', () => {
    expect(isLogLevel('fatal')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
  });
});
