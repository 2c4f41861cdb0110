/**
 * Durable record of archived URLs
 *
 * The JSON file is the single source of truth for "already processed" across
 * runs. Every write replaces the whole file through a temp file + rename, and
 * writes are chained so only one is ever in flight.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import type { HistoryEntry, HistoryMap, HistoryRecord } from '../types/history.types';
import { type Result, ok, err } from '../types/result';
import { ConfigError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const historyEntrySchema = z.object({
  filename: z.string(),
  sha1: z.string(),
  saved_at: z.string(),
});

const historyFileSchema = z.record(z.unknown());

export class HistoryStore {
  private map: HistoryMap = {};
  private processed = new Set<string>();
  private loaded = false;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(
    readonly filePath: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  get tempPath(): string {
    return `${this.filePath}.tmp`;
  }

  /**
   * Read the history file into memory. Must be called once before any lookup.
   * A missing file is an empty history; an unparseable one aborts the run
   * rather than being overwritten on the first record.
   */
  async load(): Promise<ReadonlySet<string>> {
    let raw: string | null = null;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (!isNotFound(error)) {
        throw new ConfigError(`Cannot read history file: ${errorMessage(error)}`, this.filePath);
      }
    }

    this.map = raw === null || raw.trim() === '' ? {} : this.parse(raw);
    this.processed = new Set(Object.keys(this.map));
    this.loaded = true;

    logger.info({ entries: this.processed.size, path: this.filePath }, 'Loaded history');
    return this.processed;
  }

  contains(url: string): boolean {
    this.assertLoaded();
    return this.processed.has(url);
  }

  get(url: string): HistoryRecord | undefined {
    this.assertLoaded();
    const entry = this.map[url];
    return entry ? toRecord(url, entry) : undefined;
  }

  get size(): number {
    return this.processed.size;
  }

  /**
   * All records, most recently saved first
   */
  entries(): HistoryRecord[] {
    return Object.entries(this.map)
      .map(([url, entry]) => toRecord(url, entry))
      .sort((a, b) => b.savedAt.getTime() - a.savedAt.getTime());
  }

  /**
   * Add a record and persist the full mapping.
   *
   * The in-memory state advances even when the write fails, so the URL is
   * skipped for the rest of this run but may be archived again next run.
   */
  async record(url: string, filename: string, fingerprint: string): Promise<Result<HistoryRecord, Error>> {
    this.assertLoaded();

    const savedAt = this.now();
    this.map[url] = { filename, sha1: fingerprint, saved_at: savedAt.toISOString() };
    this.processed.add(url);

    const write = this.writeChain.then(() => this.persist());
    this.writeChain = write.then(
      () => undefined,
      () => undefined
    );

    try {
      await write;
      return ok({ url, filename, fingerprint, savedAt });
    } catch (error) {
      logger.warn(
        { url, path: this.filePath, stage: 'persistence', error: errorMessage(error) },
        'Failed to persist history; URL treated as processed for this run only'
      );
      return err(error instanceof Error ? error : new Error(errorMessage(error)));
    }
  }

  /**
   * Wait for any queued write to finish
   */
  async flush(): Promise<void> {
    await this.writeChain;
  }

  private async persist(): Promise<void> {
    const body = JSON.stringify(this.map, null, 2);
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.tempPath, body, 'utf-8');
      await fs.rename(this.tempPath, this.filePath);
    } catch (error) {
      await this.removeTemp();
      throw error;
    }
  }

  private async removeTemp(): Promise<void> {
    try {
      await fs.unlink(this.tempPath);
    } catch (error) {
      if (!isNotFound(error)) {
        logger.debug({ path: this.tempPath, error: errorMessage(error) }, 'Could not remove temp history file');
      }
    }
  }

  private parse(raw: string): HistoryMap {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new ConfigError(`History file is not valid JSON: ${errorMessage(error)}`, this.filePath);
    }

    const file = historyFileSchema.safeParse(json);
    if (!file.success) {
      throw new ConfigError('History file must be a JSON object keyed by URL', this.filePath, file.error.issues);
    }

    const map: HistoryMap = {};
    for (const [url, value] of Object.entries(file.data)) {
      const entry = historyEntrySchema.safeParse(value);
      if (!entry.success) {
        logger.warn({ url, path: this.filePath }, 'Ignoring malformed history entry');
        continue;
      }
      map[url] = entry.data satisfies HistoryEntry;
    }
    return map;
  }

  private assertLoaded(): void {
    if (!this.loaded) {
      throw new Error('HistoryStore.load() must be called before use');
    }
  }
}

function toRecord(url: string, entry: HistoryEntry): HistoryRecord {
  return {
    url,
    filename: entry.filename,
    fingerprint: entry.sha1,
    savedAt: new Date(entry.saved_at),
  };
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
