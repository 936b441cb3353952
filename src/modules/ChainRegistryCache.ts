import { RegistryUnavailableError } from '@/types/errors';
import { chainRecordSchema, registryCacheFileSchema, type ChainRecord } from '@/types/types';
import { describeError } from '@/utils/common/describeError';
import { logger } from '@/utils/common/log';
import { err, ok, type Result } from 'neverthrow';
import { readFile, writeFile } from 'node:fs/promises';

type CacheEntry = {
  /** @notice Milliseconds since the epoch */
  fetchedAt: number;
  payload: ChainRecord[];
};

/**
 * @title ChainRegistryCache
 * @notice Time-bounded cache of the public chain registry
 * @dev Concurrent misses share a single refresh. An expired entry is never served: when the
 * refresh fails the call fails.
 */
class ChainRegistryCache {
  private sourceUrl: string;
  private cacheDurationMs: number;
  private timeoutMs: number;
  private cacheFile?: string;
  private fetchFn: typeof fetch;
  private now: () => number;
  private entry?: CacheEntry;
  private refreshing?: Promise<ChainRecord[]>;

  constructor({
    sourceUrl,
    cacheDurationMs,
    timeoutMs,
    cacheFile,
    fetchFn = fetch,
    now = Date.now,
  }: {
    sourceUrl: string;
    cacheDurationMs: number;
    timeoutMs: number;
    /** @notice Optional file mirroring the cache across restarts */
    cacheFile?: string;
    fetchFn?: typeof fetch;
    now?: () => number;
  }) {
    this.sourceUrl = sourceUrl;
    this.cacheDurationMs = cacheDurationMs;
    this.timeoutMs = timeoutMs;
    this.cacheFile = cacheFile;
    this.fetchFn = fetchFn;
    this.now = now;
  }

  /**
   * @notice Returns the registry records, fetching them when the cache is empty or expired
   * @throws RegistryUnavailableError if a fetch is needed and fails
   */
  async get(): Promise<ChainRecord[]> {
    if (this.entry && this.isFresh(this.entry)) {
      return this.entry.payload;
    }

    if (!this.refreshing) {
      this.refreshing = this.refresh().finally(() => {
        this.refreshing = undefined;
      });
    }
    return this.refreshing;
  }

  private isFresh(entry: CacheEntry) {
    return this.now() - entry.fetchedAt < this.cacheDurationMs;
  }

  private async refresh() {
    const mirrored = await this.readMirror();
    if (mirrored && this.isFresh(mirrored)) {
      logger.debug({ file: this.cacheFile }, 'Chain registry loaded from cache file');
      this.entry = mirrored;
      return mirrored.payload;
    }

    const fetchedAt = this.now();
    const payload = await this.fetchRegistry();
    this.entry = { fetchedAt, payload };
    logger.info({ chains: payload.length }, 'Chain registry fetched');

    const written = await this.writeMirror(this.entry);
    if (written.isErr()) {
      logger.warn(
        { file: this.cacheFile, err: written.error.message },
        'Failed to write chain registry cache file',
      );
    }
    return payload;
  }

  private async fetchRegistry() {
    let response: Response;
    try {
      response = await this.fetchFn(this.sourceUrl, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new RegistryUnavailableError(describeError(error));
    }
    if (!response.ok) {
      throw new RegistryUnavailableError(`HTTP ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new RegistryUnavailableError('response is not valid JSON');
    }
    if (!Array.isArray(body)) {
      throw new RegistryUnavailableError('response is not a JSON array');
    }
    return parseRecords(body);
  }

  private async readMirror(): Promise<CacheEntry | undefined> {
    if (!this.cacheFile) return undefined;

    try {
      const raw = await readFile(this.cacheFile, 'utf-8');
      const parsed = registryCacheFileSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) return undefined;
      return { fetchedAt: parsed.data.timestamp * 1000, payload: parseRecords(parsed.data.data) };
    } catch {
      // missing or unreadable mirror: fall through to a fetch
      return undefined;
    }
  }

  private async writeMirror(entry: CacheEntry): Promise<Result<void, Error>> {
    if (!this.cacheFile) return ok();

    try {
      await writeFile(
        this.cacheFile,
        JSON.stringify({ timestamp: entry.fetchedAt / 1000, data: entry.payload }),
        'utf-8',
      );
      return ok();
    } catch (error) {
      return err(error instanceof Error ? error : new Error(String(error)));
    }
  }
}

/**
 * @notice Keeps the registry entries that match the record schema
 */
function parseRecords(items: unknown[]) {
  const records: ChainRecord[] = [];
  for (const item of items) {
    const parsed = chainRecordSchema.safeParse(item);
    if (parsed.success) records.push(parsed.data);
  }
  return records;
}

export default ChainRegistryCache;
