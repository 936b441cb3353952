import { type EndpointProber } from '@/modules/HealthChecker';
import {
  DuplicateEndpointError,
  EndpointUnreachableError,
  InvalidInputError,
  NoBackupAvailableError,
  NoPrimaryConfiguredError,
  NotConfiguredError,
} from '@/types/errors';
import { type ChainId, type Endpoint } from '@/types/types';
import { KeyedMutex } from '@/utils/common/keyedMutex';
import { logger } from '@/utils/common/log';
import { parseChainId, parseEndpoint } from '@/utils/common/parser';
import { type Result } from 'neverthrow';

/**
 * @notice Writes the current state to durable storage
 */
export type PersistFn = () => Promise<Result<void, Error>>;

/**
 * @notice Access to one chain's pool while its lock is held
 */
export type ChainPoolHandle = {
  /** @notice Endpoints at the time the lock was taken, primary first */
  endpoints: readonly Endpoint[];
  /** @notice Moves `endpoint` to the primary position without probing it */
  promote(endpoint: Endpoint): Promise<void>;
};

/**
 * @title EndpointPool
 * @notice Per-chain ordered list of RPC endpoints, primary first, then backups
 * @dev Mutations for one chain are serialized; every successful mutation is flushed through `persist`.
 * Persistence failures are logged and do not fail the operation.
 */
class EndpointPool {
  private pools = new Map<ChainId, Endpoint[]>();
  private locks = new KeyedMutex<ChainId>();
  private maxBackups: number;
  private probeTimeoutMs: number;
  private prober: EndpointProber;
  private persist: PersistFn;

  constructor({
    maxBackups,
    probeTimeoutMs,
    prober,
    persist,
  }: {
    maxBackups: number;
    /** @notice Timeout for the probe run before an endpoint is accepted */
    probeTimeoutMs: number;
    prober: EndpointProber;
    persist: PersistFn;
  }) {
    if (!Number.isInteger(maxBackups) || maxBackups < 0) {
      throw new InvalidInputError(`Invalid max backups: ${maxBackups}`);
    }
    this.maxBackups = maxBackups;
    this.probeTimeoutMs = probeTimeoutMs;
    this.prober = prober;
    this.persist = persist;
  }

  /** @notice Largest number of endpoints a chain may hold */
  get maxSize() {
    return this.maxBackups + 1;
  }

  /**
   * @notice Replaces the in-memory pools with previously persisted ones, without flushing
   * @dev Duplicates are dropped and each list is truncated to the maximum size
   */
  hydrate(pools: Record<ChainId, Endpoint[]>) {
    this.pools.clear();
    for (const [key, endpoints] of Object.entries(pools)) {
      const unique = [...new Set(endpoints)].slice(0, this.maxSize);
      if (unique.length > 0) this.pools.set(Number(key), unique);
    }
  }

  /**
   * @notice Probes `endpoint` and, when healthy, makes it the primary for `chainId`
   * @dev The previous entries shift right; the tail is dropped once the pool is full
   * @returns The chain's endpoints after the update
   * @throws EndpointUnreachableError if the probe fails
   */
  async setPrimary(chainId: ChainId, endpoint: Endpoint) {
    const id = parseChainId(chainId);
    const url = parseEndpoint(endpoint);
    await this.assertHealthy(id, url);

    return this.locks.runExclusive(id, async () => {
      const current = this.pools.get(id) ?? [];
      const next = [url, ...current.filter(existing => existing !== url)].slice(0, this.maxSize);
      this.pools.set(id, next);
      await this.flush(id);
      return [...next];
    });
  }

  /**
   * @notice Probes `endpoint` and, when healthy, appends it as a backup for `chainId`
   * @dev On a full pool the last existing backup is evicted; the primary never is
   * @returns The chain's endpoints after the update
   * @throws NoPrimaryConfiguredError, DuplicateEndpointError or EndpointUnreachableError
   */
  async addBackup(chainId: ChainId, endpoint: Endpoint) {
    const id = parseChainId(chainId);
    const url = parseEndpoint(endpoint);
    if (this.maxBackups === 0) {
      throw new InvalidInputError('Backup RPCs are disabled (max backups is 0)');
    }
    this.assertCanAddBackup(id, url);
    await this.assertHealthy(id, url);

    return this.locks.runExclusive(id, async () => {
      const current = this.assertCanAddBackup(id, url);
      const kept = current.length >= this.maxSize ? current.slice(0, this.maxSize - 1) : current;
      const next = [...kept, url];
      this.pools.set(id, next);
      await this.flush(id);
      return [...next];
    });
  }

  /**
   * @notice Moves the primary to the tail and every backup one position forward
   * @dev No probe is run; this is a manual override
   * @returns The chain's endpoints after the rotation
   * @throws NoBackupAvailableError if the chain has fewer than two endpoints
   */
  async rotate(chainId: ChainId) {
    const id = parseChainId(chainId);

    return this.locks.runExclusive(id, async () => {
      const current = this.pools.get(id) ?? [];
      if (current.length < 2) throw new NoBackupAvailableError(id);

      const [primary, ...backups] = current;
      const next = [...backups, primary];
      this.pools.set(id, next);
      await this.flush(id);
      return [...next];
    });
  }

  /**
   * @notice Deletes the whole pool of `chainId`
   * @throws NotConfiguredError if the chain has no pool
   */
  async remove(chainId: ChainId) {
    const id = parseChainId(chainId);

    await this.locks.runExclusive(id, async () => {
      if (!this.pools.has(id)) throw new NotConfiguredError(id);
      this.pools.delete(id);
      await this.flush(id);
    });
  }

  /**
   * @notice Snapshot of every pool for display, ordered by chain ID
   */
  list() {
    return [...this.pools.entries()]
      .sort(([a], [b]) => a - b)
      .map(([chainId, endpoints]) => ({ chainId, endpoints: [...endpoints] }));
  }

  /**
   * @notice Copy of one chain's endpoints, or undefined when it has no pool
   */
  get(chainId: ChainId) {
    const endpoints = this.pools.get(chainId);
    return endpoints ? [...endpoints] : undefined;
  }

  /**
   * @notice Serializable copy of every pool
   */
  snapshot(): Record<ChainId, Endpoint[]> {
    return Object.fromEntries(
      [...this.pools.entries()].map(([chainId, endpoints]) => [chainId, [...endpoints]]),
    );
  }

  /**
   * @notice Runs `task` while holding the lock of `chainId`
   * @dev Used by the failover selector so a promotion is computed from the current ordering
   */
  async withChain<T>(chainId: ChainId, task: (handle: ChainPoolHandle) => Promise<T>): Promise<T> {
    const id = parseChainId(chainId);

    return this.locks.runExclusive(id, () =>
      task({
        endpoints: [...(this.pools.get(id) ?? [])],
        promote: async (endpoint: Endpoint) => {
          const current = this.pools.get(id) ?? [];
          if (current[0] === endpoint) return;
          const next = [endpoint, ...current.filter(existing => existing !== endpoint)];
          this.pools.set(id, next.slice(0, this.maxSize));
          await this.flush(id);
        },
      }),
    );
  }

  private assertCanAddBackup(chainId: ChainId, endpoint: Endpoint) {
    const current = this.pools.get(chainId);
    if (!current) throw new NoPrimaryConfiguredError(chainId);
    if (current.includes(endpoint)) throw new DuplicateEndpointError(chainId, endpoint);
    return current;
  }

  private async assertHealthy(chainId: ChainId, endpoint: Endpoint) {
    const result = await this.prober.check(endpoint, chainId, this.probeTimeoutMs);
    if (!result.healthy) {
      throw new EndpointUnreachableError(chainId, endpoint, result.error);
    }
  }

  private async flush(chainId: ChainId) {
    const result = await this.persist();
    if (result.isErr()) {
      logger.warn(
        { chainId, err: result.error.message },
        'Failed to persist RPC configuration; keeping in-memory state',
      );
    }
  }
}

export default EndpointPool;
