import { err } from 'neverthrow';
import EndpointPool from '../../../src/modules/EndpointPool';
import {
  DuplicateEndpointError,
  EndpointUnreachableError,
  InvalidInputError,
  NoBackupAvailableError,
  NoPrimaryConfiguredError,
  NotConfiguredError,
} from '../../../src/types/errors';
import { fakePersist, fakeProber } from '../../helpers/fakes';

function createPool({ maxBackups = 2, unhealthy = [] }: { maxBackups?: number; unhealthy?: string[] } = {}) {
  const { prober, check } = fakeProber(unhealthy);
  const persist = fakePersist();
  const pool = new EndpointPool({ maxBackups, probeTimeoutMs: 1000, prober, persist });
  return { pool, check, persist };
}

describe('EndpointPool', () => {
  it('should reject a negative backup limit', () => {
    const { prober } = fakeProber();
    expect(
      () => new EndpointPool({ maxBackups: -1, probeTimeoutMs: 1000, prober, persist: fakePersist() }),
    ).toThrow(InvalidInputError);
  });

  describe('hydrate', () => {
    it('should deduplicate and truncate without persisting', () => {
      const { pool, persist } = createPool();
      pool.hydrate({ 1: ['http://a.io', 'http://a.io', 'http://b.io', 'http://c.io', 'http://d.io'] });

      expect(pool.get(1)).toEqual(['http://a.io', 'http://b.io', 'http://c.io']);
      expect(persist).not.toHaveBeenCalled();
    });

    it('should list pools ordered by chain ID', () => {
      const { pool } = createPool();
      pool.hydrate({ 10: ['http://x.io'], 1: ['http://y.io'] });

      expect(pool.list()).toEqual([
        { chainId: 1, endpoints: ['http://y.io'] },
        { chainId: 10, endpoints: ['http://x.io'] },
      ]);
    });
  });

  describe('setPrimary', () => {
    it('should probe the endpoint and make it primary', async () => {
      const { pool, check, persist } = createPool();

      await expect(pool.setPrimary(1, ' http://a.io ')).resolves.toEqual(['http://a.io']);
      expect(check).toHaveBeenCalledWith('http://a.io', 1, 1000);
      expect(persist).toHaveBeenCalledTimes(1);
    });

    it('should leave the pool untouched when the probe fails', async () => {
      const { pool, persist } = createPool({ unhealthy: ['http://a.io'] });

      await expect(pool.setPrimary(1, 'http://a.io')).rejects.toThrow(EndpointUnreachableError);
      expect(pool.get(1)).toBeUndefined();
      expect(persist).not.toHaveBeenCalled();
    });

    it('should reject invalid URLs before probing', async () => {
      const { pool, check } = createPool();

      await expect(pool.setPrimary(1, 'ftp://a.io')).rejects.toThrow(InvalidInputError);
      expect(check).not.toHaveBeenCalled();
    });

    it('should move an existing endpoint to the front', async () => {
      const { pool } = createPool();
      pool.hydrate({ 1: ['http://a.io', 'http://b.io'] });

      await expect(pool.setPrimary(1, 'http://b.io')).resolves.toEqual(['http://b.io', 'http://a.io']);
    });

    it('should drop the tail of a full pool', async () => {
      const { pool } = createPool();
      pool.hydrate({ 1: ['http://a.io', 'http://b.io', 'http://c.io'] });

      await expect(pool.setPrimary(1, 'http://d.io')).resolves.toEqual([
        'http://d.io',
        'http://a.io',
        'http://b.io',
      ]);
    });
  });

  describe('addBackup', () => {
    it('should append a healthy backup', async () => {
      const { pool, persist } = createPool();
      pool.hydrate({ 1: ['http://a.io'] });

      await expect(pool.addBackup(1, 'http://b.io')).resolves.toEqual(['http://a.io', 'http://b.io']);
      expect(persist).toHaveBeenCalledTimes(1);
    });

    it('should require a primary first', async () => {
      const { pool, check } = createPool();

      await expect(pool.addBackup(1, 'http://b.io')).rejects.toThrow(NoPrimaryConfiguredError);
      expect(check).not.toHaveBeenCalled();
    });

    it('should reject an endpoint already in the pool and leave the pool unchanged', async () => {
      const { pool, check, persist } = createPool();
      await pool.setPrimary(1, 'http://x');

      await expect(pool.addBackup(1, 'http://x')).rejects.toThrow(DuplicateEndpointError);
      expect(pool.get(1)).toEqual(['http://x']);
      expect(check).toHaveBeenCalledTimes(1);
      expect(persist).toHaveBeenCalledTimes(1);
    });

    it('should reject an unhealthy backup', async () => {
      const { pool } = createPool({ unhealthy: ['http://b.io'] });
      pool.hydrate({ 1: ['http://a.io'] });

      await expect(pool.addBackup(1, 'http://b.io')).rejects.toThrow(
        'RPC URL http://b.io is unreachable or does not serve chain ID 1: not connected',
      );
      expect(pool.get(1)).toEqual(['http://a.io']);
    });

    it('should evict the last backup of a full pool and keep the primary', async () => {
      const { pool } = createPool();
      pool.hydrate({ 1: ['http://a.io', 'http://b.io', 'http://c.io'] });

      await expect(pool.addBackup(1, 'http://d.io')).resolves.toEqual([
        'http://a.io',
        'http://b.io',
        'http://d.io',
      ]);
    });

    it('should refuse backups when none are allowed', async () => {
      const { pool } = createPool({ maxBackups: 0 });
      await pool.setPrimary(1, 'http://a.io');

      await expect(pool.addBackup(1, 'http://b.io')).rejects.toThrow(InvalidInputError);
      await expect(pool.setPrimary(1, 'http://b.io')).resolves.toEqual(['http://b.io']);
    });
  });

  describe('rotate', () => {
    it('should move the primary to the tail', async () => {
      const { pool, check } = createPool();
      pool.hydrate({ 1: ['http://a.io', 'http://b.io', 'http://c.io'] });

      await expect(pool.rotate(1)).resolves.toEqual(['http://b.io', 'http://c.io', 'http://a.io']);
      expect(check).not.toHaveBeenCalled();
    });

    it('should restore the starting order after a full cycle', async () => {
      const { pool } = createPool();
      pool.hydrate({ 1: ['http://a.io', 'http://b.io', 'http://c.io'] });

      for (let i = 0; i < 3; i++) await pool.rotate(1);

      expect(pool.get(1)).toEqual(['http://a.io', 'http://b.io', 'http://c.io']);
    });

    it('should fail without a pool or without backups', async () => {
      const { pool } = createPool();
      await expect(pool.rotate(1)).rejects.toThrow(NoBackupAvailableError);

      pool.hydrate({ 1: ['http://a.io'] });
      await expect(pool.rotate(1)).rejects.toThrow(NoBackupAvailableError);
    });
  });

  describe('remove', () => {
    it('should delete the pool', async () => {
      const { pool, persist } = createPool();
      pool.hydrate({ 1: ['http://a.io'] });

      await pool.remove(1);

      expect(pool.get(1)).toBeUndefined();
      expect(pool.snapshot()).toEqual({});
      expect(persist).toHaveBeenCalledTimes(1);
      await expect(pool.remove(1)).rejects.toThrow(NotConfiguredError);
    });
  });

  it('should keep the in-memory state when persisting fails', async () => {
    const { prober } = fakeProber();
    const persist = jest.fn(async () => err(new Error('disk full')));
    const pool = new EndpointPool({ maxBackups: 2, probeTimeoutMs: 1000, prober, persist });

    await expect(pool.setPrimary(1, 'http://a.io')).resolves.toEqual(['http://a.io']);
    expect(pool.get(1)).toEqual(['http://a.io']);
  });

  it('should promote through a chain handle without probing', async () => {
    const { pool, check, persist } = createPool();
    pool.hydrate({ 1: ['http://a.io', 'http://b.io', 'http://c.io'] });

    await pool.withChain(1, async ({ endpoints, promote }) => {
      expect(endpoints).toEqual(['http://a.io', 'http://b.io', 'http://c.io']);
      await promote('http://c.io');
    });

    expect(pool.get(1)).toEqual(['http://c.io', 'http://a.io', 'http://b.io']);
    expect(check).not.toHaveBeenCalled();
    expect(persist).toHaveBeenCalledTimes(1);
  });
});
