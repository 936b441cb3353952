import { type RailConfig } from '@/constants/constants';
import { FileConfigStore, type ConfigGateway } from '@/data/configStore';
import { createRpcClient, type RpcClientFactory } from '@/data/rpcClient';
import ApiKeyStore from '@/modules/ApiKeyStore';
import ChainRegistryCache from '@/modules/ChainRegistryCache';
import ChainToolkit from '@/modules/ChainToolkit';
import DiscoveryProber from '@/modules/DiscoveryProber';
import EndpointPool, { type PersistFn } from '@/modules/EndpointPool';
import FailoverSelector from '@/modules/FailoverSelector';
import HealthChecker, { type EndpointProber } from '@/modules/HealthChecker';
import { logger } from '@/utils/common/log';
import { SecretCipher } from '@/utils/crypto/encryption';

export type Rail = {
  toolkit: ChainToolkit;
  pool: EndpointPool;
  selector: FailoverSelector;
  discovery: DiscoveryProber;
  registry: ChainRegistryCache;
  apiKeys: ApiKeyStore;
};

/**
 * @notice Wires every component from the typed configuration and restores persisted state
 * @param overrides Replacements for the collaborators that reach outside the process
 * @throws Error if the persisted configuration cannot be read, so it is never overwritten
 */
export async function createRail(
  config: RailConfig,
  overrides: {
    gateway?: ConfigGateway;
    createClient?: RpcClientFactory;
    prober?: EndpointProber;
    fetchFn?: typeof fetch;
  } = {},
): Promise<Rail> {
  const gateway = overrides.gateway ?? new FileConfigStore(config.configFile);
  const createClient = overrides.createClient ?? createRpcClient;
  const prober = overrides.prober ?? new HealthChecker({ createClient });
  const fetchFn = overrides.fetchFn ?? fetch;

  const loaded = await gateway.load();
  if (loaded.isErr()) {
    logger.error({ err: loaded.error.message }, 'Failed to load persisted configuration');
    throw loaded.error;
  }
  const persisted = loaded.value;

  const cipher = config.encryptionPassword
    ? SecretCipher.fromPassword(config.encryptionPassword, persisted.encryption?.salt)
    : undefined;

  // Both stores flush the full state, so either one saving also records the other's changes.
  const persist: PersistFn = () =>
    gateway.save({
      pools: pool.snapshot(),
      apiKeys: apiKeys.snapshot(),
      encryption: apiKeys.encryption(),
    });

  const pool = new EndpointPool({
    maxBackups: config.maxBackups,
    probeTimeoutMs: config.healthCheckTimeoutMs,
    prober,
    persist,
  });
  const apiKeys = new ApiKeyStore({ cipher, persist });
  pool.hydrate(persisted.pools);
  apiKeys.hydrate(persisted.apiKeys, persisted.encryption);

  const selector = new FailoverSelector({ pool, prober, probeTimeoutMs: config.rpcTimeoutMs });
  const registry = new ChainRegistryCache({
    sourceUrl: config.chainListUrl,
    cacheDurationMs: config.cacheDurationMs,
    timeoutMs: config.registryTimeoutMs,
    cacheFile: config.cacheFile,
    fetchFn,
  });
  const discovery = new DiscoveryProber({
    registry,
    prober,
    maxCandidates: config.maxDiscoveryCandidates,
    concurrency: config.discoveryConcurrency,
    probeTimeoutMs: config.discoveryTimeoutMs,
  });

  const toolkit = new ChainToolkit({
    pool,
    selector,
    prober,
    discovery,
    apiKeys,
    createClient,
    rpcTimeoutMs: config.rpcTimeoutMs,
    sourcifyUrl: config.sourcifyUrl,
    etherscanUrl: config.etherscanUrl,
    etherscanApiKey: config.etherscanApiKey,
    fetchFn,
  });

  logger.debug(
    { chains: pool.list().length, apiKeys: apiKeys.list().length },
    'Restored persisted configuration',
  );

  return { toolkit, pool, selector, discovery, registry, apiKeys };
}
