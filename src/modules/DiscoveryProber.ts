import type ChainRegistryCache from '@/modules/ChainRegistryCache';
import { type EndpointProber } from '@/modules/HealthChecker';
import { NoReliableEndpointsError } from '@/types/errors';
import { type ChainId, type Endpoint, type HealthResult } from '@/types/types';
import { getChainName } from '@/utils/common/chainConversion';
import { describeError } from '@/utils/common/describeError';
import { logger } from '@/utils/common/log';
import { maskUrl } from '@/utils/common/mask';
import { isUsableEndpoint, parseChainId } from '@/utils/common/parser';
import { runWithConcurrency } from '@/utils/common/runWithConcurrency';

/**
 * @notice Fisher-Yates shuffle into a new array
 * @param items The items to shuffle
 * @param random Source of uniform numbers in [0, 1)
 */
export function shuffle<T>(items: readonly T[], random: () => number = Math.random) {
  const shuffled = [...items];
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }
  return shuffled;
}

/**
 * @title DiscoveryProber
 * @notice Finds working public endpoints for a chain from the chain registry
 */
class DiscoveryProber {
  private registry: Pick<ChainRegistryCache, 'get'>;
  private prober: EndpointProber;
  private maxCandidates: number;
  private concurrency: number;
  private probeTimeoutMs: number;
  private random: () => number;

  constructor({
    registry,
    prober,
    maxCandidates,
    concurrency,
    probeTimeoutMs,
    random = Math.random,
  }: {
    registry: Pick<ChainRegistryCache, 'get'>;
    prober: EndpointProber;
    maxCandidates: number;
    concurrency: number;
    probeTimeoutMs: number;
    random?: () => number;
  }) {
    this.registry = registry;
    this.prober = prober;
    this.maxCandidates = maxCandidates;
    this.concurrency = concurrency;
    this.probeTimeoutMs = probeTimeoutMs;
    this.random = random;
  }

  /**
   * @notice Lists the candidates a discovery would probe for `chainId`
   * @dev Registry entries are shuffled, filtered to http(s) URLs without template placeholders,
   * deduplicated and capped
   */
  async candidates(chainId: ChainId): Promise<Endpoint[]> {
    const id = parseChainId(chainId);
    const records = await this.registry.get();
    const raw = records.filter(record => record.chainId === id).flatMap(record => record.rpc);

    const usable = shuffle(raw, this.random)
      .map(endpoint => endpoint.trim())
      .filter(isUsableEndpoint);
    return [...new Set(usable)].slice(0, this.maxCandidates);
  }

  /**
   * @notice Probes the registry candidates for `chainId` and returns the healthy ones
   * @dev Probes run concurrently within the worker budget; results are in completion order
   * @throws RegistryUnavailableError if the registry cannot be fetched
   * @throws NoReliableEndpointsError if no candidate passes its probe
   */
  async discover(chainId: ChainId): Promise<Endpoint[]> {
    const id = parseChainId(chainId);
    const candidates = await this.candidates(id);
    if (candidates.length === 0) throw new NoReliableEndpointsError(id, 0);

    const outcomes = await runWithConcurrency(candidates, this.concurrency, async endpoint => ({
      endpoint,
      result: await this.probe(endpoint, id),
    }));

    const healthy = outcomes.filter(({ result }) => result.healthy).map(({ endpoint }) => endpoint);
    logger.info(
      { chainId: id, chain: getChainName(id), probed: candidates.length, healthy: healthy.length },
      'Endpoint discovery finished',
    );
    if (healthy.length === 0) throw new NoReliableEndpointsError(id, candidates.length);

    return healthy;
  }

  private async probe(endpoint: Endpoint, chainId: ChainId): Promise<HealthResult> {
    try {
      const result = await this.prober.check(endpoint, chainId, this.probeTimeoutMs);
      logger.debug(
        { chainId, endpoint: maskUrl(endpoint), healthy: result.healthy, error: result.error },
        'Discovery probe finished',
      );
      return result;
    } catch (error) {
      return { healthy: false, observedChainId: null, latencyMs: 0, error: describeError(error) };
    }
  }
}

export default DiscoveryProber;
