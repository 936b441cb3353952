import type EndpointPool from '@/modules/EndpointPool';
import { type EndpointProber } from '@/modules/HealthChecker';
import { AllEndpointsFailedError, NoConfigurationError } from '@/types/errors';
import { type ChainId, type Endpoint } from '@/types/types';
import { logger } from '@/utils/common/log';
import { maskUrl } from '@/utils/common/mask';

/**
 * @title FailoverSelector
 * @notice Picks the first healthy endpoint of a chain's pool and promotes it to primary
 */
class FailoverSelector {
  private pool: EndpointPool;
  private prober: EndpointProber;
  private probeTimeoutMs: number;

  constructor({
    pool,
    prober,
    probeTimeoutMs,
  }: {
    pool: EndpointPool;
    prober: EndpointProber;
    probeTimeoutMs: number;
  }) {
    this.pool = pool;
    this.prober = prober;
    this.probeTimeoutMs = probeTimeoutMs;
  }

  /**
   * @notice Returns a healthy endpoint for `chainId`
   * @dev Endpoints are probed strictly in pool order and the walk stops at the first healthy one.
   * A healthy backup becomes primary without being probed again. The chain's lock is held for the
   * whole walk so concurrent calls for one chain never reorder the pool from a stale view.
   * @throws NoConfigurationError if the chain has no endpoints
   * @throws AllEndpointsFailedError if every endpoint fails its probe
   */
  async resolve(chainId: ChainId): Promise<Endpoint> {
    return this.pool.withChain(chainId, async ({ endpoints, promote }) => {
      if (endpoints.length === 0) throw new NoConfigurationError(chainId);

      const probed = new Set<Endpoint>();
      const failures: { endpoint: Endpoint; error: string }[] = [];

      for (const [index, endpoint] of endpoints.entries()) {
        if (probed.has(endpoint)) continue;
        probed.add(endpoint);

        const result = await this.prober.check(endpoint, chainId, this.probeTimeoutMs);
        if (!result.healthy) {
          logger.debug({ chainId, endpoint: maskUrl(endpoint), error: result.error }, 'RPC probe failed');
          failures.push({ endpoint, error: result.error });
          continue;
        }

        if (index > 0) {
          await promote(endpoint);
          logger.warn(
            {
              chainId,
              demoted: maskUrl(endpoints[0]),
              promoted: maskUrl(endpoint),
              latencyMs: result.latencyMs,
            },
            'Primary RPC failed health check; promoted backup',
          );
        }
        return endpoint;
      }

      throw new AllEndpointsFailedError(chainId, failures);
    });
  }
}

export default FailoverSelector;
