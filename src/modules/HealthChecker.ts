import { createRpcClient } from '@/data/rpcClient';
import { type ChainId, type Endpoint, type HealthResult } from '@/types/types';
import { describeError } from '@/utils/common/describeError';
import { zeroAddress, type PublicClient } from 'viem';

/**
 * @notice The RPC calls a probe needs
 */
export type HealthProbeClient = Pick<PublicClient, 'getBlockNumber' | 'getChainId' | 'getBalance'>;

/**
 * @notice Anything able to probe an endpoint for a chain
 * @dev Implementations resolve with a result for every outcome and never reject
 */
export interface EndpointProber {
  check(endpoint: Endpoint, expectedChainId: ChainId, timeoutMs: number): Promise<HealthResult>;
}

/**
 * @title HealthChecker
 * @notice Bounded-timeout liveness and correctness probe for a single endpoint
 * @dev A probe is three sequential calls: block number (liveness), chain ID (correctness) and
 * the balance of the zero address (state is actually served). No retries.
 */
class HealthChecker implements EndpointProber {
  private createClient: (endpoint: Endpoint, timeoutMs: number) => HealthProbeClient;
  private now: () => number;

  constructor({
    createClient = createRpcClient,
    now = () => performance.now(),
  }: {
    createClient?: (endpoint: Endpoint, timeoutMs: number) => HealthProbeClient;
    now?: () => number;
  } = {}) {
    this.createClient = createClient;
    this.now = now;
  }

  /**
   * @notice Probes `endpoint` and reports whether it is live, on `expectedChainId` and serving state
   * @param endpoint The endpoint to probe
   * @param expectedChainId The chain the endpoint must report
   * @param timeoutMs Per-request timeout
   * @returns The probe outcome; latency is only measured for healthy endpoints
   */
  async check(endpoint: Endpoint, expectedChainId: ChainId, timeoutMs: number): Promise<HealthResult> {
    if (!(timeoutMs > 0) || !Number.isSafeInteger(expectedChainId) || expectedChainId <= 0) {
      return unhealthy('invalid probe parameters');
    }

    const startedAt = this.now();
    let client: HealthProbeClient;
    try {
      client = this.createClient(endpoint, timeoutMs);
      await client.getBlockNumber({ cacheTime: 0 });
    } catch {
      return unhealthy('not connected');
    }

    let observedChainId: ChainId | null = null;
    try {
      observedChainId = await client.getChainId();
      if (observedChainId !== expectedChainId) {
        return unhealthy('wrong chain id', observedChainId);
      }

      await client.getBalance({ address: zeroAddress });

      return {
        healthy: true,
        observedChainId,
        latencyMs: Math.max(0, Math.round(this.now() - startedAt)),
        error: '',
      };
    } catch (error) {
      return unhealthy(describeError(error), observedChainId);
    }
  }
}

function unhealthy(error: string, observedChainId: ChainId | null = null): HealthResult {
  return { healthy: false, observedChainId, latencyMs: 0, error };
}

export default HealthChecker;
