import { createPublicClient, http, type PublicClient } from 'viem';

/**
 * @notice Creates a public RPC client bound to a single endpoint
 * @dev Retries are disabled: the failover selector decides what happens after a failed call.
 * @param endpoint The RPC endpoint URL
 * @param timeoutMs Timeout applied to every request made through the client
 */
export function createRpcClient(endpoint: string, timeoutMs: number) {
  return createPublicClient({
    transport: http(endpoint, { timeout: timeoutMs, retryCount: 0 }),
  }) as PublicClient;
}

/**
 * @notice The RPC calls made through a client: health probes and chain reads
 */
export type RpcClient = Pick<PublicClient, 'getBlockNumber' | 'getChainId' | 'getBalance' | 'readContract'>;

export type RpcClientFactory = (endpoint: string, timeoutMs: number) => RpcClient;
