import { type RpcClientFactory } from '@/data/rpcClient';
import type ApiKeyStore from '@/modules/ApiKeyStore';
import type DiscoveryProber from '@/modules/DiscoveryProber';
import type EndpointPool from '@/modules/EndpointPool';
import type FailoverSelector from '@/modules/FailoverSelector';
import { type EndpointProber } from '@/modules/HealthChecker';
import { NoConfigurationError, RailError } from '@/types/errors';
import { type ChainId } from '@/types/types';
import { getNativeSymbol } from '@/utils/common/chainConversion';
import { describeError } from '@/utils/common/describeError';
import { logger } from '@/utils/common/log';
import { maskUrl } from '@/utils/common/mask';
import { getNativeBalance, getTokenBalance, getTokenInfo } from '@/utils/common/onChainHelpers';
import { parseChainId, parseContractAddress, parseEndpoint } from '@/utils/common/parser';
import { getSourceCode } from '@/utils/source/getSourceCode';
import { formatEther, formatUnits } from 'viem';

const ETHERSCAN_PROVIDER = 'etherscan';

/**
 * @notice Renders a failure for display
 */
export function formatError(error: unknown) {
  if (error instanceof RailError) {
    return error.hint ? `Error: ${error.message}\nHint: ${error.hint}` : `Error: ${error.message}`;
  }
  return `Error: ${describeError(error)}`;
}

/**
 * @title ChainToolkit
 * @notice Tool operations over the endpoint pools, discovery and chain reads
 * @dev Every operation resolves to display text; failures are rendered as `Error: ...` lines
 */
class ChainToolkit {
  private pool: EndpointPool;
  private selector: FailoverSelector;
  private prober: EndpointProber;
  private discovery: DiscoveryProber;
  private apiKeys: ApiKeyStore;
  private createClient: RpcClientFactory;
  private rpcTimeoutMs: number;
  private sourcifyUrl: string;
  private etherscanUrl: string;
  private etherscanApiKey?: string;
  private fetchFn: typeof fetch;

  constructor({
    pool,
    selector,
    prober,
    discovery,
    apiKeys,
    createClient,
    rpcTimeoutMs,
    sourcifyUrl,
    etherscanUrl,
    etherscanApiKey,
    fetchFn = fetch,
  }: {
    pool: EndpointPool;
    selector: FailoverSelector;
    prober: EndpointProber;
    discovery: DiscoveryProber;
    apiKeys: ApiKeyStore;
    createClient: RpcClientFactory;
    rpcTimeoutMs: number;
    sourcifyUrl: string;
    etherscanUrl: string;
    /** @notice Used when no etherscan key is stored */
    etherscanApiKey?: string;
    fetchFn?: typeof fetch;
  }) {
    this.pool = pool;
    this.selector = selector;
    this.prober = prober;
    this.discovery = discovery;
    this.apiKeys = apiKeys;
    this.createClient = createClient;
    this.rpcTimeoutMs = rpcTimeoutMs;
    this.sourcifyUrl = sourcifyUrl;
    this.etherscanUrl = etherscanUrl;
    this.etherscanApiKey = etherscanApiKey;
    this.fetchFn = fetchFn;
  }

  async setRpc(chainId: number | string, rpcUrl: string) {
    return this.run('setRpc', async () => {
      const id = parseChainId(chainId);
      const endpoints = await this.pool.setPrimary(id, rpcUrl);
      return `Success: RPC URL for chain ID ${id} set to ${maskUrl(endpoints[0])}`;
    });
  }

  async setBackupRpc(chainId: number | string, rpcUrl: string) {
    return this.run('setBackupRpc', async () => {
      const id = parseChainId(chainId);
      const endpoint = parseEndpoint(rpcUrl);
      const endpoints = await this.pool.addBackup(id, endpoint);
      return (
        `Success: Backup RPC added for chain ID ${id}: ${maskUrl(endpoint)} ` +
        `(${endpoints.length} RPCs configured)`
      );
    });
  }

  async rotateRpc(chainId: number | string) {
    return this.run('rotateRpc', async () => {
      const id = parseChainId(chainId);
      const endpoints = await this.pool.rotate(id);
      return `Success: Rotated RPCs for chain ID ${id}. New primary: ${maskUrl(endpoints[0])}`;
    });
  }

  async deleteRpc(chainId: number | string) {
    return this.run('deleteRpc', async () => {
      const id = parseChainId(chainId);
      await this.pool.remove(id);
      return `Success: RPC configuration for chain ID ${id} deleted`;
    });
  }

  async listConfigs() {
    const lines = ['=== RPC Configurations ==='];
    const pools = this.pool.list();
    if (pools.length === 0) lines.push('No RPCs configured');
    for (const { chainId, endpoints } of pools) {
      lines.push(`Chain ${chainId}:`);
      endpoints.forEach((endpoint, index) => {
        lines.push(`  ${index === 0 ? 'Primary' : `Backup ${index}`}: ${maskUrl(endpoint)}`);
      });
    }

    lines.push('', '=== API Keys ===');
    const keys = this.apiKeys.list();
    if (keys.length === 0) lines.push('No API keys configured');
    for (const { provider, masked } of keys) {
      lines.push(`${provider}: ${masked}`);
    }
    return lines.join('\n');
  }

  /**
   * @notice Probes every endpoint of a chain without reordering the pool
   */
  async checkRpcHealth(chainId: number | string) {
    return this.run('checkRpcHealth', async () => {
      const id = parseChainId(chainId);
      const endpoints = this.pool.get(id);
      if (!endpoints) throw new NoConfigurationError(id);

      const results = await Promise.all(
        endpoints.map(endpoint => this.prober.check(endpoint, id, this.rpcTimeoutMs)),
      );

      const lines = [`=== RPC Health for Chain ${id} ===`];
      results.forEach((result, index) => {
        const role = index === 0 ? 'Primary' : `Backup ${index}`;
        const status = result.healthy
          ? `✓ Healthy (${result.latencyMs}ms)`
          : `✗ Unhealthy (${result.error})`;
        lines.push(`${role}: ${maskUrl(endpoints[index])} - ${status}`);
      });
      return lines.join('\n');
    });
  }

  async queryRpcUrls(chainId: number | string) {
    return this.run('queryRpcUrls', async () => {
      const endpoints = await this.discovery.discover(parseChainId(chainId));
      return endpoints.join('\n');
    });
  }

  async checkNativeBalance(chainId: number | string, address: string) {
    return this.run('checkNativeBalance', async () => {
      const id = parseChainId(chainId);
      const account = parseContractAddress(address);
      const rpcClient = await this.connect(id);
      const balance = await getNativeBalance({ address: account, rpcClient });
      return `${formatEther(balance)} ${getNativeSymbol(id)}`;
    });
  }

  async getTokenBalance(chainId: number | string, tokenAddress: string, ownerAddress: string) {
    return this.run('getTokenBalance', async () => {
      const id = parseChainId(chainId);
      const token = parseContractAddress(tokenAddress);
      const owner = parseContractAddress(ownerAddress);
      const rpcClient = await this.connect(id);
      const { balance, decimals } = await getTokenBalance({
        address: owner,
        tokenAddress: token,
        rpcClient,
      });
      return `Balance: ${formatUnits(balance, decimals)} (raw: ${balance}, decimals: ${decimals})`;
    });
  }

  async getTokenInfo(chainId: number | string, tokenAddress: string) {
    return this.run('getTokenInfo', async () => {
      const id = parseChainId(chainId);
      const token = parseContractAddress(tokenAddress);
      const rpcClient = await this.connect(id);
      const info = await getTokenInfo({ tokenAddress: token, rpcClient });
      return [
        'Token Information:',
        `Address: ${token}`,
        `Name: ${info.name}`,
        `Symbol: ${info.symbol}`,
        `Decimals: ${info.decimals}`,
        `Total Supply: ${formatUnits(info.totalSupply, info.decimals)}`,
      ].join('\n');
    });
  }

  async getSourceCode(chainId: number | string, address: string) {
    return this.run('getSourceCode', async () => {
      const id = parseChainId(chainId);
      const contract = parseContractAddress(address);
      const source = await getSourceCode({
        chainId: id,
        address: contract,
        sourcifyUrl: this.sourcifyUrl,
        etherscanUrl: this.etherscanUrl,
        etherscanApiKey: this.apiKeys.get(ETHERSCAN_PROVIDER) ?? this.etherscanApiKey,
        timeoutMs: this.rpcTimeoutMs,
        fetchFn: this.fetchFn,
      });
      return `// Verified source from ${source.provider}\n${source.content}`;
    });
  }

  async setApiKey(provider: string, apiKey: string) {
    return this.run('setApiKey', async () => {
      const name = await this.apiKeys.set(provider, apiKey);
      return `Success: API key for ${name} saved`;
    });
  }

  async deleteApiKey(provider: string) {
    return this.run('deleteApiKey', async () => {
      const name = await this.apiKeys.remove(provider);
      return `Success: API key for ${name} deleted`;
    });
  }

  private async connect(chainId: ChainId) {
    const endpoint = await this.selector.resolve(chainId);
    return this.createClient(endpoint, this.rpcTimeoutMs);
  }

  private async run(operation: string, task: () => Promise<string>) {
    try {
      return await task();
    } catch (error) {
      if (!(error instanceof RailError)) {
        logger.error({ operation, err: describeError(error) }, 'Tool operation failed');
      }
      return formatError(error);
    }
  }
}

export default ChainToolkit;
