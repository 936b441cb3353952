import { SourceNotFoundError } from '@/types/errors';
import { etherscanSourceSchema, sourcifyFilesSchema } from '@/types/types';
import { describeError } from '@/utils/common/describeError';
import { logger } from '@/utils/common/log';
import { type Address } from 'viem';

export type SourceCode = {
  provider: 'sourcify' | 'etherscan';
  content: string;
};

/**
 * @notice Fetches verified source files from Sourcify
 * @returns The files rendered one after another, or undefined when Sourcify has no full match
 */
export async function getSourcifySource({
  chainId,
  address,
  sourcifyUrl,
  timeoutMs,
  fetchFn = fetch,
}: {
  chainId: number;
  address: Address;
  sourcifyUrl: string;
  timeoutMs: number;
  fetchFn?: typeof fetch;
}) {
  const response = await fetchFn(`${sourcifyUrl.replace(/\/+$/, '')}/files/${chainId}/${address}`, {
    signal: AbortSignal.timeout(timeoutMs),
  });
  if (response.status !== 200) return undefined;

  const files = sourcifyFilesSchema.parse(await response.json());
  if (files.length === 0) return undefined;

  return files.map(file => `// File: ${file.path}\n${file.content}`).join('\n\n');
}

/**
 * @notice Fetches verified source code from the Etherscan v2 API
 * @returns The SourceCode field, or undefined when the contract is not verified there
 */
export async function getEtherscanSource({
  chainId,
  address,
  etherscanUrl,
  apiKey,
  timeoutMs,
  fetchFn = fetch,
}: {
  chainId: number;
  address: Address;
  etherscanUrl: string;
  apiKey: string;
  timeoutMs: number;
  fetchFn?: typeof fetch;
}) {
  const url = new URL(etherscanUrl);
  url.searchParams.set('chainid', String(chainId));
  url.searchParams.set('module', 'contract');
  url.searchParams.set('action', 'getsourcecode');
  url.searchParams.set('address', address);
  url.searchParams.set('apikey', apiKey);

  const response = await fetchFn(url.toString(), { signal: AbortSignal.timeout(timeoutMs) });
  const data = etherscanSourceSchema.parse(await response.json());
  if (data.status !== '1' || typeof data.result === 'string') return undefined;

  const sourceCode = data.result[0]?.SourceCode;
  return sourceCode ? sourceCode : undefined;
}

/**
 * @notice Looks up verified source code, Sourcify first and Etherscan as fallback
 * @dev Etherscan is skipped when no API key is available
 * @throws SourceNotFoundError if neither service has the contract
 */
export async function getSourceCode({
  chainId,
  address,
  sourcifyUrl,
  etherscanUrl,
  etherscanApiKey,
  timeoutMs,
  fetchFn = fetch,
}: {
  chainId: number;
  address: Address;
  sourcifyUrl: string;
  etherscanUrl: string;
  etherscanApiKey?: string;
  timeoutMs: number;
  fetchFn?: typeof fetch;
}): Promise<SourceCode> {
  try {
    const content = await getSourcifySource({ chainId, address, sourcifyUrl, timeoutMs, fetchFn });
    if (content) return { provider: 'sourcify', content };
  } catch (error) {
    logger.debug({ chainId, address, err: describeError(error) }, 'Sourcify lookup failed');
  }

  if (etherscanApiKey) {
    try {
      const content = await getEtherscanSource({
        chainId,
        address,
        etherscanUrl,
        apiKey: etherscanApiKey,
        timeoutMs,
        fetchFn,
      });
      if (content) return { provider: 'etherscan', content };
    } catch (error) {
      logger.debug({ chainId, address, err: describeError(error) }, 'Etherscan lookup failed');
    }
  }

  throw new SourceNotFoundError(chainId, address);
}
