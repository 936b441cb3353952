import * as chains from 'viem/chains';

type KnownChain = {
  id: number;
  name: string;
  nativeCurrency: { symbol: string; decimals: number };
};

function isKnownChain(value: unknown): value is KnownChain {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'number' &&
    'nativeCurrency' in value
  );
}

const chainExports: unknown[] = Object.values(chains);
const knownChains = chainExports.filter(isKnownChain);

/**
 * @notice Looks up a chain definition shipped with viem
 * @param chainId The chain ID to look up
 * @returns The chain, or undefined when viem does not know it
 */
export function getChain(chainId: number) {
  return knownChains.find(chain => chain.id === chainId);
}

/**
 * @notice Get the display name of a chain
 * @param chainId The chain ID to get name for
 * @returns The chain name, or `chain <id>` for unknown chains
 */
export function getChainName(chainId: number) {
  return getChain(chainId)?.name ?? `chain ${chainId}`;
}

/**
 * @notice Get the symbol of a chain's native currency
 * @param chainId The chain ID to get the symbol for
 * @returns The symbol, `ETH` for unknown chains
 */
export function getNativeSymbol(chainId: number) {
  return getChain(chainId)?.nativeCurrency.symbol ?? 'ETH';
}
