import { InvalidInputError } from '@/types/errors';
import { type ChainId, type Endpoint } from '@/types/types';
import { maskAddress, maskUrl } from '@/utils/common/mask';
import { getAddress, isAddress, type Address } from 'viem';

const SUPPORTED_PROTOCOLS = new Set(['http:', 'https:']);

/**
 * @notice Parses and validates a chain ID
 * @param value Chain ID as given by the caller, either numeric or a decimal string
 * @returns The chain ID as a positive integer
 * @throws InvalidInputError if the value is not a positive safe integer
 */
export function parseChainId(value: number | string): ChainId {
  const chainId = typeof value === 'number' ? value : /^\d+$/.test(value.trim()) ? Number(value) : NaN;
  if (!Number.isSafeInteger(chainId) || chainId <= 0) {
    throw new InvalidInputError(
      `Invalid chain ID: ${String(value)}`,
      'Chain ID must be a positive integer',
    );
  }
  return chainId;
}

/**
 * @notice Explains why a string cannot be used as an RPC endpoint
 * @returns The rejection reason, or undefined when the endpoint is usable
 */
function getEndpointRejection(value: string): string | undefined {
  if (value.includes('${')) return 'contains an unresolved template placeholder';
  if (/\s/.test(value)) return 'contains whitespace';

  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    return 'is not a valid URL';
  }
  if (!SUPPORTED_PROTOCOLS.has(parsed.protocol)) return 'must start with http:// or https://';
  if (!parsed.hostname) return 'has no host';

  return undefined;
}

/**
 * @notice Checks whether a raw registry entry can be probed as an RPC endpoint
 * @param value Raw endpoint string
 */
export function isUsableEndpoint(value: string) {
  return getEndpointRejection(value) === undefined;
}

/**
 * @notice Parses an RPC endpoint URL
 * @param value The URL given by the caller
 * @returns The trimmed URL
 * @throws InvalidInputError if the URL is not http(s) or still contains a `${...}` placeholder
 */
export function parseEndpoint(value: string): Endpoint {
  const endpoint = value.trim();
  const rejection = getEndpointRejection(endpoint);
  if (rejection) {
    throw new InvalidInputError(
      `Invalid RPC URL: ${maskUrl(endpoint)} ${rejection}`,
      'URL must look like https://host[:port][/path]',
    );
  }
  return endpoint;
}

/**
 * @notice Converts a contract address string to its checksummed form
 * @param contractAddress The contract address string to parse
 * @returns Checksum encoded address
 * @throws InvalidInputError if the address is not a 0x-prefixed 20-byte hex string
 */
export function parseContractAddress(contractAddress: string): Address {
  const candidate = contractAddress.trim();
  if (!isAddress(candidate, { strict: false })) {
    throw new InvalidInputError(
      `Invalid address format: ${maskAddress(candidate)}`,
      'Address must be a valid 0x-prefixed hex string of 40 characters',
    );
  }
  return getAddress(candidate);
}
