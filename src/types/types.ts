import { z } from 'zod';

/**
 * @notice Positive integer identifying an EVM network
 */
export type ChainId = number;

/**
 * @notice http(s) URL of an RPC endpoint
 */
export type Endpoint = string;

/**
 * @notice Outcome of a single health probe against one endpoint
 * @dev Produced per probe and never persisted
 */
export type HealthResult = {
  healthy: boolean;
  observedChainId: ChainId | null;
  latencyMs: number;
  error: string;
};

/**
 * @notice Schema for one chain in the public chain registry
 * @dev Unknown registry fields are ignored; a missing rpc list means no candidates
 */
export const chainRecordSchema = z.object({
  chainId: z.number().int().positive(),
  name: z.string().optional(),
  rpc: z.array(z.string()).default([]),
  nativeCurrency: z
    .object({
      name: z.string(),
      symbol: z.string(),
      decimals: z.number(),
    })
    .optional(),
});
export type ChainRecord = z.infer<typeof chainRecordSchema>;

/**
 * @notice Schema for the on-disk mirror of the registry
 * @dev `timestamp` is in seconds since the epoch
 */
export const registryCacheFileSchema = z.object({
  timestamp: z.number(),
  data: z.array(z.unknown()),
});

/**
 * @notice An API key as written to disk, either in plain text or encrypted
 */
export const storedApiKeySchema = z.union([z.string(), z.object({ ciphertext: z.string() })]);
export type StoredApiKey = z.infer<typeof storedApiKeySchema>;

/**
 * @notice Schema for the persisted configuration file
 * @dev Older files hold a single URL string per chain instead of a list
 */
export const configFileSchema = z.object({
  rpcs: z.record(z.union([z.string(), z.array(z.string())])).default({}),
  api_keys: z.record(storedApiKeySchema).default({}),
  encryption: z.object({ salt: z.string() }).optional(),
});
export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * @notice Normalized persisted state handed to and from the persistence gateway
 */
export type PersistedConfig = {
  pools: Record<ChainId, Endpoint[]>;
  apiKeys: Record<string, StoredApiKey>;
  encryption?: { salt: string };
};

/**
 * @notice Schema for a Sourcify files response
 */
export const sourcifyFilesSchema = z.array(
  z.object({
    path: z.string(),
    content: z.string(),
  }),
);

/**
 * @notice Schema for an Etherscan getsourcecode response
 * @dev `result` is a string (an error description) when `status` is "0"
 */
export const etherscanSourceSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
  result: z.union([z.array(z.object({ SourceCode: z.string() }).passthrough()), z.string()]),
});

/**
 * @notice ERC-20 metadata read from a token contract
 */
export type TokenInfo = {
  name: string;
  symbol: string;
  decimals: number;
  totalSupply: bigint;
};
