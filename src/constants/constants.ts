import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

/** @notice Treats `VAR=` in a .env file the same as an unset variable */
const emptyToUndefined = (value: unknown) => (value === '' ? undefined : value);

const integerVar = (fallback: number, min: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().min(min).default(fallback));

const urlVar = (fallback: string) =>
  z.preprocess(emptyToUndefined, z.string().url().default(fallback));

const optionalVar = z.preprocess(emptyToUndefined, z.string().optional());

const envSchema = z.object({
  RAIL_CONFIG_FILE: z.preprocess(emptyToUndefined, z.string().default('rail_config.json')),
  RAIL_CACHE_FILE: z.preprocess(emptyToUndefined, z.string().default('chain_cache.json')),
  RAIL_CHAIN_LIST_URL: urlVar('https://chainid.network/chains.json'),
  RAIL_SOURCIFY_URL: urlVar('https://sourcify.dev/server'),
  RAIL_ETHERSCAN_URL: urlVar('https://api.etherscan.io/v2/api'),
  RAIL_MAX_BACKUPS: integerVar(2, 0),
  RAIL_RPC_TIMEOUT: integerVar(5_000, 1),
  RAIL_HEALTH_CHECK_TIMEOUT: integerVar(10_000, 1),
  RAIL_DISCOVERY_TIMEOUT: integerVar(3_000, 1),
  RAIL_REGISTRY_TIMEOUT: integerVar(10_000, 1),
  RAIL_CACHE_DURATION: integerVar(3_600, 0),
  RAIL_MAX_DISCOVERY_CANDIDATES: integerVar(10, 1),
  RAIL_DISCOVERY_CONCURRENCY: integerVar(5, 1),
  RAIL_ENCRYPTION_PASSWORD: optionalVar,
  ETHERSCAN_API_KEY: optionalVar,
});

/**
 * @notice Typed configuration read once at startup
 * @dev Timeouts are in milliseconds
 */
export type RailConfig = {
  /** @notice File mirroring endpoint pools and API keys */
  configFile: string;
  /** @notice File mirroring the chain registry cache */
  cacheFile: string;
  /** @notice Public chain registry (JSON array of chains with their RPC candidates) */
  chainListUrl: string;
  sourcifyUrl: string;
  etherscanUrl: string;
  /** @notice Backups kept per chain; a pool holds at most `maxBackups + 1` endpoints */
  maxBackups: number;
  /** @notice Probe timeout while failing over, and for chain reads */
  rpcTimeoutMs: number;
  /** @notice Probe timeout when an endpoint is added to a pool */
  healthCheckTimeoutMs: number;
  /** @notice Probe timeout for discovery candidates */
  discoveryTimeoutMs: number;
  registryTimeoutMs: number;
  /** @notice How long a fetched registry stays valid */
  cacheDurationMs: number;
  /** @notice Ceiling on candidates probed per discovery */
  maxDiscoveryCandidates: number;
  /** @notice Probes running at the same time during discovery */
  discoveryConcurrency: number;
  /** @notice When set, API keys are encrypted at rest */
  encryptionPassword?: string;
  etherscanApiKey?: string;
};

/**
 * @notice Builds the typed configuration from environment variables
 * @param env The environment to read, `process.env` by default
 * @returns The configuration with defaults applied
 * @throws Error naming every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RailConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`❌ Invalid environment variable(s): ${issues.join('; ')}`);
  }
  const vars = result.data;

  return Object.freeze({
    configFile: vars.RAIL_CONFIG_FILE,
    cacheFile: vars.RAIL_CACHE_FILE,
    chainListUrl: vars.RAIL_CHAIN_LIST_URL,
    sourcifyUrl: vars.RAIL_SOURCIFY_URL,
    etherscanUrl: vars.RAIL_ETHERSCAN_URL,
    maxBackups: vars.RAIL_MAX_BACKUPS,
    rpcTimeoutMs: vars.RAIL_RPC_TIMEOUT,
    healthCheckTimeoutMs: vars.RAIL_HEALTH_CHECK_TIMEOUT,
    discoveryTimeoutMs: vars.RAIL_DISCOVERY_TIMEOUT,
    registryTimeoutMs: vars.RAIL_REGISTRY_TIMEOUT,
    cacheDurationMs: vars.RAIL_CACHE_DURATION * 1000,
    maxDiscoveryCandidates: vars.RAIL_MAX_DISCOVERY_CANDIDATES,
    discoveryConcurrency: vars.RAIL_DISCOVERY_CONCURRENCY,
    encryptionPassword: vars.RAIL_ENCRYPTION_PASSWORD,
    etherscanApiKey: vars.ETHERSCAN_API_KEY,
  });
}
