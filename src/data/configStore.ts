import {
  configFileSchema,
  type ChainId,
  type ConfigFile,
  type Endpoint,
  type PersistedConfig,
} from '@/types/types';
import { logger } from '@/utils/common/log';
import { maskUrl } from '@/utils/common/mask';
import { isUsableEndpoint } from '@/utils/common/parser';
import { err, ok, type Result } from 'neverthrow';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * @notice Durable storage for endpoint pools and API keys
 */
export interface ConfigGateway {
  load(): Promise<Result<PersistedConfig, Error>>;
  save(config: PersistedConfig): Promise<Result<void, Error>>;
}

/**
 * @title FileConfigStore
 * @notice JSON file mirror of the pools and API keys
 * @dev Writes go through a temp file and a rename, one at a time
 */
export class FileConfigStore implements ConfigGateway {
  private pendingWrite: Promise<unknown> = Promise.resolve();

  constructor(private filePath: string) {}

  /**
   * @notice Reads the file and normalizes it
   * @dev A missing file is an empty configuration. Single-URL entries from older files become
   * one-element lists; unusable chain keys and endpoints are dropped with a warning.
   */
  async load(): Promise<Result<PersistedConfig, Error>> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        logger.info({ file: this.filePath }, 'Config file not found, starting empty');
        return ok({ pools: {}, apiKeys: {} });
      }
      return err(error instanceof Error ? error : new Error(String(error)));
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      return err(new Error(`Config file ${this.filePath} is not valid JSON: ${String(error)}`));
    }

    const parsed = configFileSchema.safeParse(json);
    if (!parsed.success) {
      return err(new Error(`Config file ${this.filePath} has an invalid shape: ${parsed.error.message}`));
    }

    return ok({
      pools: normalizePools(parsed.data.rpcs),
      apiKeys: parsed.data.api_keys,
      ...(parsed.data.encryption ? { encryption: parsed.data.encryption } : {}),
    });
  }

  /**
   * @notice Writes `config` to the file, replacing its previous content
   */
  async save(config: PersistedConfig): Promise<Result<void, Error>> {
    const file: ConfigFile = {
      rpcs: Object.fromEntries(
        Object.entries(config.pools).map(([chainId, endpoints]) => [chainId, [...endpoints]]),
      ),
      api_keys: { ...config.apiKeys },
      ...(config.encryption ? { encryption: config.encryption } : {}),
    };
    const contents = `${JSON.stringify(file, null, 2)}\n`;

    const write = this.pendingWrite.then(() => this.writeAtomically(contents));
    this.pendingWrite = write.catch(() => undefined);

    try {
      await write;
      return ok();
    } catch (error) {
      return err(error instanceof Error ? error : new Error(String(error)));
    }
  }

  private async writeAtomically(contents: string) {
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(tempPath, contents, 'utf-8');
    await rename(tempPath, this.filePath);
  }
}

function normalizePools(rpcs: Record<string, string | string[]>) {
  const pools: Record<ChainId, Endpoint[]> = {};

  for (const [key, value] of Object.entries(rpcs)) {
    const chainId = Number(key);
    if (!/^\d+$/.test(key) || !Number.isSafeInteger(chainId) || chainId <= 0) {
      logger.warn({ key }, 'Dropping persisted RPCs with an invalid chain ID');
      continue;
    }

    const endpoints: Endpoint[] = [];
    for (const endpoint of typeof value === 'string' ? [value] : value) {
      if (!isUsableEndpoint(endpoint)) {
        logger.warn({ chainId, endpoint: maskUrl(endpoint) }, 'Dropping invalid persisted RPC URL');
        continue;
      }
      if (!endpoints.includes(endpoint)) endpoints.push(endpoint);
    }
    if (endpoints.length > 0) pools[chainId] = endpoints;
  }

  return pools;
}

function isMissingFile(error: unknown) {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
