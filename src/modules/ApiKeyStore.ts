import { type PersistFn } from '@/modules/EndpointPool';
import { ApiKeyNotFoundError, InvalidInputError } from '@/types/errors';
import { type StoredApiKey } from '@/types/types';
import { describeError } from '@/utils/common/describeError';
import { KeyedMutex } from '@/utils/common/keyedMutex';
import { logger } from '@/utils/common/log';
import { maskSecret } from '@/utils/common/mask';
import { type SecretCipher } from '@/utils/crypto/encryption';

const STORE_LOCK = 'api-keys';

/**
 * @title ApiKeyStore
 * @notice Provider name to API key mapping, encrypted at rest when a cipher is configured
 * @dev Provider names are trimmed and lower-cased. Secrets are held decrypted in memory only.
 */
class ApiKeyStore {
  private keys = new Map<string, string>();
  /** @notice Encrypted entries this process cannot read, written back as loaded */
  private sealed = new Map<string, { ciphertext: string }>();
  private loadedEncryption?: { salt: string };
  private lock = new KeyedMutex<string>();
  private cipher?: SecretCipher;
  private persist: PersistFn;

  constructor({ cipher, persist }: { cipher?: SecretCipher; persist: PersistFn }) {
    this.cipher = cipher;
    this.persist = persist;
  }

  /**
   * @notice Loads previously persisted keys, without flushing
   * @dev Encrypted entries that cannot be decrypted are unusable but kept sealed, so a later
   * save writes them back unchanged together with the salt they were loaded with
   */
  hydrate(stored: Record<string, StoredApiKey>, encryption?: { salt: string }) {
    this.keys.clear();
    this.sealed.clear();
    this.loadedEncryption = encryption;
    for (const [provider, value] of Object.entries(stored)) {
      const name = normalizeProvider(provider);
      if (typeof value === 'string') {
        this.keys.set(name, value);
        continue;
      }
      if (!this.cipher) {
        logger.warn({ provider }, 'Encrypted API key unavailable: no encryption password configured');
        this.sealed.set(name, value);
        continue;
      }
      try {
        this.keys.set(name, this.cipher.decrypt(value.ciphertext));
      } catch (error) {
        logger.warn({ provider, err: describeError(error) }, 'API key failed to decrypt');
        this.sealed.set(name, value);
      }
    }
  }

  async set(provider: string, secret: string) {
    const name = normalizeProvider(provider);
    const value = secret.trim();
    if (!value) throw new InvalidInputError('API key must not be empty');

    await this.lock.runExclusive(STORE_LOCK, async () => {
      this.keys.set(name, value);
      this.sealed.delete(name);
      await this.flush();
    });
    return name;
  }

  get(provider: string) {
    return this.keys.get(normalizeProvider(provider));
  }

  /**
   * @throws ApiKeyNotFoundError if no key is stored for `provider`
   */
  async remove(provider: string) {
    const name = normalizeProvider(provider);

    await this.lock.runExclusive(STORE_LOCK, async () => {
      if (!this.keys.has(name) && !this.sealed.has(name)) throw new ApiKeyNotFoundError(name);
      this.keys.delete(name);
      this.sealed.delete(name);
      await this.flush();
    });
    return name;
  }

  /**
   * @notice Masked keys for display, ordered by provider
   */
  list() {
    return [...this.keys.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([provider, secret]) => ({ provider, masked: maskSecret(secret) }));
  }

  /**
   * @notice Keys in their on-disk form
   */
  snapshot(): Record<string, StoredApiKey> {
    const cipher = this.cipher;
    const stored: Record<string, StoredApiKey> = {};
    for (const [provider, value] of this.sealed) stored[provider] = { ...value };
    for (const [provider, secret] of this.keys) {
      stored[provider] = cipher ? { ciphertext: cipher.encrypt(secret) } : secret;
    }
    return stored;
  }

  /**
   * @notice Salt to record next to encrypted keys
   * @dev Without a cipher the salt loaded from disk is kept
   */
  encryption() {
    return this.cipher ? { salt: this.cipher.saltBase64 } : this.loadedEncryption;
  }

  private async flush() {
    const result = await this.persist();
    if (result.isErr()) {
      logger.warn({ err: result.error.message }, 'Failed to persist API keys; keeping in-memory state');
    }
  }
}

function normalizeProvider(provider: string) {
  const name = provider.trim().toLowerCase();
  if (!name) throw new InvalidInputError('Provider name must not be empty');
  return name;
}

export default ApiKeyStore;
