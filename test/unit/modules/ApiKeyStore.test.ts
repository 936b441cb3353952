import ApiKeyStore from '../../../src/modules/ApiKeyStore';
import { ApiKeyNotFoundError, InvalidInputError } from '../../../src/types/errors';
import { SecretCipher } from '../../../src/utils/crypto/encryption';
import { fakePersist } from '../../helpers/fakes';

const SALT = Buffer.alloc(16, 7).toString('base64');

describe('ApiKeyStore', () => {
  it('should store keys under normalized provider names', async () => {
    const persist = fakePersist();
    const store = new ApiKeyStore({ persist });

    await expect(store.set(' Etherscan ', ' test-secret ')).resolves.toBe('etherscan');

    expect(store.get('ETHERSCAN')).toBe('test-secret');
    expect(persist).toHaveBeenCalledTimes(1);
  });

  it('should reject empty provider names and keys', async () => {
    const persist = fakePersist();
    const store = new ApiKeyStore({ persist });

    await expect(store.set('  ', 'test-secret')).rejects.toThrow(InvalidInputError);
    await expect(store.set('etherscan', '   ')).rejects.toThrow('API key must not be empty');
    expect(persist).not.toHaveBeenCalled();
  });

  it('should list masked keys ordered by provider', async () => {
    const store = new ApiKeyStore({ persist: fakePersist() });
    await store.set('polygonscan', 'test-secret-two');
    await store.set('etherscan', 'test-secret-one');
    await store.set('short', 'abc');

    expect(store.list()).toEqual([
      { provider: 'etherscan', masked: 'test...-one' },
      { provider: 'polygonscan', masked: 'test...-two' },
      { provider: 'short', masked: '***' },
    ]);
  });

  it('should remove keys and report unknown providers', async () => {
    const store = new ApiKeyStore({ persist: fakePersist() });
    await store.set('etherscan', 'test-secret');

    await expect(store.remove('Etherscan')).resolves.toBe('etherscan');
    expect(store.get('etherscan')).toBeUndefined();
    await expect(store.remove('etherscan')).rejects.toThrow(ApiKeyNotFoundError);
    await expect(store.remove('etherscan')).rejects.toThrow('No API key found for etherscan');
  });

  it('should snapshot plain keys without a cipher', async () => {
    const store = new ApiKeyStore({ persist: fakePersist() });
    await store.set('etherscan', 'test-secret');

    expect(store.snapshot()).toEqual({ etherscan: 'test-secret' });
    expect(store.encryption()).toBeUndefined();
  });

  it('should encrypt keys at rest and read them back with the same password', async () => {
    const cipher = SecretCipher.fromPassword('test-password', SALT);
    const store = new ApiKeyStore({ cipher, persist: fakePersist() });
    await store.set('etherscan', 'test-secret');

    const stored = store.snapshot();
    expect(stored.etherscan).toEqual({ ciphertext: expect.any(String) });
    expect(store.encryption()).toEqual({ salt: SALT });

    const restored = new ApiKeyStore({
      cipher: SecretCipher.fromPassword('test-password', SALT),
      persist: fakePersist(),
    });
    restored.hydrate(stored);
    expect(restored.get('etherscan')).toBe('test-secret');
  });

  it('should not expose keys it cannot decrypt', async () => {
    const store = new ApiKeyStore({
      cipher: SecretCipher.fromPassword('test-password', SALT),
      persist: fakePersist(),
    });
    await store.set('etherscan', 'test-secret');
    const stored = { ...store.snapshot(), legacy: 'test-plain' };

    const wrongPassword = new ApiKeyStore({
      cipher: SecretCipher.fromPassword('other-password', SALT),
      persist: fakePersist(),
    });
    wrongPassword.hydrate(stored);
    const noPassword = new ApiKeyStore({ persist: fakePersist() });
    noPassword.hydrate(stored);

    expect(wrongPassword.get('etherscan')).toBeUndefined();
    expect(wrongPassword.get('legacy')).toBe('test-plain');
    expect(noPassword.list()).toEqual([{ provider: 'legacy', masked: 'test...lain' }]);
  });

  it('should write undecryptable keys back unchanged with their salt', async () => {
    const stored = { etherscan: { ciphertext: 'sealed-payload' }, legacy: 'test-plain' };
    const store = new ApiKeyStore({ persist: fakePersist() });
    store.hydrate(stored, { salt: SALT });

    await store.set('polygonscan', 'test-secret');

    expect(store.snapshot()).toEqual({
      etherscan: { ciphertext: 'sealed-payload' },
      legacy: 'test-plain',
      polygonscan: 'test-secret',
    });
    expect(store.encryption()).toEqual({ salt: SALT });
  });

  it('should replace or delete an undecryptable key on request', async () => {
    const store = new ApiKeyStore({ persist: fakePersist() });
    store.hydrate(
      { etherscan: { ciphertext: 'sealed-one' }, basescan: { ciphertext: 'sealed-two' } },
      { salt: SALT },
    );

    await store.set('etherscan', 'test-secret');
    await expect(store.remove('basescan')).resolves.toBe('basescan');

    expect(store.snapshot()).toEqual({ etherscan: 'test-secret' });
    await expect(store.remove('basescan')).rejects.toThrow(ApiKeyNotFoundError);
  });
});
