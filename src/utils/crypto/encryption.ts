import { EncryptionError } from '@/types/errors';
import { createCipheriv, createDecipheriv, pbkdf2Sync, randomBytes } from 'node:crypto';

const KDF_ITERATIONS = 100_000;
const KEY_LENGTH = 32;
const SALT_LENGTH = 16;
const IV_LENGTH = 12;
const TAG_LENGTH = 16;
const ALGORITHM = 'aes-256-gcm';

/**
 * @notice Generates a random salt for key derivation
 */
export function generateSalt() {
  return randomBytes(SALT_LENGTH);
}

/**
 * @notice Derives a 32-byte key from a password with PBKDF2-SHA256
 * @param password The user-provided password
 * @param salt Random salt stored alongside the ciphertexts
 */
export function deriveKey(password: string, salt: Buffer) {
  return pbkdf2Sync(password, salt, KDF_ITERATIONS, KEY_LENGTH, 'sha256');
}

/**
 * @notice Encrypts `plaintext` with AES-256-GCM
 * @returns base64 of `iv || tag || ciphertext`
 */
export function encrypt(plaintext: string, key: Buffer) {
  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv(ALGORITHM, key, iv);
  const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
  return Buffer.concat([iv, cipher.getAuthTag(), ciphertext]).toString('base64');
}

/**
 * @notice Decrypts a value produced by `encrypt`
 * @throws EncryptionError if the payload is malformed or the key does not match
 */
export function decrypt(payload: string, key: Buffer) {
  const data = Buffer.from(payload, 'base64');
  if (data.length < IV_LENGTH + TAG_LENGTH) {
    throw new EncryptionError('Encrypted value is too short');
  }

  try {
    const decipher = createDecipheriv(ALGORITHM, key, data.subarray(0, IV_LENGTH));
    decipher.setAuthTag(data.subarray(IV_LENGTH, IV_LENGTH + TAG_LENGTH));
    const plaintext = Buffer.concat([
      decipher.update(data.subarray(IV_LENGTH + TAG_LENGTH)),
      decipher.final(),
    ]);
    return plaintext.toString('utf8');
  } catch {
    throw new EncryptionError('Decryption failed: wrong password or corrupted value');
  }
}

/**
 * @title SecretCipher
 * @notice Password-derived key bundled with the salt it was derived from
 */
export class SecretCipher {
  private constructor(
    private key: Buffer,
    public readonly salt: Buffer,
  ) {}

  /**
   * @notice Derives a cipher from a password
   * @param saltBase64 Salt recorded with earlier ciphertexts; a fresh salt is generated when absent
   */
  static fromPassword(password: string, saltBase64?: string) {
    if (!password) throw new EncryptionError('Encryption password must not be empty');
    const salt = saltBase64 ? Buffer.from(saltBase64, 'base64') : generateSalt();
    return new SecretCipher(deriveKey(password, salt), salt);
  }

  encrypt(plaintext: string) {
    return encrypt(plaintext, this.key);
  }

  decrypt(payload: string) {
    return decrypt(payload, this.key);
  }

  get saltBase64() {
    return this.salt.toString('base64');
  }
}
