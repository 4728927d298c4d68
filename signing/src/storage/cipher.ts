import crypto from 'crypto';
import { IntegrityError, StorageError } from '../utils/errors';

const ALGORITHM = 'aes-256-gcm';
export const NONCE_BYTES = 12;
export const TAG_BYTES = 16;
export const KEY_BYTES = 32;

/**
 * AES-256-GCM with a fresh random nonce per payload. Sealed layout is
 * `nonce || ciphertext || tag`, so a sealed blob decrypts with the key alone.
 */
export class AesGcmCipher {
  private readonly key: Buffer;

  constructor(key: Buffer, readonly keyId: string = 'primary') {
    if (key.length !== KEY_BYTES) {
      throw new StorageError(`Encryption key must be ${KEY_BYTES} bytes`);
    }
    this.key = Buffer.from(key);
  }

  static fromHex(hexKey: string, keyId?: string): AesGcmCipher {
    if (!/^[0-9a-fA-F]{64}$/.test(hexKey)) {
      throw new StorageError('Encryption key must be 64 hex characters');
    }
    return new AesGcmCipher(Buffer.from(hexKey, 'hex'), keyId);
  }

  seal(plaintext: Buffer): Buffer {
    const nonce = crypto.randomBytes(NONCE_BYTES);
    const cipher = crypto.createCipheriv(ALGORITHM, this.key, nonce);
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
    return Buffer.concat([nonce, ciphertext, cipher.getAuthTag()]);
  }

  open(sealed: Buffer): Buffer {
    if (sealed.length < NONCE_BYTES + TAG_BYTES) {
      throw new IntegrityError('Encrypted payload is truncated');
    }

    const nonce = sealed.subarray(0, NONCE_BYTES);
    const tag = sealed.subarray(sealed.length - TAG_BYTES);
    const ciphertext = sealed.subarray(NONCE_BYTES, sealed.length - TAG_BYTES);

    try {
      const decipher = crypto.createDecipheriv(ALGORITHM, this.key, nonce);
      decipher.setAuthTag(tag);
      return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
    } catch {
      throw new IntegrityError('Encrypted payload failed authentication');
    }
  }

  /** Field values are stored as base64 text columns. */
  sealText(value: string): string {
    return this.seal(Buffer.from(value, 'utf8')).toString('base64');
  }

  openText(sealed: string): string {
    return this.open(Buffer.from(sealed, 'base64')).toString('utf8');
  }
}
