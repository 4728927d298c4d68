import { ObjectBackend, StoredObject } from './backend';
import { AesGcmCipher } from './cipher';
import { IntegrityError, SigningError, StorageError } from '../utils/errors';
import { generateId, sha256Hex, timingSafeEqualHex } from '../utils/crypto';
import { Logger } from '../utils/logger';

export interface PutResult {
  path: string;
  bucket: string;
  contentHash: string;
  size: number;
}

export interface GetResult {
  data: Buffer;
  contentHash: string;
  size: number;
}

export function templateObjectPath(tenantId: string): string {
  return `templates/${tenantId}/${generateId()}.pdf`;
}

/** Every call yields a fresh path, so a final document is never overwritten. */
export function finalDocumentObjectPath(tenantId: string, documentId: string): string {
  return `documents/${tenantId}/${documentId}/${generateId()}-signed.pdf`;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Encrypted, integrity-checked object storage. Hashes are computed over the
 * plaintext so callers can compare against stored metadata without a key.
 */
export class ContentStore {
  constructor(
    private readonly backend: ObjectBackend,
    private readonly cipher: AesGcmCipher
  ) {}

  get bucket(): string {
    return this.backend.bucket;
  }

  async put(payload: Buffer, logicalPath: string, metadata: Record<string, string> = {}): Promise<PutResult> {
    if (!logicalPath || logicalPath.startsWith('/') || logicalPath.includes('..')) {
      throw new StorageError(`Invalid object path: ${logicalPath}`);
    }

    const contentHash = sha256Hex(payload);
    const sealed = this.cipher.seal(payload);

    try {
      await this.backend.putObject(logicalPath, sealed, {
        ...metadata,
        'original-hash': contentHash,
        encrypted: 'true',
        'key-id': this.cipher.keyId,
      });
    } catch (error) {
      Logger.error('Content store write failed', { path: logicalPath, error: describe(error) });
      throw new StorageError('Failed to write object to content store', { path: logicalPath });
    }

    Logger.info('Content stored', { path: logicalPath, size: payload.length });
    return { path: logicalPath, bucket: this.backend.bucket, contentHash, size: payload.length };
  }

  async get(path: string): Promise<GetResult> {
    let stored: StoredObject | null;
    try {
      stored = await this.backend.getObject(path);
    } catch (error) {
      Logger.error('Content store read failed', { path, error: describe(error) });
      throw new StorageError('Failed to read object from content store', { path });
    }

    if (!stored) {
      throw new StorageError('Object not found in content store', { path });
    }

    let data: Buffer;
    try {
      data = this.cipher.open(stored.body);
    } catch (error) {
      if (error instanceof SigningError) {
        Logger.error('Content integrity failure', { path, error: error.message });
      }
      throw error;
    }

    return { data, contentHash: sha256Hex(data), size: data.length };
  }

  /** Reads and decrypts, then checks the plaintext hash against the recorded one. */
  async verify(path: string, expectedHash: string): Promise<GetResult> {
    const result = await this.get(path);
    if (!timingSafeEqualHex(result.contentHash, expectedHash)) {
      Logger.error('Content hash mismatch', { path, expectedHash, actualHash: result.contentHash });
      throw new IntegrityError('Stored content does not match its recorded hash', { path });
    }
    return result;
  }

  async exists(path: string): Promise<boolean> {
    try {
      return await this.backend.headObject(path);
    } catch (error) {
      throw new StorageError('Failed to check object in content store', { path, cause: describe(error) });
    }
  }

  /**
   * Best-effort removal used for compensating cleanup. Returns false when the
   * object could not be removed; the caller decides whether to escalate.
   */
  async delete(path: string): Promise<boolean> {
    try {
      await this.backend.deleteObject(path);
      return true;
    } catch (error) {
      Logger.error('Content store delete failed, object left for garbage collection', {
        path,
        error: describe(error),
      });
      return false;
    }
  }
}
