import { AesGcmCipher, NONCE_BYTES, TAG_BYTES } from '../src/storage/cipher';
import { ContentStore, finalDocumentObjectPath, templateObjectPath } from '../src/storage/content-store';
import { InMemoryObjectBackend } from '../src/storage/memory-backend';
import { ObjectBackend } from '../src/storage/backend';
import { IntegrityError, StorageError } from '../src/utils/errors';
import { sha256Hex } from '../src/utils/crypto';

const KEY_HEX = 'ab'.repeat(32);

describe('AesGcmCipher', () => {
  test('seals with a fresh nonce and opens back to the plaintext', () => {
    const cipher = AesGcmCipher.fromHex(KEY_HEX);
    const plaintext = Buffer.from('purchase agreement body');

    const first = cipher.seal(plaintext);
    const second = cipher.seal(plaintext);

    expect(first.length).toBe(plaintext.length + NONCE_BYTES + TAG_BYTES);
    expect(first.equals(second)).toBe(false);
    expect(cipher.open(first).toString()).toBe('purchase agreement body');
  });

  test('rejects a flipped ciphertext byte', () => {
    const cipher = AesGcmCipher.fromHex(KEY_HEX);
    const sealed = cipher.seal(Buffer.from('hello'));
    sealed[NONCE_BYTES] ^= 0xff;

    expect(() => cipher.open(sealed)).toThrow(IntegrityError);
  });

  test('rejects truncated payloads', () => {
    const cipher = AesGcmCipher.fromHex(KEY_HEX);
    expect(() => cipher.open(Buffer.alloc(NONCE_BYTES + TAG_BYTES - 1))).toThrow('Encrypted payload is truncated');
  });

  test('rejects data sealed with another key', () => {
    const sealed = AesGcmCipher.fromHex(KEY_HEX).seal(Buffer.from('hello'));
    expect(() => AesGcmCipher.fromHex('cd'.repeat(32)).open(sealed)).toThrow(IntegrityError);
  });

  test('requires a 32-byte hex key', () => {
    expect(() => AesGcmCipher.fromHex('abcd')).toThrow('Encryption key must be 64 hex characters');
    expect(() => new AesGcmCipher(Buffer.alloc(16))).toThrow('Encryption key must be 32 bytes');
  });

  test('text helpers round trip through base64', () => {
    const cipher = AesGcmCipher.fromHex(KEY_HEX, 'submissions');
    const sealed = cipher.sealText('Zoë Example');

    expect(sealed).toMatch(/^[A-Za-z0-9+/]+=*$/);
    expect(cipher.openText(sealed)).toBe('Zoë Example');
    expect(cipher.keyId).toBe('submissions');
  });
});

describe('ContentStore', () => {
  let backend: InMemoryObjectBackend;
  let store: ContentStore;

  beforeEach(() => {
    backend = new InMemoryObjectBackend('docs-bucket');
    store = new ContentStore(backend, AesGcmCipher.fromHex(KEY_HEX, 'content'));
  });

  test('stores ciphertext and reports the plaintext hash', async () => {
    const payload = Buffer.from('%PDF-1.7 test payload');
    const put = await store.put(payload, 'templates/tenant-a/one.pdf', { 'tenant-id': 'tenant-a' });

    expect(put).toEqual({
      path: 'templates/tenant-a/one.pdf',
      bucket: 'docs-bucket',
      contentHash: sha256Hex(payload),
      size: payload.length,
    });

    const raw = await backend.getObject('templates/tenant-a/one.pdf');
    expect(raw?.body.includes(payload)).toBe(false);
    expect(raw?.metadata).toEqual({
      'tenant-id': 'tenant-a',
      'original-hash': sha256Hex(payload),
      encrypted: 'true',
      'key-id': 'content',
    });

    const read = await store.get('templates/tenant-a/one.pdf');
    expect(read.data.equals(payload)).toBe(true);
    expect(read.contentHash).toBe(put.contentHash);
  });

  test('verify fails when the content does not match the expected hash', async () => {
    await store.put(Buffer.from('original'), 'documents/t/d/final.pdf');

    await expect(store.verify('documents/t/d/final.pdf', sha256Hex('something else'))).rejects.toBeInstanceOf(
      IntegrityError
    );
    await expect(store.verify('documents/t/d/final.pdf', sha256Hex('original'))).resolves.toMatchObject({
      size: 8,
    });
  });

  test('tampering at rest is detected on read', async () => {
    await store.put(Buffer.from('original'), 'documents/t/d/final.pdf');
    backend.replaceBody('documents/t/d/final.pdf', Buffer.alloc(40, 7));

    await expect(store.get('documents/t/d/final.pdf')).rejects.toBeInstanceOf(IntegrityError);
  });

  test('missing objects are storage errors', async () => {
    const attempt = store.get('documents/t/d/missing.pdf');
    await expect(attempt).rejects.toBeInstanceOf(StorageError);
    await expect(attempt).rejects.not.toBeInstanceOf(IntegrityError);
  });

  test('rejects unsafe paths', async () => {
    await expect(store.put(Buffer.from('x'), '../escape.pdf')).rejects.toThrow('Invalid object path');
    await expect(store.put(Buffer.from('x'), '/absolute.pdf')).rejects.toThrow('Invalid object path');
    expect(backend.putCount).toBe(0);
  });

  test('exists and delete reflect the backend', async () => {
    await store.put(Buffer.from('x'), 'templates/t/x.pdf');

    await expect(store.exists('templates/t/x.pdf')).resolves.toBe(true);
    await expect(store.delete('templates/t/x.pdf')).resolves.toBe(true);
    await expect(store.exists('templates/t/x.pdf')).resolves.toBe(false);
  });

  test('delete reports false instead of throwing when the backend fails', async () => {
    const failing: ObjectBackend = {
      bucket: 'broken',
      putObject: jest.fn().mockRejectedValue(new Error('network down')),
      getObject: jest.fn().mockRejectedValue(new Error('network down')),
      deleteObject: jest.fn().mockRejectedValue(new Error('network down')),
      headObject: jest.fn().mockRejectedValue(new Error('network down')),
    };
    const broken = new ContentStore(failing, AesGcmCipher.fromHex(KEY_HEX));

    await expect(broken.delete('templates/t/x.pdf')).resolves.toBe(false);
    await expect(broken.put(Buffer.from('x'), 'templates/t/x.pdf')).rejects.toMatchObject({
      kind: 'storage',
      retryable: true,
    });
  });

  test('object paths are fresh for every call', () => {
    expect(templateObjectPath('tenant-a')).toMatch(/^templates\/tenant-a\/[0-9a-f-]{36}\.pdf$/);

    const first = finalDocumentObjectPath('tenant-a', 'doc-1');
    const second = finalDocumentObjectPath('tenant-a', 'doc-1');
    expect(first).toMatch(/^documents\/tenant-a\/doc-1\/[0-9a-f-]{36}-signed\.pdf$/);
    expect(first).not.toBe(second);
  });
});
