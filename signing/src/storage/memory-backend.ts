import { ObjectBackend, StoredObject } from './backend';

export class InMemoryObjectBackend implements ObjectBackend {
  private readonly objects = new Map<string, StoredObject>();
  putCount = 0;

  constructor(readonly bucket: string = 'inmemory') {}

  async putObject(key: string, body: Buffer, metadata: Record<string, string>): Promise<void> {
    this.putCount += 1;
    this.objects.set(key, { body: Buffer.from(body), metadata: { ...metadata } });
  }

  async getObject(key: string): Promise<StoredObject | null> {
    const stored = this.objects.get(key);
    if (!stored) {
      return null;
    }
    return { body: Buffer.from(stored.body), metadata: { ...stored.metadata } };
  }

  async deleteObject(key: string): Promise<void> {
    this.objects.delete(key);
  }

  async headObject(key: string): Promise<boolean> {
    return this.objects.has(key);
  }

  keys(): string[] {
    return [...this.objects.keys()];
  }

  /** Overwrites stored bytes in place; used to simulate tampering at rest. */
  replaceBody(key: string, body: Buffer): void {
    const stored = this.objects.get(key);
    if (stored) {
      this.objects.set(key, { ...stored, body });
    }
  }
}
