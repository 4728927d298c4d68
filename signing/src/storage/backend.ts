export interface StoredObject {
  body: Buffer;
  metadata: Record<string, string>;
}

/** Raw byte storage addressed by key. Implementations never see plaintext. */
export interface ObjectBackend {
  readonly bucket: string;
  putObject(key: string, body: Buffer, metadata: Record<string, string>): Promise<void>;
  getObject(key: string): Promise<StoredObject | null>;
  deleteObject(key: string): Promise<void>;
  headObject(key: string): Promise<boolean>;
}
