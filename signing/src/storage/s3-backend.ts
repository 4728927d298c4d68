import {
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  NoSuchKey,
  NotFound,
  PutObjectCommand,
  S3Client,
} from '@aws-sdk/client-s3';
import { ObjectBackend, StoredObject } from './backend';

export interface S3BackendConfig {
  bucket: string;
  region: string;
  endpointUrl?: string;
}

export class S3ObjectBackend implements ObjectBackend {
  readonly bucket: string;

  constructor(
    config: S3BackendConfig,
    private readonly client: S3Client = new S3Client({
      region: config.region,
      endpoint: config.endpointUrl,
      forcePathStyle: Boolean(config.endpointUrl),
    })
  ) {
    this.bucket = config.bucket;
  }

  async putObject(key: string, body: Buffer, metadata: Record<string, string>): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: body,
        ContentType: 'application/octet-stream',
        Metadata: metadata,
        ServerSideEncryption: 'AES256',
      })
    );
  }

  async getObject(key: string): Promise<StoredObject | null> {
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
      if (!response.Body) {
        return null;
      }

      const bytes = await response.Body.transformToByteArray();
      return { body: Buffer.from(bytes), metadata: response.Metadata ?? {} };
    } catch (error) {
      if (error instanceof NoSuchKey) {
        return null;
      }
      throw error;
    }
  }

  async deleteObject(key: string): Promise<void> {
    await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }));
  }

  async headObject(key: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
      return true;
    } catch (error) {
      if (error instanceof NotFound) {
        return false;
      }
      throw error;
    }
  }
}
