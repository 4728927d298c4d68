import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { WebhookNotifier } from '@sealdesk/notifications';
import { loadConfig, SigningConfig } from './config';
import { SigningController } from './api/controller';
import { createRouter } from './api/routes';
import { createPool, testConnection } from './database/connection';
import { InMemorySigningStore } from './database/memory-store';
import { runMigrations } from './database/migrations';
import { PostgresSigningStore } from './database/postgres-store';
import { SigningStore } from './database/store';
import { ObjectBackend } from './storage/backend';
import { AesGcmCipher } from './storage/cipher';
import { ContentStore } from './storage/content-store';
import { InMemoryObjectBackend } from './storage/memory-backend';
import { S3ObjectBackend } from './storage/s3-backend';
import { createSigningServices } from './services';
import { Logger } from './utils/logger';

const CONTENT_KEY_ID = 'primary';

async function createStore(config: SigningConfig): Promise<SigningStore> {
  if (config.storeMode === 'inmemory' || !config.database) {
    Logger.warn('Using in-memory signing store; data is lost on restart');
    return new InMemorySigningStore();
  }

  const pool = createPool(config.database);
  await testConnection(pool);
  await runMigrations(pool);
  return new PostgresSigningStore(pool);
}

function createBackend(config: SigningConfig): ObjectBackend {
  if (config.contentStore === 's3' && config.s3Bucket) {
    return new S3ObjectBackend({
      bucket: config.s3Bucket,
      region: config.awsRegion,
      endpointUrl: config.awsEndpointUrl,
    });
  }

  Logger.warn('Using in-memory content store; stored PDFs are lost on restart');
  return new InMemoryObjectBackend();
}

async function bootstrap(): Promise<void> {
  const config = loadConfig();
  const store = await createStore(config);

  const notifier = new WebhookNotifier({
    enabled: config.notifications.enabled,
    webhookUrl: config.notifications.webhookUrl,
    cooldownMs: config.notifications.cooldownMs,
    requestTimeoutMs: config.notifications.requestTimeoutMs,
    retryAttempts: config.notifications.retryAttempts,
    retryDelayMs: config.notifications.retryDelayMs,
    logger: Logger,
  });

  const services = createSigningServices({
    store,
    content: new ContentStore(createBackend(config), AesGcmCipher.fromHex(config.documentEncryptionKey, CONTENT_KEY_ID)),
    submissionCipher: AesGcmCipher.fromHex(config.documentEncryptionKey, config.submissionEncryptionKeyId),
    notifier,
    defaultTtlHours: config.documentDefaultTtlHours,
    auditFailureAlertThreshold: config.auditFailureAlertThreshold,
  });

  const app = express();
  const controller = new SigningController(services.catalog, services.documents, services.signing);

  app.use(helmet());
  app.use(cors());
  // Template uploads carry the PDF base64-encoded in the JSON body.
  app.use(express.json({ limit: '40mb' }));
  app.set('trust proxy', true);

  app.use('/api/signing/v1', createRouter(controller, { readinessCheck: () => store.readinessCheck() }));

  const server = app.listen(config.port, () => {
    Logger.info('Signing service started', {
      port: config.port,
      storeMode: config.storeMode,
      contentStore: config.contentStore,
      notificationsEnabled: config.notifications.enabled,
    });
  });

  let sweepRunning = false;
  const sweeper =
    config.expirySweepIntervalMs > 0
      ? setInterval(() => {
          if (sweepRunning) {
            return;
          }
          sweepRunning = true;
          void services.documents
            .expireOverdueDocuments()
            .catch((error: unknown) => {
              Logger.error('Expiry sweep failed', { error: error instanceof Error ? error.message : String(error) });
            })
            .finally(() => {
              sweepRunning = false;
            });
        }, config.expirySweepIntervalMs)
      : null;

  const shutdown = async (signal: string): Promise<void> => {
    Logger.info('Shutting down signing service', { signal });
    if (sweeper) {
      clearInterval(sweeper);
    }
    server.close();
    await store.close();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
}

bootstrap().catch((error: unknown) => {
  Logger.error('Signing bootstrap failed', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
