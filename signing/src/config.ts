import dotenv from 'dotenv';
import { strict as assert } from 'assert';

dotenv.config();

export type StoreMode = 'postgres' | 'inmemory';
export type ContentStoreMode = 's3' | 'inmemory';

export interface DatabaseConfig {
  dbHost: string;
  dbPort: number;
  dbName: string;
  dbUser: string;
  dbPassword: string;
}

export interface NotificationsConfig {
  enabled: boolean;
  webhookUrl?: string;
  cooldownMs: number;
  requestTimeoutMs: number;
  retryAttempts: number;
  retryDelayMs: number;
}

export interface SigningConfig {
  nodeEnv: string;
  port: number;
  storeMode: StoreMode;
  database?: DatabaseConfig;
  contentStore: ContentStoreMode;
  s3Bucket?: string;
  awsRegion: string;
  awsEndpointUrl?: string;
  documentEncryptionKey: string;
  submissionEncryptionKeyId: string;
  documentDefaultTtlHours: number;
  auditFailureAlertThreshold: number;
  expirySweepIntervalMs: number;
  notifications: NotificationsConfig;
}

function env(name: string): string {
  const value = process.env[name];
  assert(value, `${name} is missing`);
  return value;
}

function envBool(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }

  if (raw.toLowerCase() === 'true') {
    return true;
  }

  if (raw.toLowerCase() === 'false') {
    return false;
  }

  throw new Error(`${name} must be true or false`);
}

function envNumber(name: string, fallback?: number): number {
  const raw = process.env[name];
  if ((raw === undefined || raw === '') && fallback !== undefined) {
    return fallback;
  }

  const value = raw ?? env(name);
  const parsed = Number.parseInt(value, 10);
  assert(!Number.isNaN(parsed), `${name} must be a number`);
  return parsed;
}

function resolveStoreMode(nodeEnv: string): StoreMode {
  const rawMode = process.env.STORE_MODE?.trim().toLowerCase();

  if (!rawMode) {
    return nodeEnv === 'production' ? 'postgres' : 'inmemory';
  }

  if (rawMode === 'postgres' || rawMode === 'inmemory') {
    return rawMode;
  }

  throw new Error('STORE_MODE must be one of: postgres, inmemory');
}

function resolveContentStoreMode(nodeEnv: string): ContentStoreMode {
  const rawMode = process.env.CONTENT_STORE?.trim().toLowerCase();

  if (!rawMode) {
    return nodeEnv === 'production' ? 's3' : 'inmemory';
  }

  if (rawMode === 's3' || rawMode === 'inmemory') {
    return rawMode;
  }

  throw new Error('CONTENT_STORE must be one of: s3, inmemory');
}

export function loadConfig(): SigningConfig {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const storeMode = resolveStoreMode(nodeEnv);
  const contentStore = resolveContentStoreMode(nodeEnv);

  if (nodeEnv === 'production' && storeMode === 'inmemory') {
    throw new Error('STORE_MODE=inmemory is not allowed when NODE_ENV=production');
  }

  if (nodeEnv === 'production' && contentStore === 'inmemory') {
    throw new Error('CONTENT_STORE=inmemory is not allowed when NODE_ENV=production');
  }

  const s3Bucket = process.env.AWS_S3_BUCKET?.trim() || undefined;
  if (contentStore === 's3') {
    assert(s3Bucket, 'AWS_S3_BUCKET is required when CONTENT_STORE=s3');
  }

  const documentEncryptionKey = env('DOCUMENT_ENCRYPTION_KEY').trim();
  assert(
    /^[0-9a-fA-F]{64}$/.test(documentEncryptionKey),
    'DOCUMENT_ENCRYPTION_KEY must be 64 hex characters (32 bytes)'
  );

  const database: DatabaseConfig | undefined =
    storeMode === 'postgres'
      ? {
          dbHost: env('DB_HOST'),
          dbPort: envNumber('DB_PORT', 5432),
          dbName: env('DB_NAME'),
          dbUser: env('DB_USER'),
          dbPassword: env('DB_PASSWORD'),
        }
      : undefined;

  const notificationsEnabled = envBool('NOTIFICATIONS_ENABLED', false);
  const webhookUrl = process.env.NOTIFICATIONS_WEBHOOK_URL?.trim() || undefined;
  if (notificationsEnabled) {
    assert(webhookUrl, 'NOTIFICATIONS_WEBHOOK_URL is required when NOTIFICATIONS_ENABLED=true');
  }

  const config: SigningConfig = {
    nodeEnv,
    port: envNumber('PORT', 3400),
    storeMode,
    database,
    contentStore,
    s3Bucket,
    awsRegion: process.env.AWS_REGION?.trim() || 'us-east-1',
    awsEndpointUrl: process.env.AWS_ENDPOINT_URL?.trim() || undefined,
    documentEncryptionKey,
    submissionEncryptionKeyId: process.env.SUBMISSION_ENCRYPTION_KEY_ID?.trim() || 'primary',
    documentDefaultTtlHours: envNumber('DOCUMENT_DEFAULT_TTL_HOURS', 720),
    auditFailureAlertThreshold: envNumber('AUDIT_FAILURE_ALERT_THRESHOLD', 3),
    expirySweepIntervalMs: envNumber('EXPIRY_SWEEP_INTERVAL_MS', 60000),
    notifications: {
      enabled: notificationsEnabled,
      webhookUrl,
      cooldownMs: envNumber('NOTIFICATIONS_COOLDOWN_MS', 300000),
      requestTimeoutMs: envNumber('NOTIFICATIONS_REQUEST_TIMEOUT_MS', 5000),
      retryAttempts: envNumber('NOTIFICATIONS_RETRY_ATTEMPTS', 3),
      retryDelayMs: envNumber('NOTIFICATIONS_RETRY_DELAY_MS', 1000),
    },
  };

  assert(config.port > 0, 'PORT must be > 0');
  assert(config.documentDefaultTtlHours > 0, 'DOCUMENT_DEFAULT_TTL_HOURS must be > 0');
  assert(config.auditFailureAlertThreshold > 0, 'AUDIT_FAILURE_ALERT_THRESHOLD must be > 0');
  assert(config.expirySweepIntervalMs >= 0, 'EXPIRY_SWEEP_INTERVAL_MS must be >= 0');
  assert(config.notifications.retryAttempts >= 0, 'NOTIFICATIONS_RETRY_ATTEMPTS must be >= 0');

  return config;
}
