export * from './types';
export * from './utils/errors';
export { loadConfig } from './config';
export type { SigningConfig, StoreMode, ContentStoreMode } from './config';
export { AuditTrail } from './core/audit';
export { authorize } from './core/authorization';
export { DocumentService, toPublicSigner } from './core/document-service';
export type { CreatedDocument, SweepResult } from './core/document-service';
export { SigningService, DEFAULT_SIGNATURE_ALGORITHM } from './core/signing-service';
export type { SignerRef, SignerSession, SignResult, SubmittedValue } from './core/signing-service';
export { TemplateCatalog } from './core/template-catalog';
export { buildTemplateSnapshot, hashTemplateSnapshot } from './core/snapshot';
export { InMemorySigningStore } from './database/memory-store';
export { PostgresSigningStore } from './database/postgres-store';
export type { SigningRepository, SigningStore } from './database/store';
export { AesGcmCipher } from './storage/cipher';
export { ContentStore } from './storage/content-store';
export { InMemoryObjectBackend } from './storage/memory-backend';
export { S3ObjectBackend } from './storage/s3-backend';
export { composeFinalPdf } from './pdf/compose';
export { getCounterSnapshot } from './metrics/counters';
export { createRouter } from './api/routes';
export { SigningController } from './api/controller';
export { createSigningServices } from './services';
