import { AuditTrail } from './core/audit';
import { DocumentService } from './core/document-service';
import { Notifier, SigningNotifications } from './core/notify';
import { SigningService } from './core/signing-service';
import { TemplateCatalog } from './core/template-catalog';
import { SigningStore } from './database/store';
import { AesGcmCipher } from './storage/cipher';
import { ContentStore } from './storage/content-store';

export interface SigningServicesOptions {
  store: SigningStore;
  content: ContentStore;
  submissionCipher: AesGcmCipher;
  notifier?: Notifier;
  defaultTtlHours: number;
  auditFailureAlertThreshold: number;
  now?: () => Date;
}

export interface SigningServices {
  audit: AuditTrail;
  notifications: SigningNotifications;
  catalog: TemplateCatalog;
  documents: DocumentService;
  signing: SigningService;
}

export function createSigningServices(options: SigningServicesOptions): SigningServices {
  const notifications = new SigningNotifications(options.notifier);
  const audit = new AuditTrail(options.store, {
    failureAlertThreshold: options.auditFailureAlertThreshold,
    notifications,
  });

  const documents = new DocumentService({
    store: options.store,
    content: options.content,
    audit,
    notifications,
    defaultTtlHours: options.defaultTtlHours,
    now: options.now,
  });

  return {
    audit,
    notifications,
    catalog: new TemplateCatalog({ store: options.store, content: options.content, audit }),
    documents,
    signing: new SigningService({
      store: options.store,
      content: options.content,
      submissionCipher: options.submissionCipher,
      documents,
      audit,
      notifications,
      now: options.now,
    }),
  };
}
