import {
  AuditAction,
  AuditLogRow,
  DigitalSignatureRow,
  DocumentRow,
  DocumentSignerRow,
  DocumentStatus,
  FieldPosition,
  FieldType,
  FormSubmissionRow,
  SignerStatus,
  TemplateFieldRow,
  TemplateListRow,
  TemplateRow,
  TemplateSignerRow,
  TemplateSnapshot,
  ValidationRules,
} from '../types';

export interface NewTemplate {
  id: string;
  name: string;
  description: string;
  bucket: string;
  key: string;
  pdfHash: string;
  fileSize: number;
  mimeType: string;
  totalPages: number;
  createdBy: string;
  tenantId: string;
}

export interface NewTemplateSigner {
  id: string;
  templateId: string;
  order: number;
  name: string;
  color: string;
}

export interface NewTemplateField {
  id: string;
  templateId: string;
  signerId: string;
  name: string;
  type: FieldType;
  label: string;
  placeholder: string;
  position: FieldPosition;
  validationRules: ValidationRules;
  required: boolean;
  version: number;
}

export interface NewDocument {
  id: string;
  templateId: string;
  name: string;
  snapshot: TemplateSnapshot;
  snapshotHash: string;
  createdBy: string;
  tenantId: string;
  expiresAt: Date | null;
}

export interface NewDocumentSigner {
  id: string;
  documentId: string;
  templateSignerId: string;
  order: number;
  email: string;
  name: string;
  accessToken: string;
}

export interface StatusTransition {
  from: DocumentStatus[];
  to: DocumentStatus;
  sentAt?: Date;
}

export interface CompletionUpdate {
  bucket: string;
  key: string;
  finalHash: string;
  completedAt: Date;
}

export interface SubmissionUpsert {
  id: string;
  documentId: string;
  documentSignerId: string;
  fieldId: string;
  fieldName: string;
  fieldType: FieldType;
  encryptedValue: string | null;
  encryptionKeyId: string | null;
  ip: string | null;
  userAgent: string | null;
}

export interface NewSignature {
  id: string;
  documentId: string;
  documentSignerId: string;
  email: string;
  name: string;
  signature: string;
  certificate: string | null;
  algorithm: string;
  ip: string | null;
  userAgent: string | null;
}

export interface NewAuditEntry {
  id: string;
  documentId: string | null;
  templateId: string | null;
  userId: string | null;
  action: AuditAction;
  details: Record<string, unknown>;
  ip: string | null;
  userAgent: string | null;
}

export interface AuditQuery {
  documentId?: string;
  templateId?: string;
}

export interface LockOptions {
  forUpdate?: boolean;
}

/**
 * Row-level data access. Inside `SigningStore.withTransaction` every call runs
 * on the same connection; `forUpdate` locks the row until commit.
 */
export interface SigningRepository {
  insertTemplate(data: NewTemplate): Promise<TemplateRow>;
  insertTemplateSigner(data: NewTemplateSigner): Promise<TemplateSignerRow>;
  insertTemplateField(data: NewTemplateField): Promise<TemplateFieldRow>;
  findTemplate(templateId: string, options?: LockOptions): Promise<TemplateRow | null>;
  listTemplatesForTenant(tenantId: string): Promise<TemplateListRow[]>;
  listTemplateSigners(templateId: string): Promise<TemplateSignerRow[]>;
  listTemplateFields(templateId: string): Promise<TemplateFieldRow[]>;
  updateTemplateDetails(templateId: string, name: string, description: string): Promise<TemplateRow>;
  bumpTemplateVersion(templateId: string): Promise<TemplateRow>;
  deactivateTemplate(templateId: string): Promise<TemplateRow>;
  deleteTemplateFields(templateId: string): Promise<number>;
  deleteTemplateSigners(templateId: string): Promise<number>;

  insertDocument(data: NewDocument): Promise<DocumentRow>;
  insertDocumentSigner(data: NewDocumentSigner): Promise<DocumentSignerRow>;
  findDocument(documentId: string, options?: LockOptions): Promise<DocumentRow | null>;
  listDocumentSigners(documentId: string): Promise<DocumentSignerRow[]>;
  findDocumentSigner(documentSignerId: string): Promise<DocumentSignerRow | null>;
  findDocumentSignerByToken(accessToken: string): Promise<DocumentSignerRow | null>;
  transitionDocument(documentId: string, transition: StatusTransition): Promise<DocumentRow | null>;
  completeDocument(documentId: string, update: CompletionUpdate): Promise<DocumentRow | null>;
  listOverdueDocuments(now: Date, limit: number): Promise<DocumentRow[]>;
  updateSignerAccessToken(documentSignerId: string, accessToken: string): Promise<void>;
  updateSignerStatus(documentSignerId: string, status: SignerStatus, at: Date): Promise<DocumentSignerRow>;

  upsertSubmission(data: SubmissionUpsert): Promise<FormSubmissionRow>;
  listSubmissions(documentId: string): Promise<FormSubmissionRow[]>;

  insertSignature(data: NewSignature): Promise<DigitalSignatureRow>;
  listSignatures(documentId: string): Promise<DigitalSignatureRow[]>;
  stampSignatureHashes(documentId: string, finalHash: string): Promise<number>;

  insertAuditEntry(data: NewAuditEntry): Promise<AuditLogRow>;
  listAuditEntries(query: AuditQuery): Promise<AuditLogRow[]>;
}

export interface SigningStore {
  /** Repository bound to the pool; each call commits on its own. */
  repository(): SigningRepository;
  /** Runs `work` atomically; any thrown error rolls every write back. */
  withTransaction<T>(work: (repository: SigningRepository) => Promise<T>): Promise<T>;
  readinessCheck(): Promise<void>;
  close(): Promise<void>;
}
