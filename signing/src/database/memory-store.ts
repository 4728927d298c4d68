import {
  AuditLogRow,
  DigitalSignatureRow,
  DocumentRow,
  DocumentSignerRow,
  DocumentStatus,
  FormSubmissionRow,
  SignerStatus,
  TemplateFieldRow,
  TemplateListRow,
  TemplateRow,
  TemplateSignerRow,
} from '../types';
import { classifyPersistenceError } from '../utils/errors';
import {
  AuditQuery,
  CompletionUpdate,
  LockOptions,
  NewAuditEntry,
  NewDocument,
  NewDocumentSigner,
  NewSignature,
  NewTemplate,
  NewTemplateField,
  NewTemplateSigner,
  SigningRepository,
  SigningStore,
  StatusTransition,
  SubmissionUpsert,
} from './store';

/** Shaped like a pg driver error so it classifies the same way. */
class ConstraintViolation extends Error {
  constructor(
    readonly code: '23505' | '23503' | '23514',
    readonly constraint: string
  ) {
    super(`violates constraint ${constraint}`);
    this.name = 'ConstraintViolation';
  }
}

interface MemoryState {
  templates: Map<string, TemplateRow>;
  templateSigners: Map<string, TemplateSignerRow>;
  templateFields: Map<string, TemplateFieldRow>;
  documents: Map<string, DocumentRow>;
  documentSigners: Map<string, DocumentSignerRow>;
  submissions: Map<string, FormSubmissionRow>;
  signatures: Map<string, DigitalSignatureRow>;
  audit: Map<string, AuditLogRow>;
}

type UndoStep = () => void;

const OPEN_STATUSES: DocumentStatus[] = ['draft', 'scheduled', 'sent', 'in_progress'];

function copy<T>(row: T): T {
  return structuredClone(row);
}

function newestFirst<T extends { created_at: Date }>(rows: T[]): T[] {
  return [...rows].reverse().sort((a, b) => b.created_at.getTime() - a.created_at.getTime());
}

class InMemorySigningRepository implements SigningRepository {
  constructor(
    private readonly state: MemoryState,
    private readonly now: () => Date,
    private readonly journal: UndoStep[] | null
  ) {}

  private guard<T>(operation: string, action: () => T): Promise<T> {
    try {
      return Promise.resolve(action());
    } catch (error) {
      return Promise.reject(classifyPersistenceError(error, operation));
    }
  }

  private write<T extends { id: string }>(table: Map<string, T>, row: T): T {
    const previous = table.get(row.id);
    table.set(row.id, row);
    this.journal?.push(() => {
      if (previous) {
        table.set(row.id, previous);
      } else {
        table.delete(row.id);
      }
    });
    return copy(row);
  }

  private remove<T extends { id: string }>(table: Map<string, T>, id: string): void {
    const previous = table.get(id);
    if (!previous) {
      return;
    }
    table.delete(id);
    this.journal?.push(() => {
      table.set(id, previous);
    });
  }

  private requireRow<T>(table: Map<string, T>, id: string | null, constraint: string): void {
    if (id !== null && !table.has(id)) {
      throw new ConstraintViolation('23503', constraint);
    }
  }

  private existing<T>(table: Map<string, T>, id: string, operation: string): T {
    const row = table.get(id);
    if (!row) {
      throw new Error(`${operation} returned no row`);
    }
    return row;
  }

  insertTemplate(data: NewTemplate): Promise<TemplateRow> {
    return this.guard('Insert template', () => {
      const at = this.now();
      return this.write(this.state.templates, {
        id: data.id,
        name: data.name,
        description: data.description,
        s3_bucket: data.bucket,
        s3_key: data.key,
        pdf_hash: data.pdfHash,
        file_size: data.fileSize,
        mime_type: data.mimeType,
        total_pages: data.totalPages,
        created_by: data.createdBy,
        tenant_id: data.tenantId,
        is_active: true,
        version: 1,
        created_at: at,
        updated_at: at,
      });
    });
  }

  insertTemplateSigner(data: NewTemplateSigner): Promise<TemplateSignerRow> {
    return this.guard('Insert template signer', () => {
      this.requireRow(this.state.templates, data.templateId, 'template_signers_template_id_fkey');
      for (const signer of this.state.templateSigners.values()) {
        if (signer.template_id === data.templateId && signer.signer_order === data.order) {
          throw new ConstraintViolation('23505', 'template_signers_unique_order');
        }
      }
      return this.write(this.state.templateSigners, {
        id: data.id,
        template_id: data.templateId,
        signer_order: data.order,
        signer_name: data.name,
        signer_color: data.color,
        created_at: this.now(),
      });
    });
  }

  insertTemplateField(data: NewTemplateField): Promise<TemplateFieldRow> {
    return this.guard('Insert template field', () => {
      this.requireRow(this.state.templates, data.templateId, 'template_fields_template_id_fkey');
      this.requireRow(this.state.templateSigners, data.signerId, 'template_fields_signer_id_fkey');
      for (const field of this.state.templateFields.values()) {
        if (field.template_id === data.templateId && field.field_name === data.name) {
          throw new ConstraintViolation('23505', 'template_fields_unique_name');
        }
      }
      return this.write(this.state.templateFields, {
        id: data.id,
        template_id: data.templateId,
        signer_id: data.signerId,
        field_name: data.name,
        field_type: data.type,
        field_label: data.label,
        placeholder_text: data.placeholder,
        position_data: { ...data.position },
        validation_rules: { ...data.validationRules },
        required: data.required,
        version: data.version,
        created_at: this.now(),
      });
    });
  }

  findTemplate(templateId: string, _options?: LockOptions): Promise<TemplateRow | null> {
    const row = this.state.templates.get(templateId);
    return Promise.resolve(row ? copy(row) : null);
  }

  listTemplatesForTenant(tenantId: string): Promise<TemplateListRow[]> {
    const templates = [...this.state.templates.values()].filter((t) => t.tenant_id === tenantId && t.is_active);
    const signers = [...this.state.templateSigners.values()];
    const fields = [...this.state.templateFields.values()];

    return Promise.resolve(
      newestFirst(templates).map((template) => ({
        ...copy(template),
        signer_count: signers.filter((s) => s.template_id === template.id).length,
        field_count: fields.filter((f) => f.template_id === template.id).length,
      }))
    );
  }

  listTemplateSigners(templateId: string): Promise<TemplateSignerRow[]> {
    return Promise.resolve(
      [...this.state.templateSigners.values()]
        .filter((signer) => signer.template_id === templateId)
        .sort((a, b) => a.signer_order - b.signer_order)
        .map(copy)
    );
  }

  listTemplateFields(templateId: string): Promise<TemplateFieldRow[]> {
    return Promise.resolve(
      [...this.state.templateFields.values()].filter((field) => field.template_id === templateId).map(copy)
    );
  }

  updateTemplateDetails(templateId: string, name: string, description: string): Promise<TemplateRow> {
    return this.guard('Update template details', () => {
      const current = this.existing(this.state.templates, templateId, 'Update template details');
      return this.write(this.state.templates, { ...current, name, description, updated_at: this.now() });
    });
  }

  bumpTemplateVersion(templateId: string): Promise<TemplateRow> {
    return this.guard('Bump template version', () => {
      const current = this.existing(this.state.templates, templateId, 'Bump template version');
      return this.write(this.state.templates, { ...current, version: current.version + 1, updated_at: this.now() });
    });
  }

  deactivateTemplate(templateId: string): Promise<TemplateRow> {
    return this.guard('Deactivate template', () => {
      const current = this.existing(this.state.templates, templateId, 'Deactivate template');
      return this.write(this.state.templates, { ...current, is_active: false, updated_at: this.now() });
    });
  }

  deleteTemplateFields(templateId: string): Promise<number> {
    return this.guard('Delete template fields', () => {
      const ids = [...this.state.templateFields.values()]
        .filter((field) => field.template_id === templateId)
        .map((field) => field.id);
      ids.forEach((id) => this.remove(this.state.templateFields, id));
      return ids.length;
    });
  }

  deleteTemplateSigners(templateId: string): Promise<number> {
    return this.guard('Delete template signers', () => {
      const ids = [...this.state.templateSigners.values()]
        .filter((signer) => signer.template_id === templateId)
        .map((signer) => signer.id);
      for (const field of this.state.templateFields.values()) {
        if (ids.includes(field.signer_id)) {
          throw new ConstraintViolation('23503', 'template_fields_signer_id_fkey');
        }
      }
      ids.forEach((id) => this.remove(this.state.templateSigners, id));
      return ids.length;
    });
  }

  insertDocument(data: NewDocument): Promise<DocumentRow> {
    return this.guard('Insert document', () => {
      this.requireRow(this.state.templates, data.templateId, 'documents_template_id_fkey');
      const at = this.now();
      return this.write(this.state.documents, {
        id: data.id,
        template_id: data.templateId,
        name: data.name,
        s3_bucket: null,
        s3_key: null,
        template_snapshot: copy(data.snapshot),
        template_snapshot_hash: data.snapshotHash,
        final_document_hash: null,
        created_by: data.createdBy,
        tenant_id: data.tenantId,
        status: 'draft',
        expires_at: data.expiresAt,
        sent_at: null,
        completed_at: null,
        created_at: at,
        updated_at: at,
      });
    });
  }

  insertDocumentSigner(data: NewDocumentSigner): Promise<DocumentSignerRow> {
    return this.guard('Insert document signer', () => {
      this.requireRow(this.state.documents, data.documentId, 'document_signers_document_id_fkey');
      for (const signer of this.state.documentSigners.values()) {
        if (signer.access_token === data.accessToken) {
          throw new ConstraintViolation('23505', 'document_signers_unique_token');
        }
        if (signer.document_id !== data.documentId) {
          continue;
        }
        if (signer.signer_order === data.order) {
          throw new ConstraintViolation('23505', 'document_signers_unique_order');
        }
        if (signer.signer_email === data.email) {
          throw new ConstraintViolation('23505', 'document_signers_unique_email');
        }
      }
      return this.write(this.state.documentSigners, {
        id: data.id,
        document_id: data.documentId,
        template_signer_id: data.templateSignerId,
        signer_order: data.order,
        signer_email: data.email,
        signer_name: data.name,
        access_token: data.accessToken,
        status: 'pending',
        viewed_at: null,
        completed_at: null,
        created_at: this.now(),
      });
    });
  }

  findDocument(documentId: string, _options?: LockOptions): Promise<DocumentRow | null> {
    const row = this.state.documents.get(documentId);
    return Promise.resolve(row ? copy(row) : null);
  }

  listDocumentSigners(documentId: string): Promise<DocumentSignerRow[]> {
    return Promise.resolve(
      [...this.state.documentSigners.values()]
        .filter((signer) => signer.document_id === documentId)
        .sort((a, b) => a.signer_order - b.signer_order)
        .map(copy)
    );
  }

  findDocumentSigner(documentSignerId: string): Promise<DocumentSignerRow | null> {
    const row = this.state.documentSigners.get(documentSignerId);
    return Promise.resolve(row ? copy(row) : null);
  }

  findDocumentSignerByToken(accessToken: string): Promise<DocumentSignerRow | null> {
    const row = [...this.state.documentSigners.values()].find((signer) => signer.access_token === accessToken);
    return Promise.resolve(row ? copy(row) : null);
  }

  transitionDocument(documentId: string, transition: StatusTransition): Promise<DocumentRow | null> {
    return this.guard('Transition document', () => {
      const current = this.state.documents.get(documentId);
      if (!current || !transition.from.includes(current.status)) {
        return null;
      }
      return this.write(this.state.documents, {
        ...current,
        status: transition.to,
        sent_at: transition.sentAt ?? current.sent_at,
        updated_at: this.now(),
      });
    });
  }

  completeDocument(documentId: string, update: CompletionUpdate): Promise<DocumentRow | null> {
    return this.guard('Complete document', () => {
      const current = this.state.documents.get(documentId);
      if (!current || current.status !== 'in_progress') {
        return null;
      }
      if (!update.finalHash || !update.key) {
        throw new ConstraintViolation('23514', 'documents_completion_complete');
      }
      return this.write(this.state.documents, {
        ...current,
        status: 'completed',
        s3_bucket: update.bucket,
        s3_key: update.key,
        final_document_hash: update.finalHash,
        completed_at: update.completedAt,
        updated_at: this.now(),
      });
    });
  }

  listOverdueDocuments(now: Date, limit: number): Promise<DocumentRow[]> {
    return Promise.resolve(
      [...this.state.documents.values()]
        .filter(
          (document) =>
            document.expires_at !== null &&
            document.expires_at.getTime() <= now.getTime() &&
            OPEN_STATUSES.includes(document.status)
        )
        .sort((a, b) => (a.expires_at?.getTime() ?? 0) - (b.expires_at?.getTime() ?? 0))
        .slice(0, limit)
        .map(copy)
    );
  }

  updateSignerAccessToken(documentSignerId: string, accessToken: string): Promise<void> {
    return this.guard('Update signer access token', () => {
      for (const signer of this.state.documentSigners.values()) {
        if (signer.id !== documentSignerId && signer.access_token === accessToken) {
          throw new ConstraintViolation('23505', 'document_signers_unique_token');
        }
      }
      const current = this.state.documentSigners.get(documentSignerId);
      if (current) {
        this.write(this.state.documentSigners, { ...current, access_token: accessToken });
      }
    });
  }

  updateSignerStatus(documentSignerId: string, status: SignerStatus, at: Date): Promise<DocumentSignerRow> {
    return this.guard('Update signer status', () => {
      const current = this.existing(this.state.documentSigners, documentSignerId, 'Update signer status');
      const touchesView = status === 'viewed' || status === 'in_progress';
      return this.write(this.state.documentSigners, {
        ...current,
        status,
        viewed_at: touchesView ? (current.viewed_at ?? at) : current.viewed_at,
        completed_at: status === 'completed' ? at : current.completed_at,
      });
    });
  }

  upsertSubmission(data: SubmissionUpsert): Promise<FormSubmissionRow> {
    return this.guard('Upsert form submission', () => {
      this.requireRow(this.state.documents, data.documentId, 'form_submissions_document_id_fkey');
      this.requireRow(this.state.documentSigners, data.documentSignerId, 'form_submissions_document_signer_id_fkey');
      const existing = [...this.state.submissions.values()].find(
        (row) =>
          row.document_id === data.documentId &&
          row.document_signer_id === data.documentSignerId &&
          row.field_id === data.fieldId
      );
      return this.write(this.state.submissions, {
        id: existing?.id ?? data.id,
        document_id: data.documentId,
        document_signer_id: data.documentSignerId,
        field_id: data.fieldId,
        field_name: data.fieldName,
        field_type: data.fieldType,
        encrypted_value: data.encryptedValue,
        encryption_key_id: data.encryptionKeyId,
        submitted_at: this.now(),
        ip_address: data.ip,
        user_agent: data.userAgent,
      });
    });
  }

  listSubmissions(documentId: string): Promise<FormSubmissionRow[]> {
    return Promise.resolve(
      [...this.state.submissions.values()].filter((row) => row.document_id === documentId).map(copy)
    );
  }

  insertSignature(data: NewSignature): Promise<DigitalSignatureRow> {
    return this.guard('Insert digital signature', () => {
      this.requireRow(this.state.documents, data.documentId, 'digital_signatures_document_id_fkey');
      this.requireRow(this.state.documentSigners, data.documentSignerId, 'digital_signatures_document_signer_id_fkey');
      for (const row of this.state.signatures.values()) {
        if (row.document_id === data.documentId && row.document_signer_id === data.documentSignerId) {
          throw new ConstraintViolation('23505', 'digital_signatures_one_per_signer');
        }
      }
      return this.write(this.state.signatures, {
        id: data.id,
        document_id: data.documentId,
        document_signer_id: data.documentSignerId,
        signer_email: data.email,
        signer_name: data.name,
        final_document_hash: null,
        digital_signature: data.signature,
        certificate: data.certificate,
        signature_algorithm: data.algorithm,
        signed_at: this.now(),
        ip_address: data.ip,
        user_agent: data.userAgent,
      });
    });
  }

  listSignatures(documentId: string): Promise<DigitalSignatureRow[]> {
    return Promise.resolve(
      [...this.state.signatures.values()].filter((row) => row.document_id === documentId).map(copy)
    );
  }

  stampSignatureHashes(documentId: string, finalHash: string): Promise<number> {
    return this.guard('Stamp signature hashes', () => {
      const rows = [...this.state.signatures.values()].filter((row) => row.document_id === documentId);
      rows.forEach((row) => this.write(this.state.signatures, { ...row, final_document_hash: finalHash }));
      return rows.length;
    });
  }

  insertAuditEntry(data: NewAuditEntry): Promise<AuditLogRow> {
    return this.guard('Insert audit entry', () => {
      this.requireRow(this.state.documents, data.documentId, 'document_audit_log_document_id_fkey');
      this.requireRow(this.state.templates, data.templateId, 'document_audit_log_template_id_fkey');
      return this.write(this.state.audit, {
        id: data.id,
        document_id: data.documentId,
        template_id: data.templateId,
        user_id: data.userId,
        action: data.action,
        details: copy(data.details),
        ip_address: data.ip,
        user_agent: data.userAgent,
        created_at: this.now(),
      });
    });
  }

  listAuditEntries(query: AuditQuery): Promise<AuditLogRow[]> {
    if (!query.documentId && !query.templateId) {
      return Promise.resolve([]);
    }
    return Promise.resolve(
      [...this.state.audit.values()]
        .filter(
          (row) =>
            (!query.documentId || row.document_id === query.documentId) &&
            (!query.templateId || row.template_id === query.templateId)
        )
        .map(copy)
    );
  }
}

export interface InMemorySigningStoreOptions {
  now?: () => Date;
}

/**
 * Process-local store with the same contract as the Postgres one.
 * Transactions run one at a time and undo their writes on failure.
 */
export class InMemorySigningStore implements SigningStore {
  private readonly state: MemoryState = {
    templates: new Map(),
    templateSigners: new Map(),
    templateFields: new Map(),
    documents: new Map(),
    documentSigners: new Map(),
    submissions: new Map(),
    signatures: new Map(),
    audit: new Map(),
  };
  private readonly now: () => Date;
  private tail: Promise<void> = Promise.resolve();

  constructor(options: InMemorySigningStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  repository(): SigningRepository {
    return new InMemorySigningRepository(this.state, this.now, null);
  }

  async withTransaction<T>(work: (repository: SigningRepository) => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => current);
    await previous;

    const journal: UndoStep[] = [];
    try {
      return await work(new InMemorySigningRepository(this.state, this.now, journal));
    } catch (error) {
      for (const undo of journal.reverse()) {
        undo();
      }
      throw classifyPersistenceError(error, 'Transaction');
    } finally {
      release();
    }
  }

  async readinessCheck(): Promise<void> {
    await this.tail;
  }

  async close(): Promise<void> {
    await this.tail;
  }
}
