import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import {
  AuditLogRow,
  DigitalSignatureRow,
  DocumentRow,
  DocumentSignerRow,
  FormSubmissionRow,
  SignerStatus,
  TemplateFieldRow,
  TemplateListRow,
  TemplateRow,
  TemplateSignerRow,
} from '../types';
import { classifyPersistenceError } from '../utils/errors';
import { Logger } from '../utils/logger';
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

export interface Queryable {
  query<R extends QueryResultRow>(sql: string, params?: unknown[]): Promise<QueryResult<R>>;
}

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const OPEN_STATUSES = ['draft', 'scheduled', 'sent', 'in_progress'];

function lockClause(options?: LockOptions): string {
  return options?.forUpdate ? ' FOR UPDATE' : '';
}

export class PostgresSigningRepository implements SigningRepository {
  constructor(private readonly db: Queryable) {}

  private async run<R extends QueryResultRow>(operation: string, sql: string, params: unknown[]): Promise<QueryResult<R>> {
    try {
      return await this.db.query<R>(sql, params);
    } catch (error) {
      const classified = classifyPersistenceError(error, operation);
      Logger.error('Database operation failed', { operation, kind: classified.kind, error: classified.message });
      throw classified;
    }
  }

  private async one<R extends QueryResultRow>(operation: string, sql: string, params: unknown[]): Promise<R> {
    const result = await this.run<R>(operation, sql, params);
    const row = result.rows[0];
    if (!row) {
      throw classifyPersistenceError(new Error(`${operation} returned no row`), operation);
    }
    return row;
  }

  private async maybeOne<R extends QueryResultRow>(operation: string, sql: string, params: unknown[]): Promise<R | null> {
    const result = await this.run<R>(operation, sql, params);
    return result.rows[0] ?? null;
  }

  insertTemplate(data: NewTemplate): Promise<TemplateRow> {
    return this.one<TemplateRow>(
      'Insert template',
      `INSERT INTO templates (
          id, name, description, s3_bucket, s3_key, pdf_hash, file_size,
          mime_type, total_pages, created_by, tenant_id
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
        RETURNING *`,
      [
        data.id,
        data.name,
        data.description,
        data.bucket,
        data.key,
        data.pdfHash,
        data.fileSize,
        data.mimeType,
        data.totalPages,
        data.createdBy,
        data.tenantId,
      ]
    );
  }

  insertTemplateSigner(data: NewTemplateSigner): Promise<TemplateSignerRow> {
    return this.one<TemplateSignerRow>(
      'Insert template signer',
      `INSERT INTO template_signers (id, template_id, signer_order, signer_name, signer_color)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING *`,
      [data.id, data.templateId, data.order, data.name, data.color]
    );
  }

  insertTemplateField(data: NewTemplateField): Promise<TemplateFieldRow> {
    return this.one<TemplateFieldRow>(
      'Insert template field',
      `INSERT INTO template_fields (
          id, template_id, signer_id, field_name, field_type, field_label,
          placeholder_text, position_data, validation_rules, required, version
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8::jsonb, $9::jsonb, $10, $11)
        RETURNING *`,
      [
        data.id,
        data.templateId,
        data.signerId,
        data.name,
        data.type,
        data.label,
        data.placeholder,
        JSON.stringify(data.position),
        JSON.stringify(data.validationRules),
        data.required,
        data.version,
      ]
    );
  }

  async findTemplate(templateId: string, options?: LockOptions): Promise<TemplateRow | null> {
    if (!UUID_PATTERN.test(templateId)) {
      return null;
    }
    return this.maybeOne<TemplateRow>(
      'Find template',
      `SELECT * FROM templates WHERE id = $1${lockClause(options)}`,
      [templateId]
    );
  }

  async listTemplatesForTenant(tenantId: string): Promise<TemplateListRow[]> {
    const result = await this.run<TemplateListRow>(
      'List templates',
      `SELECT t.*,
              (SELECT COUNT(*)::int FROM template_signers s WHERE s.template_id = t.id) AS signer_count,
              (SELECT COUNT(*)::int FROM template_fields f WHERE f.template_id = t.id) AS field_count
       FROM templates t
       WHERE t.tenant_id = $1 AND t.is_active = TRUE
       ORDER BY t.created_at DESC, t.id ASC`,
      [tenantId]
    );
    return result.rows;
  }

  async listTemplateSigners(templateId: string): Promise<TemplateSignerRow[]> {
    const result = await this.run<TemplateSignerRow>(
      'List template signers',
      'SELECT * FROM template_signers WHERE template_id = $1 ORDER BY signer_order ASC',
      [templateId]
    );
    return result.rows;
  }

  async listTemplateFields(templateId: string): Promise<TemplateFieldRow[]> {
    const result = await this.run<TemplateFieldRow>(
      'List template fields',
      'SELECT * FROM template_fields WHERE template_id = $1 ORDER BY created_at ASC, field_name ASC',
      [templateId]
    );
    return result.rows;
  }

  updateTemplateDetails(templateId: string, name: string, description: string): Promise<TemplateRow> {
    return this.one<TemplateRow>(
      'Update template details',
      `UPDATE templates
       SET name = $2, description = $3, updated_at = NOW()
       WHERE id = $1
       RETURNING *`,
      [templateId, name, description]
    );
  }

  bumpTemplateVersion(templateId: string): Promise<TemplateRow> {
    return this.one<TemplateRow>(
      'Bump template version',
      `UPDATE templates
       SET version = version + 1, updated_at = NOW()
       WHERE id = $1
       RETURNING *`,
      [templateId]
    );
  }

  deactivateTemplate(templateId: string): Promise<TemplateRow> {
    return this.one<TemplateRow>(
      'Deactivate template',
      `UPDATE templates
       SET is_active = FALSE, updated_at = NOW()
       WHERE id = $1
       RETURNING *`,
      [templateId]
    );
  }

  async deleteTemplateFields(templateId: string): Promise<number> {
    const result = await this.run('Delete template fields', 'DELETE FROM template_fields WHERE template_id = $1', [
      templateId,
    ]);
    return result.rowCount ?? 0;
  }

  async deleteTemplateSigners(templateId: string): Promise<number> {
    const result = await this.run('Delete template signers', 'DELETE FROM template_signers WHERE template_id = $1', [
      templateId,
    ]);
    return result.rowCount ?? 0;
  }

  insertDocument(data: NewDocument): Promise<DocumentRow> {
    return this.one<DocumentRow>(
      'Insert document',
      `INSERT INTO documents (
          id, template_id, name, template_snapshot, template_snapshot_hash,
          created_by, tenant_id, status, expires_at
        ) VALUES ($1, $2, $3, $4::jsonb, $5, $6, $7, 'draft', $8)
        RETURNING *`,
      [
        data.id,
        data.templateId,
        data.name,
        JSON.stringify(data.snapshot),
        data.snapshotHash,
        data.createdBy,
        data.tenantId,
        data.expiresAt,
      ]
    );
  }

  insertDocumentSigner(data: NewDocumentSigner): Promise<DocumentSignerRow> {
    return this.one<DocumentSignerRow>(
      'Insert document signer',
      `INSERT INTO document_signers (
          id, document_id, template_signer_id, signer_order, signer_email, signer_name, access_token
        ) VALUES ($1, $2, $3, $4, $5, $6, $7)
        RETURNING *`,
      [data.id, data.documentId, data.templateSignerId, data.order, data.email, data.name, data.accessToken]
    );
  }

  async findDocument(documentId: string, options?: LockOptions): Promise<DocumentRow | null> {
    if (!UUID_PATTERN.test(documentId)) {
      return null;
    }
    return this.maybeOne<DocumentRow>(
      'Find document',
      `SELECT * FROM documents WHERE id = $1${lockClause(options)}`,
      [documentId]
    );
  }

  async listDocumentSigners(documentId: string): Promise<DocumentSignerRow[]> {
    const result = await this.run<DocumentSignerRow>(
      'List document signers',
      'SELECT * FROM document_signers WHERE document_id = $1 ORDER BY signer_order ASC',
      [documentId]
    );
    return result.rows;
  }

  async findDocumentSigner(documentSignerId: string): Promise<DocumentSignerRow | null> {
    if (!UUID_PATTERN.test(documentSignerId)) {
      return null;
    }
    return this.maybeOne<DocumentSignerRow>(
      'Find document signer',
      'SELECT * FROM document_signers WHERE id = $1',
      [documentSignerId]
    );
  }

  findDocumentSignerByToken(accessToken: string): Promise<DocumentSignerRow | null> {
    return this.maybeOne<DocumentSignerRow>(
      'Find document signer by token',
      'SELECT * FROM document_signers WHERE access_token = $1',
      [accessToken]
    );
  }

  transitionDocument(documentId: string, transition: StatusTransition): Promise<DocumentRow | null> {
    return this.maybeOne<DocumentRow>(
      'Transition document',
      `UPDATE documents
       SET status = $2,
           sent_at = COALESCE($3::timestamptz, sent_at),
           updated_at = NOW()
       WHERE id = $1 AND status = ANY($4::text[])
       RETURNING *`,
      [documentId, transition.to, transition.sentAt ?? null, transition.from]
    );
  }

  completeDocument(documentId: string, update: CompletionUpdate): Promise<DocumentRow | null> {
    return this.maybeOne<DocumentRow>(
      'Complete document',
      `UPDATE documents
       SET status = 'completed',
           s3_bucket = $2,
           s3_key = $3,
           final_document_hash = $4,
           completed_at = $5,
           updated_at = NOW()
       WHERE id = $1 AND status = 'in_progress'
       RETURNING *`,
      [documentId, update.bucket, update.key, update.finalHash, update.completedAt]
    );
  }

  async listOverdueDocuments(now: Date, limit: number): Promise<DocumentRow[]> {
    const result = await this.run<DocumentRow>(
      'List overdue documents',
      `SELECT * FROM documents
       WHERE expires_at IS NOT NULL
         AND expires_at <= $1
         AND status = ANY($2::text[])
       ORDER BY expires_at ASC
       LIMIT $3`,
      [now, OPEN_STATUSES, limit]
    );
    return result.rows;
  }

  async updateSignerAccessToken(documentSignerId: string, accessToken: string): Promise<void> {
    await this.run('Update signer access token', 'UPDATE document_signers SET access_token = $2 WHERE id = $1', [
      documentSignerId,
      accessToken,
    ]);
  }

  updateSignerStatus(documentSignerId: string, status: SignerStatus, at: Date): Promise<DocumentSignerRow> {
    return this.one<DocumentSignerRow>(
      'Update signer status',
      `UPDATE document_signers
       SET status = $2::varchar,
           viewed_at = CASE WHEN $2::varchar IN ('viewed', 'in_progress') THEN COALESCE(viewed_at, $3::timestamptz) ELSE viewed_at END,
           completed_at = CASE WHEN $2::varchar = 'completed' THEN $3::timestamptz ELSE completed_at END
       WHERE id = $1
       RETURNING *`,
      [documentSignerId, status, at]
    );
  }

  upsertSubmission(data: SubmissionUpsert): Promise<FormSubmissionRow> {
    return this.one<FormSubmissionRow>(
      'Upsert form submission',
      `INSERT INTO form_submissions (
          id, document_id, document_signer_id, field_id, field_name, field_type,
          encrypted_value, encryption_key_id, ip_address, user_agent
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
        ON CONFLICT (document_id, document_signer_id, field_id)
        DO UPDATE SET
          field_name = EXCLUDED.field_name,
          field_type = EXCLUDED.field_type,
          encrypted_value = EXCLUDED.encrypted_value,
          encryption_key_id = EXCLUDED.encryption_key_id,
          submitted_at = NOW(),
          ip_address = EXCLUDED.ip_address,
          user_agent = EXCLUDED.user_agent
        RETURNING *`,
      [
        data.id,
        data.documentId,
        data.documentSignerId,
        data.fieldId,
        data.fieldName,
        data.fieldType,
        data.encryptedValue,
        data.encryptionKeyId,
        data.ip,
        data.userAgent,
      ]
    );
  }

  async listSubmissions(documentId: string): Promise<FormSubmissionRow[]> {
    const result = await this.run<FormSubmissionRow>(
      'List form submissions',
      'SELECT * FROM form_submissions WHERE document_id = $1 ORDER BY submitted_at ASC',
      [documentId]
    );
    return result.rows;
  }

  insertSignature(data: NewSignature): Promise<DigitalSignatureRow> {
    return this.one<DigitalSignatureRow>(
      'Insert digital signature',
      `INSERT INTO digital_signatures (
          id, document_id, document_signer_id, signer_email, signer_name,
          digital_signature, certificate, signature_algorithm, ip_address, user_agent
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
        RETURNING *`,
      [
        data.id,
        data.documentId,
        data.documentSignerId,
        data.email,
        data.name,
        data.signature,
        data.certificate,
        data.algorithm,
        data.ip,
        data.userAgent,
      ]
    );
  }

  async listSignatures(documentId: string): Promise<DigitalSignatureRow[]> {
    const result = await this.run<DigitalSignatureRow>(
      'List digital signatures',
      'SELECT * FROM digital_signatures WHERE document_id = $1 ORDER BY signed_at ASC',
      [documentId]
    );
    return result.rows;
  }

  async stampSignatureHashes(documentId: string, finalHash: string): Promise<number> {
    const result = await this.run(
      'Stamp signature hashes',
      'UPDATE digital_signatures SET final_document_hash = $2 WHERE document_id = $1',
      [documentId, finalHash]
    );
    return result.rowCount ?? 0;
  }

  insertAuditEntry(data: NewAuditEntry): Promise<AuditLogRow> {
    return this.one<AuditLogRow>(
      'Insert audit entry',
      `INSERT INTO document_audit_log (
          id, document_id, template_id, user_id, action, details, ip_address, user_agent
        ) VALUES ($1, $2, $3, $4, $5, $6::jsonb, $7, $8)
        RETURNING *`,
      [
        data.id,
        data.documentId,
        data.templateId,
        data.userId,
        data.action,
        JSON.stringify(data.details),
        data.ip,
        data.userAgent,
      ]
    );
  }

  async listAuditEntries(query: AuditQuery): Promise<AuditLogRow[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (query.documentId) {
      params.push(query.documentId);
      conditions.push(`document_id = $${params.length}`);
    }

    if (query.templateId) {
      params.push(query.templateId);
      conditions.push(`template_id = $${params.length}`);
    }

    if (conditions.length === 0) {
      return [];
    }

    const result = await this.run<AuditLogRow>(
      'List audit entries',
      `SELECT * FROM document_audit_log
       WHERE ${conditions.join(' AND ')}
       ORDER BY created_at ASC, id ASC`,
      params
    );
    return result.rows;
  }
}

function poolQueryable(pool: Pool): Queryable {
  return {
    query: <R extends QueryResultRow>(sql: string, params?: unknown[]) => pool.query<R>(sql, params),
  };
}

function clientQueryable(client: PoolClient): Queryable {
  return {
    query: <R extends QueryResultRow>(sql: string, params?: unknown[]) => client.query<R>(sql, params),
  };
}

export class PostgresSigningStore implements SigningStore {
  constructor(private readonly pool: Pool) {}

  repository(): SigningRepository {
    return new PostgresSigningRepository(poolQueryable(this.pool));
  }

  async withTransaction<T>(work: (repository: SigningRepository) => Promise<T>): Promise<T> {
    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw classifyPersistenceError(error, 'Acquire database connection');
    }

    try {
      await client.query('BEGIN');
      const result = await work(new PostgresSigningRepository(clientQueryable(client)));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        Logger.error('Transaction rollback failed', {
          error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
        });
      }
      throw classifyPersistenceError(error, 'Transaction');
    } finally {
      client.release();
    }
  }

  async readinessCheck(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  async close(): Promise<void> {
    await this.pool.end();
    Logger.info('Database connection pool closed');
  }
}
