import { SigningRepository, SigningStore } from '../database/store';
import { ContentStore } from '../storage/content-store';
import {
  AuditLogRow,
  CreateDocumentInput,
  DocumentRow,
  DocumentSignerRow,
  DocumentStatus,
  DocumentView,
  Principal,
  PublicDocumentSigner,
  RequestContext,
} from '../types';
import { ConflictError, DocumentClosedError, NotFoundError, ValidationError } from '../utils/errors';
import { generateAccessToken, generateId, isWellFormedAccessToken } from '../utils/crypto';
import { Logger } from '../utils/logger';
import { AuditTrail } from './audit';
import { Action, authorize } from './authorization';
import { assertValidTransition, isOverdue, isTerminal, sourcesFor } from './lifecycle';
import { SigningNotifications } from './notify';
import { buildTemplateSnapshot, hashTemplateSnapshot } from './snapshot';
import { MAX_NAME_LENGTH, normalizeRecipients } from './validation';

const HOUR_MS = 60 * 60 * 1000;
const DEFAULT_SWEEP_LIMIT = 100;

export interface DocumentServiceDeps {
  store: SigningStore;
  content: ContentStore;
  audit: AuditTrail;
  notifications: SigningNotifications;
  defaultTtlHours: number;
  now?: () => Date;
}

export interface CreatedDocument {
  document: DocumentRow;
  /** Includes access tokens; only the sender ever sees them. */
  signers: DocumentSignerRow[];
}

export interface AuditTrailQuery {
  documentId?: string;
  templateId?: string;
}

export interface SweepResult {
  expired: string[];
  failed: string[];
}

export function toPublicSigner(signer: DocumentSignerRow): PublicDocumentSigner {
  const { access_token: _token, ...rest } = signer;
  return rest;
}

export class DocumentService {
  private readonly now: () => Date;

  constructor(private readonly deps: DocumentServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  private async loadDocument(
    repository: SigningRepository,
    principal: Principal,
    documentId: string,
    action: Action,
    forUpdate = false
  ): Promise<DocumentRow> {
    const document = await repository.findDocument(documentId, { forUpdate });
    if (!document) {
      throw new NotFoundError('Document', documentId);
    }

    authorize(principal, action, {
      entity: 'Document',
      id: document.id,
      tenantId: document.tenant_id,
      createdBy: document.created_by,
    });

    return document;
  }

  async createDocument(
    principal: Principal,
    input: CreateDocumentInput,
    context: RequestContext = {}
  ): Promise<CreatedDocument> {
    authorize(principal, 'document:create');

    const name = input.name.trim();
    if (name.length === 0 || name.length > MAX_NAME_LENGTH) {
      throw new ValidationError(`name must be 1-${MAX_NAME_LENGTH} characters`, [
        { path: 'name', message: `name must be 1-${MAX_NAME_LENGTH} characters` },
      ]);
    }

    const now = this.now();
    const expiresAt = input.expiresAt ?? new Date(now.getTime() + this.deps.defaultTtlHours * HOUR_MS);
    if (Number.isNaN(expiresAt.getTime()) || expiresAt.getTime() <= now.getTime()) {
      throw new ValidationError('expiresAt must be in the future', [
        { path: 'expiresAt', message: 'expiresAt must be in the future' },
      ]);
    }

    const created = await this.deps.store.withTransaction(async (repository) => {
      const template = await repository.findTemplate(input.templateId, { forUpdate: true });
      if (!template || !template.is_active) {
        throw new NotFoundError('Template', input.templateId);
      }
      authorize(principal, 'template:read', {
        entity: 'Template',
        id: template.id,
        tenantId: template.tenant_id,
        createdBy: template.created_by,
      });

      const [templateSigners, templateFields] = await Promise.all([
        repository.listTemplateSigners(template.id),
        repository.listTemplateFields(template.id),
      ]);
      const snapshot = buildTemplateSnapshot(template, templateSigners, templateFields);
      const recipients = normalizeRecipients(input.recipients, snapshot.signers);

      const document = await repository.insertDocument({
        id: generateId(),
        templateId: template.id,
        name,
        snapshot,
        snapshotHash: hashTemplateSnapshot(snapshot),
        createdBy: principal.userId,
        tenantId: principal.tenantId,
        expiresAt,
      });

      const signers: DocumentSignerRow[] = [];
      for (const role of snapshot.signers) {
        const recipient = recipients.find((candidate) => candidate.order === role.order);
        if (!recipient) {
          continue;
        }
        signers.push(
          await repository.insertDocumentSigner({
            id: generateId(),
            documentId: document.id,
            templateSignerId: role.id,
            order: recipient.order,
            email: recipient.email,
            name: recipient.name,
            accessToken: generateAccessToken(),
          })
        );
      }

      return { document, signers };
    });

    Logger.info('Document created', {
      documentId: created.document.id,
      templateId: created.document.template_id,
      tenantId: principal.tenantId,
      signers: created.signers.length,
    });

    await this.deps.audit.record({
      action: 'document_created',
      documentId: created.document.id,
      templateId: created.document.template_id,
      userId: principal.userId,
      details: {
        name,
        templateVersion: created.document.template_snapshot.templateVersion,
        snapshotHash: created.document.template_snapshot_hash,
        recipients: created.signers.map((signer) => signer.signer_email),
        expiresAt: expiresAt.toISOString(),
      },
      context,
    });

    return created;
  }

  /**
   * Moves an overdue, still-open document to `expired`. Returns the row as it
   * stands afterwards; documents that are not overdue come back unchanged.
   */
  async expireIfOverdue(document: DocumentRow, context: RequestContext = {}): Promise<DocumentRow> {
    if (!isOverdue(document, this.now())) {
      return document;
    }

    const expired = await this.deps.store.withTransaction(async (repository) =>
      repository.transitionDocument(document.id, { from: sourcesFor('expired'), to: 'expired' })
    );

    if (!expired) {
      const current = await this.deps.store.repository().findDocument(document.id);
      return current ?? document;
    }

    Logger.info('Document expired', { documentId: expired.id, expiresAt: expired.expires_at?.toISOString() });
    await this.deps.audit.record({
      action: 'document_expired',
      documentId: expired.id,
      templateId: expired.template_id,
      details: { previousStatus: document.status, expiresAt: expired.expires_at?.toISOString() ?? null },
      context,
    });

    return expired;
  }

  private async transition(
    principal: Principal,
    documentId: string,
    next: DocumentStatus,
    prepare?: (repository: SigningRepository, document: DocumentRow) => Promise<void>
  ): Promise<{ before: DocumentRow; after: DocumentRow }> {
    const current = await this.loadDocument(this.deps.store.repository(), principal, documentId, 'document:manage');
    const fresh = await this.expireIfOverdue(current);
    if (isTerminal(fresh.status)) {
      throw new DocumentClosedError(fresh.id, fresh.status);
    }

    return this.deps.store.withTransaction(async (repository) => {
      const before = await this.loadDocument(repository, principal, documentId, 'document:manage', true);
      assertValidTransition(before.id, before.status, next);

      if (prepare) {
        await prepare(repository, before);
      }

      const after = await repository.transitionDocument(before.id, {
        from: [before.status],
        to: next,
        sentAt: next === 'sent' ? this.now() : undefined,
      });
      if (!after) {
        throw new ConflictError(`Document ${before.id} changed status concurrently`, { documentId: before.id });
      }
      return { before, after };
    });
  }

  async scheduleDocument(principal: Principal, documentId: string): Promise<DocumentRow> {
    const { after } = await this.transition(principal, documentId, 'scheduled');
    Logger.info('Document scheduled', { documentId: after.id, userId: principal.userId });
    return after;
  }

  async sendDocument(principal: Principal, documentId: string, context: RequestContext = {}): Promise<DocumentRow> {
    let signers: DocumentSignerRow[] = [];
    let regenerated = 0;

    const { before, after } = await this.transition(principal, documentId, 'sent', async (repository, document) => {
      signers = await repository.listDocumentSigners(document.id);
      if (signers.length === 0) {
        throw new ConflictError(`Document ${document.id} has no recipients`, { documentId: document.id });
      }

      for (const signer of signers) {
        if (!isWellFormedAccessToken(signer.access_token)) {
          const accessToken = generateAccessToken();
          await repository.updateSignerAccessToken(signer.id, accessToken);
          signer.access_token = accessToken;
          regenerated += 1;
        }
      }
    });

    Logger.info('Document sent', { documentId: after.id, recipients: signers.length, regeneratedTokens: regenerated });

    await this.deps.audit.record({
      action: 'document_sent',
      documentId: after.id,
      templateId: after.template_id,
      userId: principal.userId,
      details: { previousStatus: before.status, recipients: signers.length, regeneratedTokens: regenerated },
      context,
    });

    for (const signer of signers) {
      this.deps.notifications.documentSent(after, signer);
    }

    return after;
  }

  async cancelDocument(
    principal: Principal,
    documentId: string,
    reason?: string,
    context: RequestContext = {}
  ): Promise<DocumentRow> {
    const { before, after } = await this.transition(principal, documentId, 'cancelled');
    Logger.info('Document cancelled', { documentId: after.id, userId: principal.userId });

    await this.deps.audit.record({
      action: 'document_cancelled',
      documentId: after.id,
      templateId: after.template_id,
      userId: principal.userId,
      details: { previousStatus: before.status, reason: reason?.trim() || null },
      context,
    });

    return after;
  }

  /** System-initiated expiry, used by the sweeper. */
  async expireDocument(documentId: string): Promise<DocumentRow> {
    const document = await this.deps.store.repository().findDocument(documentId);
    if (!document) {
      throw new NotFoundError('Document', documentId);
    }
    if (document.status === 'expired') {
      return document;
    }
    if (isTerminal(document.status)) {
      throw new DocumentClosedError(document.id, document.status);
    }

    const expired = await this.deps.store.withTransaction(async (repository) =>
      repository.transitionDocument(document.id, { from: sourcesFor('expired'), to: 'expired' })
    );
    if (!expired) {
      throw new ConflictError(`Document ${document.id} changed status concurrently`, { documentId: document.id });
    }

    await this.deps.audit.record({
      action: 'document_expired',
      documentId: expired.id,
      templateId: expired.template_id,
      details: { previousStatus: document.status, expiresAt: expired.expires_at?.toISOString() ?? null },
    });

    return expired;
  }

  async expireOverdueDocuments(now: Date = this.now(), limit = DEFAULT_SWEEP_LIMIT): Promise<SweepResult> {
    const overdue = await this.deps.store.repository().listOverdueDocuments(now, limit);
    const result: SweepResult = { expired: [], failed: [] };

    for (const document of overdue) {
      try {
        const expired = await this.expireDocument(document.id);
        if (expired.status === 'expired') {
          result.expired.push(document.id);
        }
      } catch (error) {
        result.failed.push(document.id);
        Logger.error('Failed to expire overdue document', {
          documentId: document.id,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    if (overdue.length > 0) {
      Logger.info('Expiry sweep finished', { expired: result.expired.length, failed: result.failed.length });
    }

    return result;
  }

  async getDocument(principal: Principal, documentId: string): Promise<DocumentView> {
    const repository = this.deps.store.repository();
    const loaded = await this.loadDocument(repository, principal, documentId, 'document:read');
    const document = await this.expireIfOverdue(loaded);

    const [signers, submissions, signatures] = await Promise.all([
      repository.listDocumentSigners(document.id),
      repository.listSubmissions(document.id),
      repository.listSignatures(document.id),
    ]);

    return {
      document,
      signers: signers.map(toPublicSigner),
      submittedFieldIds: submissions
        .filter((submission) => submission.encrypted_value !== null)
        .map((submission) => ({ documentSignerId: submission.document_signer_id, fieldId: submission.field_id })),
      signatures,
    };
  }

  async getFinalDocument(principal: Principal, documentId: string): Promise<{ document: DocumentRow; pdf: Buffer }> {
    const document = await this.loadDocument(this.deps.store.repository(), principal, documentId, 'document:read');

    if (document.status !== 'completed' || !document.s3_key || !document.final_document_hash) {
      throw new ConflictError(`Document ${document.id} is not completed`, {
        documentId: document.id,
        status: document.status,
      });
    }

    const verified = await this.deps.content.verify(document.s3_key, document.final_document_hash);
    return { document, pdf: verified.data };
  }

  async listAuditTrail(principal: Principal, query: AuditTrailQuery): Promise<AuditLogRow[]> {
    const repository = this.deps.store.repository();

    if (!query.documentId && !query.templateId) {
      throw new ValidationError('documentId or templateId is required', [
        { path: 'query', message: 'documentId or templateId is required' },
      ]);
    }

    if (query.documentId) {
      await this.loadDocument(repository, principal, query.documentId, 'audit:read');
    }

    if (query.templateId) {
      const template = await repository.findTemplate(query.templateId);
      if (!template) {
        throw new NotFoundError('Template', query.templateId);
      }
      authorize(principal, 'audit:read', {
        entity: 'Template',
        id: template.id,
        tenantId: template.tenant_id,
        createdBy: template.created_by,
      });
    }

    return repository.listAuditEntries(query);
  }
}
