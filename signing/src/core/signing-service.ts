import { SigningRepository, SigningStore } from '../database/store';
import {
  incrementCompletionRaceLost,
  incrementContentCleanupFailure,
  incrementDocumentsCompleted,
} from '../metrics/counters';
import { composeFinalPdf, StampedValue } from '../pdf/compose';
import { AesGcmCipher } from '../storage/cipher';
import { ContentStore, finalDocumentObjectPath } from '../storage/content-store';
import {
  DigitalSignatureRow,
  DocumentRow,
  DocumentSignerRow,
  FieldType,
  FormSubmissionRow,
  PublicDocumentSigner,
  RequestContext,
  SignatureInput,
  SnapshotField,
} from '../types';
import {
  ConflictError,
  DocumentClosedError,
  NotFoundError,
  PermissionError,
  ValidationError,
  ValidationIssue,
} from '../utils/errors';
import { generateId, isWellFormedAccessToken } from '../utils/crypto';
import { Logger } from '../utils/logger';
import { AuditTrail } from './audit';
import { DocumentService, toPublicSigner } from './document-service';
import { assertAcceptsSubmissions, isOverdue, isTerminal } from './lifecycle';
import { SigningNotifications } from './notify';
import { assertFieldValue } from './validation';

export const DEFAULT_SIGNATURE_ALGORITHM = 'RSA-SHA256';
const MAX_SIGNATURE_LENGTH = 100000;
const MAX_CERTIFICATE_LENGTH = 100000;
const MAX_ALGORITHM_LENGTH = 100;

/** A recipient is addressed either by its access token or by its row id. */
export type SignerRef = { accessToken: string } | { documentSignerId: string };

export interface SigningServiceDeps {
  store: SigningStore;
  content: ContentStore;
  submissionCipher: AesGcmCipher;
  documents: DocumentService;
  audit: AuditTrail;
  notifications: SigningNotifications;
  now?: () => Date;
}

export interface SignerSession {
  document: DocumentRow;
  signer: PublicDocumentSigner;
  fields: SnapshotField[];
  submittedFieldIds: string[];
}

export interface SubmissionReceipt {
  submissionId: string;
  fieldId: string;
  fieldName: string;
  submittedAt: Date;
  documentStatus: DocumentRow['status'];
}

export interface SubmittedValue {
  fieldId: string;
  fieldName: string;
  fieldType: FieldType;
  value: string | null;
  submittedAt: Date;
}

export interface SignResult {
  signature: DigitalSignatureRow;
  document: DocumentRow;
  completed: boolean;
}

function hasValue(submission: FormSubmissionRow | undefined): boolean {
  return submission !== undefined && submission.encrypted_value !== null;
}

function missingRequiredFields(
  document: DocumentRow,
  signer: DocumentSignerRow,
  submissions: FormSubmissionRow[]
): SnapshotField[] {
  return document.template_snapshot.fields.filter(
    (field) =>
      field.required &&
      field.signerId === signer.template_signer_id &&
      !hasValue(
        submissions.find(
          (submission) => submission.document_signer_id === signer.id && submission.field_id === field.id
        )
      )
  );
}

export class SigningService {
  private readonly now: () => Date;

  constructor(private readonly deps: SigningServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  private async findSigner(ref: SignerRef): Promise<DocumentSignerRow> {
    const repository = this.deps.store.repository();

    if ('accessToken' in ref) {
      const signer = isWellFormedAccessToken(ref.accessToken)
        ? await repository.findDocumentSignerByToken(ref.accessToken)
        : null;
      if (!signer) {
        throw new NotFoundError('Access token');
      }
      return signer;
    }

    const signer = await repository.findDocumentSigner(ref.documentSignerId);
    if (!signer) {
      throw new NotFoundError('Document signer', ref.documentSignerId);
    }
    return signer;
  }

  /** Resolves the signer and applies lazy expiry to its document. */
  private async openSession(ref: SignerRef, context: RequestContext): Promise<{ signer: DocumentSignerRow; document: DocumentRow }> {
    const signer = await this.findSigner(ref);
    const document = await this.deps.store.repository().findDocument(signer.document_id);
    if (!document) {
      throw new NotFoundError('Document', signer.document_id);
    }
    return { signer, document: await this.deps.documents.expireIfOverdue(document, context) };
  }

  /**
   * Locks the document and re-reads the signer inside the transaction. Throws
   * when the document no longer accepts input.
   */
  private async lockForInput(
    repository: SigningRepository,
    signerId: string
  ): Promise<{ document: DocumentRow; signer: DocumentSignerRow }> {
    const signer = await repository.findDocumentSigner(signerId);
    if (!signer) {
      throw new NotFoundError('Document signer', signerId);
    }

    const document = await repository.findDocument(signer.document_id, { forUpdate: true });
    if (!document) {
      throw new NotFoundError('Document', signer.document_id);
    }

    assertAcceptsSubmissions(document);
    if (isOverdue(document, this.now())) {
      throw new DocumentClosedError(document.id, 'expired');
    }

    if (signer.status === 'completed') {
      throw new ConflictError(`Signer ${signer.id} has already signed this document`, {
        documentId: document.id,
        documentSignerId: signer.id,
      });
    }

    return { document, signer };
  }

  private async markInProgress(repository: SigningRepository, document: DocumentRow): Promise<DocumentRow> {
    if (document.status !== 'sent') {
      return document;
    }

    const updated = await repository.transitionDocument(document.id, { from: ['sent'], to: 'in_progress' });
    if (!updated) {
      throw new ConflictError(`Document ${document.id} changed status concurrently`, { documentId: document.id });
    }
    return updated;
  }

  async resolveAccessToken(accessToken: string, context: RequestContext = {}): Promise<SignerSession> {
    const { signer, document } = await this.openSession({ accessToken }, context);
    const submissions = await this.deps.store.repository().listSubmissions(document.id);

    return {
      document,
      signer: toPublicSigner(signer),
      fields: document.template_snapshot.fields.filter((field) => field.signerId === signer.template_signer_id),
      submittedFieldIds: submissions
        .filter((submission) => submission.document_signer_id === signer.id && hasValue(submission))
        .map((submission) => submission.field_id),
    };
  }

  async recordView(accessToken: string, context: RequestContext = {}): Promise<SignerSession> {
    const session = await this.openSession({ accessToken }, context);
    if (isTerminal(session.document.status)) {
      throw new DocumentClosedError(session.document.id, session.document.status);
    }

    const { document, signer } = await this.deps.store.withTransaction(async (repository) => {
      const locked = await repository.findDocument(session.document.id, { forUpdate: true });
      if (!locked) {
        throw new NotFoundError('Document', session.document.id);
      }
      assertAcceptsSubmissions(locked);

      let current = await repository.findDocumentSigner(session.signer.id);
      if (!current) {
        throw new NotFoundError('Document signer', session.signer.id);
      }
      if (current.status === 'pending') {
        current = await repository.updateSignerStatus(current.id, 'viewed', this.now());
      }

      return { document: await this.markInProgress(repository, locked), signer: current };
    });

    await this.deps.audit.record({
      action: 'document_viewed',
      documentId: document.id,
      templateId: document.template_id,
      details: { documentSignerId: signer.id, signerOrder: signer.signer_order },
      context,
    });

    return this.resolveAccessToken(accessToken, context);
  }

  /** Records one value; resubmitting the same field overwrites the previous value. */
  async submitField(
    ref: SignerRef,
    fieldId: string,
    value: string,
    context: RequestContext = {}
  ): Promise<SubmissionReceipt> {
    const session = await this.openSession(ref, context);
    if (isTerminal(session.document.status)) {
      throw new DocumentClosedError(session.document.id, session.document.status);
    }

    const receipt = await this.deps.store.withTransaction(async (repository) => {
      const { document, signer } = await this.lockForInput(repository, session.signer.id);

      const field = document.template_snapshot.fields.find((candidate) => candidate.id === fieldId);
      if (!field) {
        throw new NotFoundError('Field', fieldId);
      }
      if (field.signerId !== signer.template_signer_id) {
        throw new PermissionError(`Field ${field.name} is assigned to another signer`);
      }

      assertFieldValue(field, value);
      const trimmed = value.trim();
      const sealed = trimmed.length > 0 ? this.deps.submissionCipher.sealText(trimmed) : null;

      const submission = await repository.upsertSubmission({
        id: generateId(),
        documentId: document.id,
        documentSignerId: signer.id,
        fieldId: field.id,
        fieldName: field.name,
        fieldType: field.type,
        encryptedValue: sealed,
        encryptionKeyId: sealed === null ? null : this.deps.submissionCipher.keyId,
        ip: context.ip ?? null,
        userAgent: context.userAgent ?? null,
      });

      if (signer.status === 'pending' || signer.status === 'viewed') {
        await repository.updateSignerStatus(signer.id, 'in_progress', this.now());
      }
      const updated = await this.markInProgress(repository, document);

      return {
        submissionId: submission.id,
        fieldId: field.id,
        fieldName: field.name,
        submittedAt: submission.submitted_at,
        documentStatus: updated.status,
        documentId: document.id,
        templateId: document.template_id,
        documentSignerId: signer.id,
      };
    });

    await this.deps.audit.record({
      action: 'field_filled',
      documentId: receipt.documentId,
      templateId: receipt.templateId,
      details: { documentSignerId: receipt.documentSignerId, fieldId: receipt.fieldId, fieldName: receipt.fieldName },
      context,
    });

    return {
      submissionId: receipt.submissionId,
      fieldId: receipt.fieldId,
      fieldName: receipt.fieldName,
      submittedAt: receipt.submittedAt,
      documentStatus: receipt.documentStatus,
    };
  }

  /**
   * Writes the signer's signature. The last signature composes and stores the
   * final PDF and completes the document in the same transaction, while the
   * document row is locked, so completion happens at most once.
   */
  async signDocument(ref: SignerRef, input: SignatureInput, context: RequestContext = {}): Promise<SignResult> {
    const signature = input.signature.trim();
    const certificate = input.certificate?.trim() || null;
    const algorithm = input.algorithm?.trim() || DEFAULT_SIGNATURE_ALGORITHM;

    const issues: ValidationIssue[] = [];
    if (signature.length === 0 || signature.length > MAX_SIGNATURE_LENGTH) {
      issues.push({ path: 'signature', message: `signature must be 1-${MAX_SIGNATURE_LENGTH} characters` });
    }
    if (certificate !== null && certificate.length > MAX_CERTIFICATE_LENGTH) {
      issues.push({ path: 'certificate', message: `certificate must be at most ${MAX_CERTIFICATE_LENGTH} characters` });
    }
    if (algorithm.length > MAX_ALGORITHM_LENGTH) {
      issues.push({ path: 'algorithm', message: `algorithm must be at most ${MAX_ALGORITHM_LENGTH} characters` });
    }
    if (issues.length > 0) {
      throw new ValidationError(issues[0].message, issues);
    }

    const session = await this.openSession(ref, context);
    if (isTerminal(session.document.status)) {
      throw new DocumentClosedError(session.document.id, session.document.status);
    }

    const written: string[] = [];
    let result: SignResult;
    try {
      result = await this.deps.store.withTransaction(async (repository) => {
        const locked = await this.lockForInput(repository, session.signer.id);
        const submissions = await repository.listSubmissions(locked.document.id);

        const missing = missingRequiredFields(locked.document, locked.signer, submissions);
        if (missing.length > 0) {
          throw new ValidationError(
            'required fields are missing',
            missing.map((field) => ({ path: `fields.${field.name}`, message: `${field.name} is required` }))
          );
        }

        const document = await this.markInProgress(repository, locked.document);
        const row = await repository.insertSignature({
          id: generateId(),
          documentId: document.id,
          documentSignerId: locked.signer.id,
          email: locked.signer.signer_email,
          name: locked.signer.signer_name,
          signature,
          certificate,
          algorithm,
          ip: context.ip ?? null,
          userAgent: context.userAgent ?? null,
        });
        await repository.updateSignerStatus(locked.signer.id, 'completed', this.now());

        const signers = await repository.listDocumentSigners(document.id);
        const ready =
          signers.every((signer) => signer.status === 'completed') &&
          signers.every((signer) => missingRequiredFields(document, signer, submissions).length === 0);

        if (!ready) {
          return { signature: row, document, completed: false };
        }

        const completion = await this.complete(repository, document, signers, submissions, (path) => {
          written.push(path);
        });
        return { signature: { ...row, final_document_hash: completion.final_document_hash }, document: completion, completed: true };
      });
    } catch (error) {
      for (const path of written) {
        await this.discardFinalDocument(path);
      }
      throw error;
    }

    await this.deps.audit.record({
      action: 'document_signed',
      documentId: result.document.id,
      templateId: result.document.template_id,
      details: {
        documentSignerId: result.signature.document_signer_id,
        signatureId: result.signature.id,
        algorithm: result.signature.signature_algorithm,
      },
      context,
    });

    if (result.completed) {
      incrementDocumentsCompleted(result.document.id);
      Logger.info('Document completed', {
        documentId: result.document.id,
        finalDocumentHash: result.document.final_document_hash,
      });
      await this.deps.audit.record({
        action: 'document_completed',
        documentId: result.document.id,
        templateId: result.document.template_id,
        details: {
          finalDocumentHash: result.document.final_document_hash,
          s3Key: result.document.s3_key,
          snapshotHash: result.document.template_snapshot_hash,
        },
        context,
      });
      this.deps.notifications.documentCompleted(result.document);
    }

    return result;
  }

  private async discardFinalDocument(path: string): Promise<void> {
    const removed = await this.deps.content.delete(path);
    if (!removed) {
      incrementContentCleanupFailure(path);
    }
  }

  private async complete(
    repository: SigningRepository,
    document: DocumentRow,
    signers: DocumentSignerRow[],
    submissions: FormSubmissionRow[],
    onStored: (path: string) => void
  ): Promise<DocumentRow> {
    const snapshot = document.template_snapshot;
    const source = await this.deps.content.verify(snapshot.pdf.key, snapshot.pdf.hash);
    const signatures = await repository.listSignatures(document.id);
    const colorsByRole = new Map(snapshot.signers.map((role) => [role.id, role.color]));
    const completedAt = this.now();

    const values: StampedValue[] = [];
    for (const submission of submissions) {
      const field = snapshot.fields.find((candidate) => candidate.id === submission.field_id);
      if (!field || submission.encrypted_value === null) {
        continue;
      }
      values.push({
        field,
        value: this.deps.submissionCipher.openText(submission.encrypted_value),
        signerColor: colorsByRole.get(field.signerId) ?? '#000000',
      });
    }

    const pdf = await composeFinalPdf({
      sourcePdf: source.data,
      documentId: document.id,
      documentName: document.name,
      snapshotHash: document.template_snapshot_hash,
      completedAt,
      values,
      signers: signatures.map((row) => ({
        order: signers.find((signer) => signer.id === row.document_signer_id)?.signer_order ?? 0,
        name: row.signer_name,
        email: row.signer_email,
        algorithm: row.signature_algorithm,
        signedAt: row.signed_at,
        ip: row.ip_address,
      })),
    });

    const stored = await this.deps.content.put(pdf, finalDocumentObjectPath(document.tenant_id, document.id), {
      'tenant-id': document.tenant_id,
      'document-id': document.id,
      'content-type': 'application/pdf',
    });
    onStored(stored.path);

    const completed = await repository.completeDocument(document.id, {
      bucket: stored.bucket,
      key: stored.path,
      finalHash: stored.contentHash,
      completedAt,
    });
    if (!completed) {
      incrementCompletionRaceLost(document.id);
      throw new ConflictError(`Document ${document.id} was completed concurrently`, { documentId: document.id });
    }

    await repository.stampSignatureHashes(document.id, stored.contentHash);
    return completed;
  }

  async getSubmittedValues(ref: SignerRef): Promise<SubmittedValue[]> {
    const signer = await this.findSigner(ref);
    const submissions = await this.deps.store.repository().listSubmissions(signer.document_id);

    return submissions
      .filter((submission) => submission.document_signer_id === signer.id)
      .map((submission) => ({
        fieldId: submission.field_id,
        fieldName: submission.field_name,
        fieldType: submission.field_type,
        value:
          submission.encrypted_value === null ? null : this.deps.submissionCipher.openText(submission.encrypted_value),
        submittedAt: submission.submitted_at,
      }));
  }
}
