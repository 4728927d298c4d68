import { Request, Response } from 'express';
import { DocumentService } from '../core/document-service';
import { SignerSession, SigningService } from '../core/signing-service';
import { TemplateCatalog } from '../core/template-catalog';
import {
  AuditLogRow,
  DigitalSignatureRow,
  DocumentRow,
  DocumentSignerRow,
  PublicDocumentSigner,
  RequestContext,
  TemplateFieldRow,
  TemplateRow,
  TemplateSignerRow,
} from '../types';
import { SigningError, SigningErrorKind, ValidationError } from '../utils/errors';
import { Logger } from '../utils/logger';
import {
  parseCancelReason,
  parseCreateDocument,
  parseCreateTemplate,
  parseFieldList,
  parseFieldValue,
  parseSignature,
  parseSignerList,
  parseTemplateDetails,
} from './parsers';
import { principalOf } from './principal';

const STATUS_BY_KIND: Record<SigningErrorKind, number> = {
  validation: 400,
  permission: 403,
  not_found: 404,
  conflict: 409,
  storage: 503,
  persistence: 503,
  integrity: 500,
};

const GENERIC_MESSAGES: Partial<Record<SigningErrorKind, string>> = {
  storage: 'Content storage is temporarily unavailable',
  persistence: 'Database is temporarily unavailable',
  integrity: 'Stored content failed an integrity check',
};

function mapTemplate(row: TemplateRow) {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    pdfHash: row.pdf_hash,
    fileSize: row.file_size,
    mimeType: row.mime_type,
    totalPages: row.total_pages,
    createdBy: row.created_by,
    tenantId: row.tenant_id,
    isActive: row.is_active,
    version: row.version,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
  };
}

function mapTemplateSigner(row: TemplateSignerRow) {
  return { id: row.id, order: row.signer_order, name: row.signer_name, color: row.signer_color };
}

function mapTemplateField(row: TemplateFieldRow) {
  return {
    id: row.id,
    signerId: row.signer_id,
    name: row.field_name,
    type: row.field_type,
    label: row.field_label,
    placeholder: row.placeholder_text,
    position: row.position_data,
    validationRules: row.validation_rules,
    required: row.required,
    version: row.version,
  };
}

function mapDocument(row: DocumentRow) {
  return {
    id: row.id,
    templateId: row.template_id,
    templateVersion: row.template_snapshot.templateVersion,
    templateSnapshotHash: row.template_snapshot_hash,
    name: row.name,
    status: row.status,
    finalDocumentHash: row.final_document_hash,
    createdBy: row.created_by,
    tenantId: row.tenant_id,
    expiresAt: row.expires_at?.toISOString() ?? null,
    sentAt: row.sent_at?.toISOString() ?? null,
    completedAt: row.completed_at?.toISOString() ?? null,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
  };
}

function mapSigner(row: PublicDocumentSigner) {
  return {
    id: row.id,
    order: row.signer_order,
    email: row.signer_email,
    name: row.signer_name,
    status: row.status,
    viewedAt: row.viewed_at?.toISOString() ?? null,
    completedAt: row.completed_at?.toISOString() ?? null,
  };
}

function mapSignature(row: DigitalSignatureRow) {
  return {
    id: row.id,
    documentSignerId: row.document_signer_id,
    signerEmail: row.signer_email,
    signerName: row.signer_name,
    algorithm: row.signature_algorithm,
    finalDocumentHash: row.final_document_hash,
    signedAt: row.signed_at.toISOString(),
  };
}

function mapAudit(row: AuditLogRow) {
  return {
    id: row.id,
    documentId: row.document_id,
    templateId: row.template_id,
    userId: row.user_id,
    action: row.action,
    details: row.details,
    ipAddress: row.ip_address,
    createdAt: row.created_at.toISOString(),
  };
}

function mapSession(session: SignerSession) {
  return {
    document: {
      id: session.document.id,
      name: session.document.name,
      status: session.document.status,
      expiresAt: session.document.expires_at?.toISOString() ?? null,
      totalPages: session.document.template_snapshot.pdf.totalPages,
    },
    signer: mapSigner(session.signer),
    fields: session.fields,
    submittedFieldIds: session.submittedFieldIds,
  };
}

function requestContext(req: Request): RequestContext {
  return { ip: req.ip, userAgent: req.get('user-agent') };
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

export class SigningController {
  constructor(
    private readonly catalog: TemplateCatalog,
    private readonly documents: DocumentService,
    private readonly signing: SigningService
  ) {}

  private principal(req: Request) {
    const principal = principalOf(req);
    if (!principal) {
      throw new SigningError('Request has no principal', 'permission');
    }
    return principal;
  }

  private fail(res: Response, error: unknown, operation: string): void {
    if (!(error instanceof SigningError)) {
      Logger.error('Unhandled error in signing API', { operation, error: error instanceof Error ? error : String(error) });
      res.status(500).json({
        success: false,
        error: 'internal',
        message: 'Internal server error',
        timestamp: new Date().toISOString(),
      });
      return;
    }

    const status = STATUS_BY_KIND[error.kind];
    if (status >= 500) {
      Logger.error('Signing API request failed', { operation, kind: error.kind, error: error.message });
    }

    res.status(status).json({
      success: false,
      error: error.kind,
      message: GENERIC_MESSAGES[error.kind] ?? error.message,
      issues: error instanceof ValidationError ? error.issues : undefined,
      timestamp: new Date().toISOString(),
    });
  }

  async createTemplate(req: Request, res: Response): Promise<void> {
    try {
      const created = await this.catalog.createTemplate(
        this.principal(req),
        parseCreateTemplate(req.body),
        requestContext(req)
      );
      res.status(201).json({
        success: true,
        data: {
          template: mapTemplate(created.template),
          signers: created.signers.map(mapTemplateSigner),
          fields: created.fields.map(mapTemplateField),
        },
      });
    } catch (error) {
      this.fail(res, error, 'createTemplate');
    }
  }

  async listTemplates(req: Request, res: Response): Promise<void> {
    try {
      const rows = await this.catalog.listTemplates(this.principal(req));
      res.status(200).json({
        success: true,
        data: rows.map((row) => ({ ...mapTemplate(row), signerCount: row.signer_count, fieldCount: row.field_count })),
      });
    } catch (error) {
      this.fail(res, error, 'listTemplates');
    }
  }

  async getTemplate(req: Request<{ id: string }>, res: Response): Promise<void> {
    try {
      const found = await this.catalog.getTemplate(this.principal(req), req.params.id);
      res.status(200).json({
        success: true,
        data: {
          template: mapTemplate(found.template),
          signers: found.signers.map(mapTemplateSigner),
          fields: found.fields.map(mapTemplateField),
        },
      });
    } catch (error) {
      this.fail(res, error, 'getTemplate');
    }
  }

  async updateTemplate(req: Request<{ id: string }>, res: Response): Promise<void> {
    try {
      const updated = await this.catalog.updateTemplateDetails(
        this.principal(req),
        req.params.id,
        parseTemplateDetails(req.body),
        requestContext(req)
      );
      res.status(200).json({ success: true, data: mapTemplate(updated) });
    } catch (error) {
      this.fail(res, error, 'updateTemplate');
    }
  }

  async replaceFields(req: Request<{ id: string }>, res: Response): Promise<void> {
    try {
      const result = await this.catalog.replaceFields(
        this.principal(req),
        req.params.id,
        parseFieldList(req.body),
        requestContext(req)
      );
      res.status(200).json({
        success: true,
        data: {
          template: mapTemplate(result.template),
          signers: result.signers.map(mapTemplateSigner),
          fields: result.fields.map(mapTemplateField),
        },
      });
    } catch (error) {
      this.fail(res, error, 'replaceFields');
    }
  }

  async replaceSigners(req: Request<{ id: string }>, res: Response): Promise<void> {
    try {
      const result = await this.catalog.replaceSigners(
        this.principal(req),
        req.params.id,
        parseSignerList(req.body),
        requestContext(req)
      );
      res.status(200).json({
        success: true,
        data: {
          template: mapTemplate(result.template),
          signers: result.signers.map(mapTemplateSigner),
          fields: [],
          fieldsRemoved: result.fieldsRemoved,
        },
      });
    } catch (error) {
      this.fail(res, error, 'replaceSigners');
    }
  }

  async deactivateTemplate(req: Request<{ id: string }>, res: Response): Promise<void> {
    try {
      const row = await this.catalog.deactivateTemplate(this.principal(req), req.params.id, requestContext(req));
      res.status(200).json({ success: true, data: mapTemplate(row) });
    } catch (error) {
      this.fail(res, error, 'deactivateTemplate');
    }
  }

  async createDocument(req: Request, res: Response): Promise<void> {
    try {
      const created = await this.documents.createDocument(
        this.principal(req),
        parseCreateDocument(req.body),
        requestContext(req)
      );
      res.status(201).json({
        success: true,
        data: {
          document: mapDocument(created.document),
          // Tokens are handed to the sender once, for delivery to each recipient.
          signers: created.signers.map((signer: DocumentSignerRow) => ({
            ...mapSigner(signer),
            accessToken: signer.access_token,
          })),
        },
      });
    } catch (error) {
      this.fail(res, error, 'createDocument');
    }
  }

  async getDocument(req: Request<{ id: string }>, res: Response): Promise<void> {
    try {
      const view = await this.documents.getDocument(this.principal(req), req.params.id);
      res.status(200).json({
        success: true,
        data: {
          document: mapDocument(view.document),
          signers: view.signers.map(mapSigner),
          submittedFieldIds: view.submittedFieldIds,
          signatures: view.signatures.map(mapSignature),
        },
      });
    } catch (error) {
      this.fail(res, error, 'getDocument');
    }
  }

  async scheduleDocument(req: Request<{ id: string }>, res: Response): Promise<void> {
    try {
      const row = await this.documents.scheduleDocument(this.principal(req), req.params.id);
      res.status(200).json({ success: true, data: mapDocument(row) });
    } catch (error) {
      this.fail(res, error, 'scheduleDocument');
    }
  }

  async sendDocument(req: Request<{ id: string }>, res: Response): Promise<void> {
    try {
      const row = await this.documents.sendDocument(this.principal(req), req.params.id, requestContext(req));
      res.status(200).json({ success: true, data: mapDocument(row) });
    } catch (error) {
      this.fail(res, error, 'sendDocument');
    }
  }

  async cancelDocument(req: Request<{ id: string }>, res: Response): Promise<void> {
    try {
      const row = await this.documents.cancelDocument(
        this.principal(req),
        req.params.id,
        parseCancelReason(req.body),
        requestContext(req)
      );
      res.status(200).json({ success: true, data: mapDocument(row) });
    } catch (error) {
      this.fail(res, error, 'cancelDocument');
    }
  }

  async getFinalDocument(req: Request<{ id: string }>, res: Response): Promise<void> {
    try {
      const { document, pdf } = await this.documents.getFinalDocument(this.principal(req), req.params.id);
      res
        .status(200)
        .type('application/pdf')
        .set('x-document-hash', document.final_document_hash ?? '')
        .send(pdf);
    } catch (error) {
      this.fail(res, error, 'getFinalDocument');
    }
  }

  async listDocumentAudit(req: Request<{ id: string }>, res: Response): Promise<void> {
    try {
      const rows = await this.documents.listAuditTrail(this.principal(req), { documentId: req.params.id });
      res.status(200).json({ success: true, data: rows.map(mapAudit) });
    } catch (error) {
      this.fail(res, error, 'listDocumentAudit');
    }
  }

  async listTemplateAudit(req: Request<{ id: string }>, res: Response): Promise<void> {
    try {
      const rows = await this.documents.listAuditTrail(this.principal(req), {
        templateId: req.params.id,
        documentId: queryString(req.query.documentId),
      });
      res.status(200).json({ success: true, data: rows.map(mapAudit) });
    } catch (error) {
      this.fail(res, error, 'listTemplateAudit');
    }
  }

  async resolveSession(req: Request<{ token: string }>, res: Response): Promise<void> {
    try {
      const session = await this.signing.resolveAccessToken(req.params.token, requestContext(req));
      res.status(200).json({ success: true, data: mapSession(session) });
    } catch (error) {
      this.fail(res, error, 'resolveSession');
    }
  }

  async recordView(req: Request<{ token: string }>, res: Response): Promise<void> {
    try {
      const session = await this.signing.recordView(req.params.token, requestContext(req));
      res.status(200).json({ success: true, data: mapSession(session) });
    } catch (error) {
      this.fail(res, error, 'recordView');
    }
  }

  async submitField(req: Request<{ token: string; fieldId: string }>, res: Response): Promise<void> {
    try {
      const receipt = await this.signing.submitField(
        { accessToken: req.params.token },
        req.params.fieldId,
        parseFieldValue(req.body),
        requestContext(req)
      );
      res.status(200).json({
        success: true,
        data: { ...receipt, submittedAt: receipt.submittedAt.toISOString() },
      });
    } catch (error) {
      this.fail(res, error, 'submitField');
    }
  }

  async listSubmittedValues(req: Request<{ token: string }>, res: Response): Promise<void> {
    try {
      const values = await this.signing.getSubmittedValues({ accessToken: req.params.token });
      res.status(200).json({
        success: true,
        data: values.map((value) => ({ ...value, submittedAt: value.submittedAt.toISOString() })),
      });
    } catch (error) {
      this.fail(res, error, 'listSubmittedValues');
    }
  }

  async signDocument(req: Request<{ token: string }>, res: Response): Promise<void> {
    try {
      const result = await this.signing.signDocument(
        { accessToken: req.params.token },
        parseSignature(req.body),
        requestContext(req)
      );
      res.status(200).json({
        success: true,
        data: {
          signature: mapSignature(result.signature),
          document: mapDocument(result.document),
          completed: result.completed,
        },
      });
    } catch (error) {
      this.fail(res, error, 'signDocument');
    }
  }
}
