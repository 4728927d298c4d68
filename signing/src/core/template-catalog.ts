import { SigningRepository, SigningStore } from '../database/store';
import { incrementContentCleanupFailure } from '../metrics/counters';
import { ContentStore, templateObjectPath } from '../storage/content-store';
import {
  CreateTemplateInput,
  Principal,
  RequestContext,
  TemplateFieldInput,
  TemplateFieldRow,
  TemplateListRow,
  TemplateRow,
  TemplateSignerInput,
  TemplateSignerRow,
  TemplateWithSignersAndFields,
} from '../types';
import { NotFoundError, ValidationError } from '../utils/errors';
import { generateId } from '../utils/crypto';
import { Logger } from '../utils/logger';
import { countPdfPages } from '../pdf/compose';
import { AuditTrail } from './audit';
import { Action, authorize } from './authorization';
import { assertTemplateDetails, NormalizedField, NormalizedSigner, normalizeFields, normalizeSigners } from './validation';

export const MAX_TEMPLATE_BYTES = 25 * 1024 * 1024;
const PDF_MIME_TYPE = 'application/pdf';

export interface TemplateCatalogDeps {
  store: SigningStore;
  content: ContentStore;
  audit: AuditTrail;
}

export interface TemplateDetailsUpdate {
  name?: string;
  description?: string;
}

export interface ReplaceSignersResult extends TemplateWithSignersAndFields {
  /** Number of field assignments deleted; consumers should re-render the field editor. */
  fieldsRemoved: number;
}

async function insertSigners(
  repository: SigningRepository,
  templateId: string,
  signers: NormalizedSigner[]
): Promise<TemplateSignerRow[]> {
  const rows: TemplateSignerRow[] = [];
  for (const signer of signers) {
    rows.push(
      await repository.insertTemplateSigner({
        id: generateId(),
        templateId,
        order: signer.order,
        name: signer.name,
        color: signer.color,
      })
    );
  }
  return rows.sort((a, b) => a.signer_order - b.signer_order);
}

async function insertFields(
  repository: SigningRepository,
  templateId: string,
  version: number,
  fields: NormalizedField[],
  signers: TemplateSignerRow[]
): Promise<TemplateFieldRow[]> {
  const signerIdsByOrder = new Map(signers.map((signer) => [signer.signer_order, signer.id]));
  const rows: TemplateFieldRow[] = [];

  for (const field of fields) {
    const signerId = signerIdsByOrder.get(field.signerOrder);
    if (!signerId) {
      throw new ValidationError(`signer order ${field.signerOrder} does not exist`, [
        { path: 'fields', message: `signer order ${field.signerOrder} does not exist` },
      ]);
    }

    rows.push(
      await repository.insertTemplateField({
        id: generateId(),
        templateId,
        signerId,
        name: field.name,
        type: field.type,
        label: field.label,
        placeholder: field.placeholder,
        position: field.position,
        validationRules: field.validationRules,
        required: field.required,
        version,
      })
    );
  }

  return rows;
}

export class TemplateCatalog {
  constructor(private readonly deps: TemplateCatalogDeps) {}

  private async loadTemplate(
    repository: SigningRepository,
    principal: Principal,
    templateId: string,
    action: Action,
    forUpdate = false
  ): Promise<TemplateRow> {
    const template = await repository.findTemplate(templateId, { forUpdate });
    if (!template || !template.is_active) {
      throw new NotFoundError('Template', templateId);
    }

    authorize(principal, action, {
      entity: 'Template',
      id: template.id,
      tenantId: template.tenant_id,
      createdBy: template.created_by,
    });

    return template;
  }

  async createTemplate(
    principal: Principal,
    input: CreateTemplateInput,
    context: RequestContext = {}
  ): Promise<TemplateWithSignersAndFields> {
    authorize(principal, 'template:create');

    const name = input.name.trim();
    const description = (input.description ?? '').trim();
    assertTemplateDetails(name, description);

    if (input.pdf.length === 0) {
      throw new ValidationError('pdf is required', [{ path: 'pdf', message: 'pdf is required' }]);
    }
    if (input.pdf.length > MAX_TEMPLATE_BYTES) {
      throw new ValidationError('pdf is too large', [
        { path: 'pdf', message: `pdf must be at most ${MAX_TEMPLATE_BYTES} bytes` },
      ]);
    }

    const signers = normalizeSigners(input.signers);
    const totalPages = await countPdfPages(input.pdf);
    const fields = normalizeFields(input.fields, new Set(signers.map((signer) => signer.order)), totalPages);

    const stored = await this.deps.content.put(input.pdf, templateObjectPath(principal.tenantId), {
      'tenant-id': principal.tenantId,
      'content-type': PDF_MIME_TYPE,
    });

    let created: TemplateWithSignersAndFields;
    try {
      created = await this.deps.store.withTransaction(async (repository) => {
        const template = await repository.insertTemplate({
          id: generateId(),
          name,
          description,
          bucket: stored.bucket,
          key: stored.path,
          pdfHash: stored.contentHash,
          fileSize: stored.size,
          mimeType: PDF_MIME_TYPE,
          totalPages,
          createdBy: principal.userId,
          tenantId: principal.tenantId,
        });
        const signerRows = await insertSigners(repository, template.id, signers);
        const fieldRows = await insertFields(repository, template.id, template.version, fields, signerRows);
        return { template, signers: signerRows, fields: fieldRows };
      });
    } catch (error) {
      const removed = await this.deps.content.delete(stored.path);
      if (!removed) {
        incrementContentCleanupFailure(stored.path);
      }
      throw error;
    }

    Logger.info('Template created', {
      templateId: created.template.id,
      tenantId: principal.tenantId,
      signers: created.signers.length,
      fields: created.fields.length,
      totalPages,
    });

    await this.deps.audit.record({
      action: 'template_created',
      templateId: created.template.id,
      userId: principal.userId,
      details: {
        name,
        pdfHash: stored.contentHash,
        signerCount: created.signers.length,
        fieldCount: created.fields.length,
      },
      context,
    });

    return created;
  }

  async getTemplate(principal: Principal, templateId: string): Promise<TemplateWithSignersAndFields> {
    const repository = this.deps.store.repository();
    const template = await this.loadTemplate(repository, principal, templateId, 'template:read');
    const [signers, fields] = await Promise.all([
      repository.listTemplateSigners(template.id),
      repository.listTemplateFields(template.id),
    ]);
    return { template, signers, fields };
  }

  async listTemplates(principal: Principal): Promise<TemplateListRow[]> {
    authorize(principal, 'template:read');
    return this.deps.store.repository().listTemplatesForTenant(principal.tenantId);
  }

  async updateTemplateDetails(
    principal: Principal,
    templateId: string,
    update: TemplateDetailsUpdate,
    context: RequestContext = {}
  ): Promise<TemplateRow> {
    const updated = await this.deps.store.withTransaction(async (repository) => {
      const template = await this.loadTemplate(repository, principal, templateId, 'template:manage', true);
      const name = update.name === undefined ? template.name : update.name.trim();
      const description = update.description === undefined ? template.description : update.description.trim();
      assertTemplateDetails(name, description);
      return repository.updateTemplateDetails(template.id, name, description);
    });

    await this.deps.audit.record({
      action: 'template_updated',
      templateId: updated.id,
      userId: principal.userId,
      details: {
        operation: 'update_details',
        changed: Object.keys(update).filter((key) => key === 'name' || key === 'description'),
      },
      context,
    });

    return updated;
  }

  /** Swaps the whole field set and bumps the template version. */
  async replaceFields(
    principal: Principal,
    templateId: string,
    fields: TemplateFieldInput[],
    context: RequestContext = {}
  ): Promise<TemplateWithSignersAndFields> {
    const result = await this.deps.store.withTransaction(async (repository) => {
      const template = await this.loadTemplate(repository, principal, templateId, 'template:manage', true);
      const signers = await repository.listTemplateSigners(template.id);
      const normalized = normalizeFields(
        fields,
        new Set(signers.map((signer) => signer.signer_order)),
        template.total_pages
      );

      await repository.deleteTemplateFields(template.id);
      const bumped = await repository.bumpTemplateVersion(template.id);
      const fieldRows = await insertFields(repository, template.id, bumped.version, normalized, signers);
      return { template: bumped, signers, fields: fieldRows };
    });

    await this.deps.audit.record({
      action: 'template_updated',
      templateId: result.template.id,
      userId: principal.userId,
      details: { operation: 'replace_fields', version: result.template.version, fieldCount: result.fields.length },
      context,
    });

    return result;
  }

  /**
   * Replaces the signer roles. Every field of the template is deleted first,
   * since each one references a signer that is about to disappear.
   */
  async replaceSigners(
    principal: Principal,
    templateId: string,
    signers: TemplateSignerInput[],
    context: RequestContext = {}
  ): Promise<ReplaceSignersResult> {
    const result = await this.deps.store.withTransaction(async (repository) => {
      const template = await this.loadTemplate(repository, principal, templateId, 'template:manage', true);
      const normalized = normalizeSigners(signers);

      const fieldsRemoved = await repository.deleteTemplateFields(template.id);
      await repository.deleteTemplateSigners(template.id);
      const signerRows = await insertSigners(repository, template.id, normalized);
      const bumped = await repository.bumpTemplateVersion(template.id);
      return { template: bumped, signers: signerRows, fields: [], fieldsRemoved };
    });

    Logger.info('Template signers replaced', {
      templateId: result.template.id,
      signers: result.signers.length,
      fieldsRemoved: result.fieldsRemoved,
    });

    await this.deps.audit.record({
      action: 'template_updated',
      templateId: result.template.id,
      userId: principal.userId,
      details: {
        operation: 'replace_signers',
        version: result.template.version,
        signerCount: result.signers.length,
        fieldsRemoved: result.fieldsRemoved,
      },
      context,
    });

    return result;
  }

  async deactivateTemplate(principal: Principal, templateId: string, context: RequestContext = {}): Promise<TemplateRow> {
    const deactivated = await this.deps.store.withTransaction(async (repository) => {
      const template = await this.loadTemplate(repository, principal, templateId, 'template:manage', true);
      return repository.deactivateTemplate(template.id);
    });

    await this.deps.audit.record({
      action: 'template_updated',
      templateId: deactivated.id,
      userId: principal.userId,
      details: { operation: 'deactivate' },
      context,
    });

    return deactivated;
  }
}
