import { TemplateFieldRow, TemplateRow, TemplateSignerRow, TemplateSnapshot } from '../types';
import { canonicalJsonStringify } from '../utils/canonicalize';
import { sha256Hex } from '../utils/crypto';

export const SNAPSHOT_RULES_VERSION = 'template-snapshot-v1';

export function buildTemplateSnapshot(
  template: TemplateRow,
  signers: TemplateSignerRow[],
  fields: TemplateFieldRow[]
): TemplateSnapshot {
  return {
    templateId: template.id,
    templateVersion: template.version,
    pdf: {
      bucket: template.s3_bucket,
      key: template.s3_key,
      hash: template.pdf_hash,
      totalPages: template.total_pages,
    },
    signers: [...signers]
      .sort((a, b) => a.signer_order - b.signer_order)
      .map((signer) => ({
        id: signer.id,
        order: signer.signer_order,
        name: signer.signer_name,
        color: signer.signer_color,
      })),
    fields: [...fields]
      .sort((a, b) => (a.field_name < b.field_name ? -1 : a.field_name > b.field_name ? 1 : 0))
      .map((field) => ({
        id: field.id,
        signerId: field.signer_id,
        name: field.field_name,
        type: field.field_type,
        label: field.field_label,
        placeholder: field.placeholder_text,
        position: { ...field.position_data },
        validationRules: { ...field.validation_rules },
        required: field.required,
      })),
  };
}

/** Stable hash of a snapshot; key order and row order do not affect it. */
export function hashTemplateSnapshot(snapshot: TemplateSnapshot): string {
  return sha256Hex(`${SNAPSHOT_RULES_VERSION}:${canonicalJsonStringify(snapshot)}`);
}
