export const FIELD_TYPES = ['text', 'signature', 'date', 'checkbox', 'email', 'phone'] as const;
export type FieldType = (typeof FIELD_TYPES)[number];

export const DOCUMENT_STATUSES = [
  'draft',
  'scheduled',
  'sent',
  'in_progress',
  'completed',
  'expired',
  'cancelled',
] as const;
export type DocumentStatus = (typeof DOCUMENT_STATUSES)[number];

export type SignerStatus = 'pending' | 'viewed' | 'in_progress' | 'completed';

export const AUDIT_ACTIONS = [
  'template_created',
  'template_updated',
  'document_created',
  'document_sent',
  'document_viewed',
  'field_filled',
  'document_signed',
  'document_completed',
  'document_expired',
  'document_cancelled',
] as const;
export type AuditAction = (typeof AUDIT_ACTIONS)[number];

export const ROLES = ['owner', 'admin', 'member', 'viewer'] as const;
export type Role = (typeof ROLES)[number];

/** Authenticated caller as supplied by the identity collaborator. */
export interface Principal {
  userId: string;
  tenantId: string;
  role: Role;
}

/** Origin of a request, recorded on submissions, signatures and audit rows. */
export interface RequestContext {
  ip?: string;
  userAgent?: string;
}

export interface FieldPosition {
  x: number;
  y: number;
  width: number;
  height: number;
  page: number;
}

export interface ValidationRules {
  minLength?: number;
  maxLength?: number;
  pattern?: string;
}

export interface ContentReference {
  bucket: string;
  key: string;
  hash: string;
  size: number;
  mimeType: string;
}

export interface TemplateRow {
  id: string;
  name: string;
  description: string;
  s3_bucket: string;
  s3_key: string;
  pdf_hash: string;
  file_size: number;
  mime_type: string;
  total_pages: number;
  created_by: string;
  tenant_id: string;
  is_active: boolean;
  version: number;
  created_at: Date;
  updated_at: Date;
}

export interface TemplateSignerRow {
  id: string;
  template_id: string;
  signer_order: number;
  signer_name: string;
  signer_color: string;
  created_at: Date;
}

export interface TemplateFieldRow {
  id: string;
  template_id: string;
  signer_id: string;
  field_name: string;
  field_type: FieldType;
  field_label: string;
  placeholder_text: string;
  position_data: FieldPosition;
  validation_rules: ValidationRules;
  required: boolean;
  version: number;
  created_at: Date;
}

export interface TemplateListRow extends TemplateRow {
  signer_count: number;
  field_count: number;
}

export interface SnapshotSigner {
  id: string;
  order: number;
  name: string;
  color: string;
}

export interface SnapshotField {
  id: string;
  signerId: string;
  name: string;
  type: FieldType;
  label: string;
  placeholder: string;
  position: FieldPosition;
  validationRules: ValidationRules;
  required: boolean;
}

/** Frozen copy of a template's contract taken when a document is created. */
export interface TemplateSnapshot {
  templateId: string;
  templateVersion: number;
  pdf: { bucket: string; key: string; hash: string; totalPages: number };
  signers: SnapshotSigner[];
  fields: SnapshotField[];
}

export interface DocumentRow {
  id: string;
  template_id: string;
  name: string;
  s3_bucket: string | null;
  s3_key: string | null;
  template_snapshot: TemplateSnapshot;
  template_snapshot_hash: string;
  final_document_hash: string | null;
  created_by: string;
  tenant_id: string;
  status: DocumentStatus;
  expires_at: Date | null;
  sent_at: Date | null;
  completed_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export interface DocumentSignerRow {
  id: string;
  document_id: string;
  template_signer_id: string;
  signer_order: number;
  signer_email: string;
  signer_name: string;
  access_token: string;
  status: SignerStatus;
  viewed_at: Date | null;
  completed_at: Date | null;
  created_at: Date;
}

export interface FormSubmissionRow {
  id: string;
  document_id: string;
  document_signer_id: string;
  field_id: string;
  field_name: string;
  field_type: FieldType;
  encrypted_value: string | null;
  encryption_key_id: string | null;
  submitted_at: Date;
  ip_address: string | null;
  user_agent: string | null;
}

export interface DigitalSignatureRow {
  id: string;
  document_id: string;
  document_signer_id: string;
  signer_email: string;
  signer_name: string;
  final_document_hash: string | null;
  digital_signature: string;
  certificate: string | null;
  signature_algorithm: string;
  signed_at: Date;
  ip_address: string | null;
  user_agent: string | null;
}

export interface AuditLogRow {
  id: string;
  document_id: string | null;
  template_id: string | null;
  user_id: string | null;
  action: AuditAction;
  details: Record<string, unknown>;
  ip_address: string | null;
  user_agent: string | null;
  created_at: Date;
}

export interface TemplateSignerInput {
  order: number;
  name: string;
  color?: string;
}

export interface TemplateFieldInput {
  name: string;
  type: string;
  signerOrder: number;
  label?: string;
  placeholder?: string;
  position: Partial<FieldPosition>;
  validationRules?: ValidationRules;
  required?: boolean;
}

export interface CreateTemplateInput {
  name: string;
  description?: string;
  pdf: Buffer;
  signers: TemplateSignerInput[];
  fields: TemplateFieldInput[];
}

export interface TemplateWithSignersAndFields {
  template: TemplateRow;
  signers: TemplateSignerRow[];
  fields: TemplateFieldRow[];
}

export interface RecipientInput {
  order: number;
  email: string;
  name: string;
}

export interface CreateDocumentInput {
  templateId: string;
  name: string;
  recipients: RecipientInput[];
  expiresAt?: Date;
}

export type PublicDocumentSigner = Omit<DocumentSignerRow, 'access_token'>;

export interface DocumentView {
  document: DocumentRow;
  signers: PublicDocumentSigner[];
  submittedFieldIds: Array<{ documentSignerId: string; fieldId: string }>;
  signatures: DigitalSignatureRow[];
}

export interface SignatureInput {
  signature: string;
  certificate?: string;
  algorithm?: string;
}
