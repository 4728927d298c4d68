import { authorize } from '../src/core/authorization';
import { assertAcceptsSubmissions, assertValidTransition, isOverdue, sourcesFor } from '../src/core/lifecycle';
import { buildTemplateSnapshot, hashTemplateSnapshot } from '../src/core/snapshot';
import {
  checkFieldValue,
  DEFAULT_SIGNER_COLORS,
  normalizeFields,
  normalizeRecipients,
  normalizeSigners,
} from '../src/core/validation';
import { DocumentRow, Principal, SnapshotField, TemplateFieldRow, TemplateRow, TemplateSignerRow } from '../src/types';
import { ConflictError, DocumentClosedError, NotFoundError, PermissionError, ValidationError } from '../src/utils/errors';

const at = new Date('2026-03-01T00:00:00.000Z');

function documentRow(overrides: Partial<DocumentRow> = {}): DocumentRow {
  return {
    id: 'doc-1',
    template_id: 'tpl-1',
    name: 'Lease',
    s3_bucket: null,
    s3_key: null,
    template_snapshot: {
      templateId: 'tpl-1',
      templateVersion: 1,
      pdf: { bucket: 'b', key: 'k', hash: 'h', totalPages: 1 },
      signers: [],
      fields: [],
    },
    template_snapshot_hash: 'hash',
    final_document_hash: null,
    created_by: 'user-1',
    tenant_id: 'tenant-a',
    status: 'sent',
    expires_at: null,
    sent_at: at,
    completed_at: null,
    created_at: at,
    updated_at: at,
    ...overrides,
  };
}

function field(overrides: Partial<SnapshotField> = {}): SnapshotField {
  return {
    id: 'field-1',
    signerId: 'role-1',
    name: 'value',
    type: 'text',
    label: '',
    placeholder: '',
    position: { x: 0, y: 0, width: 10, height: 10, page: 1 },
    validationRules: {},
    required: true,
    ...overrides,
  };
}

describe('document lifecycle', () => {
  test('allows the forward transitions and refuses the rest', () => {
    expect(() => assertValidTransition('doc-1', 'draft', 'sent')).not.toThrow();
    expect(() => assertValidTransition('doc-1', 'scheduled', 'sent')).not.toThrow();
    expect(() => assertValidTransition('doc-1', 'in_progress', 'completed')).not.toThrow();
    expect(() => assertValidTransition('doc-1', 'draft', 'completed')).toThrow(ConflictError);
    expect(() => assertValidTransition('doc-1', 'sent', 'scheduled')).toThrow(
      'Invalid document status transition: sent -> scheduled'
    );
  });

  test('terminal states reject every transition as closed', () => {
    for (const status of ['completed', 'expired', 'cancelled'] as const) {
      expect(() => assertValidTransition('doc-1', status, 'cancelled')).toThrow(DocumentClosedError);
    }
  });

  test('lists the sources of a transition for compare-and-set', () => {
    expect(sourcesFor('expired')).toEqual(['draft', 'scheduled', 'sent', 'in_progress']);
    expect(sourcesFor('sent')).toEqual(['draft', 'scheduled']);
    expect(sourcesFor('draft')).toEqual([]);
  });

  test('only sent and in-progress documents accept submissions', () => {
    expect(() => assertAcceptsSubmissions(documentRow({ status: 'sent' }))).not.toThrow();
    expect(() => assertAcceptsSubmissions(documentRow({ status: 'in_progress' }))).not.toThrow();
    expect(() => assertAcceptsSubmissions(documentRow({ status: 'draft' }))).toThrow('Document doc-1 has not been sent');
    expect(() => assertAcceptsSubmissions(documentRow({ status: 'expired' }))).toThrow(DocumentClosedError);
  });

  test('a document is overdue once its expiry is reached, unless already closed', () => {
    const expiresAt = new Date('2026-03-02T00:00:00.000Z');
    expect(isOverdue(documentRow({ expires_at: expiresAt }), new Date('2026-03-01T23:59:59.999Z'))).toBe(false);
    expect(isOverdue(documentRow({ expires_at: expiresAt }), expiresAt)).toBe(true);
    expect(isOverdue(documentRow({ expires_at: expiresAt, status: 'completed' }), expiresAt)).toBe(false);
    expect(isOverdue(documentRow({ expires_at: null }), expiresAt)).toBe(false);
  });
});

describe('authorization', () => {
  const member: Principal = { userId: 'user-1', tenantId: 'tenant-a', role: 'member' };
  const viewer: Principal = { userId: 'user-2', tenantId: 'tenant-a', role: 'viewer' };
  const admin: Principal = { userId: 'user-3', tenantId: 'tenant-a', role: 'admin' };
  const ownDocument = { entity: 'Document' as const, id: 'doc-1', tenantId: 'tenant-a', createdBy: 'user-1' };
  const otherDocument = { ...ownDocument, createdBy: 'user-9' };

  test('members manage only what they created', () => {
    expect(() => authorize(member, 'document:manage', ownDocument)).not.toThrow();
    expect(() => authorize(member, 'document:manage', otherDocument)).toThrow(PermissionError);
    expect(() => authorize(member, 'document:manage', otherDocument)).toThrow(
      'Role member may not perform document:manage'
    );
  });

  test('admins manage any resource in their tenant', () => {
    expect(() => authorize(admin, 'document:manage', otherDocument)).not.toThrow();
    expect(() => authorize(admin, 'template:manage', { ...otherDocument, entity: 'Template' })).not.toThrow();
  });

  test('viewers read but cannot create', () => {
    expect(() => authorize(viewer, 'document:read', otherDocument)).not.toThrow();
    expect(() => authorize(viewer, 'template:create')).toThrow('Role viewer may not perform template:create');
    expect(() => authorize(viewer, 'audit:read', otherDocument)).toThrow(PermissionError);
  });

  test('resources in another tenant look missing', () => {
    const foreign = { ...ownDocument, tenantId: 'tenant-b' };
    expect(() => authorize(admin, 'document:read', foreign)).toThrow(NotFoundError);
    expect(() => authorize(admin, 'document:read', foreign)).toThrow('Document doc-1 not found');
  });
});

describe('template validation', () => {
  test('assigns palette colors by position when none is given', () => {
    const signers = normalizeSigners([
      { order: 1, name: ' Landlord ' },
      { order: 2, name: 'Tenant', color: '#abcdef' },
    ]);

    expect(signers).toEqual([
      { order: 1, name: 'Landlord', color: DEFAULT_SIGNER_COLORS[0] },
      { order: 2, name: 'Tenant', color: '#ABCDEF' },
    ]);
  });

  test('reports duplicate orders and bad colors together', () => {
    try {
      normalizeSigners([
        { order: 1, name: 'A' },
        { order: 1, name: 'B', color: 'red' },
      ]);
      throw new Error('expected a validation error');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        issues: [
          { path: 'signers[1].order', message: 'order 1 is used by more than one signer' },
          { path: 'signers[1].color', message: 'color must be a #RRGGBB hex value' },
        ],
      });
    }
  });

  test('requires at least one signer', () => {
    expect(() => normalizeSigners([])).toThrow('at least one signer is required');
  });

  test('fields must reference a signer and fit the page count', () => {
    expect(() =>
      normalizeFields(
        [{ name: 'a', type: 'text', signerOrder: 3, position: { x: 1, y: 1, width: 10, height: 10 } }],
        new Set([1, 2]),
        1
      )
    ).toThrow('signer order 3 does not exist');

    expect(() =>
      normalizeFields(
        [{ name: 'a', type: 'text', signerOrder: 1, position: { x: 1, y: 1, width: 10, height: 10, page: 2 } }],
        new Set([1]),
        1
      )
    ).toThrow('page must be an integer between 1 and 1');

    expect(() =>
      normalizeFields(
        [{ name: 'a', type: 'radio', signerOrder: 1, position: { x: 1, y: 1, width: 10, height: 10 } }],
        new Set([1]),
        1
      )
    ).toThrow('type must be one of: text, signature, date, checkbox, email, phone');
  });

  test('fields default to page one and required', () => {
    const [normalized] = normalizeFields(
      [{ name: ' total ', type: 'text', signerOrder: 1, position: { x: 1, y: 2, width: 3, height: 4 } }],
      new Set([1]),
      1
    );

    expect(normalized).toEqual({
      name: 'total',
      type: 'text',
      signerOrder: 1,
      label: '',
      placeholder: '',
      position: { x: 1, y: 2, width: 3, height: 4, page: 1 },
      validationRules: {},
      required: true,
    });
  });

  test('rejects invalid validation patterns', () => {
    expect(() =>
      normalizeFields(
        [
          {
            name: 'code',
            type: 'text',
            signerOrder: 1,
            position: { x: 1, y: 1, width: 10, height: 10 },
            validationRules: { pattern: '([a-z' },
          },
        ],
        new Set([1]),
        1
      )
    ).toThrow(ValidationError);
  });

  test.each(['(a)\\1', '(?=a)a', '(?<!b)a'])('rejects patterns outside RE2 syntax: %s', (pattern) => {
    expect(() =>
      normalizeFields(
        [
          {
            name: 'code',
            type: 'text',
            signerOrder: 1,
            position: { x: 1, y: 1, width: 10, height: 10 },
            validationRules: { pattern },
          },
        ],
        new Set([1]),
        1
      )
    ).toThrow(ValidationError);
  });
});

describe('recipient validation', () => {
  const roles = [
    { id: 'role-1', order: 1, name: 'Buyer', color: '#000000' },
    { id: 'role-2', order: 2, name: 'Seller', color: '#000000' },
  ];

  test('needs exactly one recipient per role with distinct emails', () => {
    expect(() => normalizeRecipients([{ order: 1, email: 'a@example.test', name: 'A' }], roles)).toThrow(
      'no recipient for signer order 2'
    );

    expect(() =>
      normalizeRecipients(
        [
          { order: 1, email: 'same@example.test', name: 'A' },
          { order: 2, email: 'SAME@example.test', name: 'B' },
        ],
        roles
      )
    ).toThrow('email same@example.test is used by more than one recipient');
  });

  test('normalizes emails and sorts by order', () => {
    expect(
      normalizeRecipients(
        [
          { order: 2, email: ' Seller@Example.Test ', name: 'Sam' },
          { order: 1, email: 'buyer@example.test', name: ' Bea ' },
        ],
        roles
      )
    ).toEqual([
      { order: 1, email: 'buyer@example.test', name: 'Bea' },
      { order: 2, email: 'seller@example.test', name: 'Sam' },
    ]);
  });

  test('templates without signers cannot be instantiated', () => {
    expect(() => normalizeRecipients([], [])).toThrow('template has no signers');
  });
});

describe('field value validation', () => {
  test.each([
    ['email', 'person@example.test', true],
    ['email', 'person@', false],
    ['phone', '+1 (555) 010-2030', true],
    ['phone', 'call me', false],
    ['date', '2026-04-30', true],
    ['date', '2026-04-30T10:00:00Z', true],
    ['date', '30/04/2026', false],
    ['checkbox', 'true', true],
    ['checkbox', 'yes', false],
    ['signature', 'J. Doe', true],
  ] as const)('%s accepts %p: %p', (type, value, accepted) => {
    expect(checkFieldValue(field({ type }), value)).toHaveLength(accepted ? 0 : 1);
  });

  test('optional fields accept an empty value, required fields do not', () => {
    expect(checkFieldValue(field({ required: false }), '   ')).toEqual([]);
    expect(checkFieldValue(field({ required: true }), '')).toEqual([
      { path: 'fields.value', message: 'value is required' },
    ]);
  });

  test('applies length and pattern rules to the trimmed value', () => {
    const rules = field({ validationRules: { minLength: 3, maxLength: 5, pattern: '^[A-Z]+$' } });
    expect(checkFieldValue(rules, ' ABCD ')).toEqual([]);
    expect(checkFieldValue(rules, 'ab')).toEqual([
      { path: 'fields.value', message: 'value must be at least 3 characters' },
      { path: 'fields.value', message: 'value does not match the required format' },
    ]);
  });

  test('nested quantifiers run in linear time on long input', () => {
    const nested = field({ validationRules: { pattern: '^(a+)+$' } });
    const started = Date.now();

    expect(checkFieldValue(nested, 'a'.repeat(5000) + '!')).toEqual([
      { path: 'fields.value', message: 'value does not match the required format' },
    ]);
    expect(checkFieldValue(nested, 'a'.repeat(5000))).toEqual([]);
    expect(Date.now() - started).toBeLessThan(2000);
  });
});

describe('template snapshot', () => {
  const template: TemplateRow = {
    id: 'tpl-1',
    name: 'Lease',
    description: '',
    s3_bucket: 'bucket',
    s3_key: 'templates/t/tpl.pdf',
    pdf_hash: 'a'.repeat(64),
    file_size: 100,
    mime_type: 'application/pdf',
    total_pages: 2,
    created_by: 'user-1',
    tenant_id: 'tenant-a',
    is_active: true,
    version: 4,
    created_at: at,
    updated_at: at,
  };
  const signers: TemplateSignerRow[] = [
    { id: 'role-2', template_id: 'tpl-1', signer_order: 2, signer_name: 'Tenant', signer_color: '#222222', created_at: at },
    { id: 'role-1', template_id: 'tpl-1', signer_order: 1, signer_name: 'Landlord', signer_color: '#111111', created_at: at },
  ];
  const fields: TemplateFieldRow[] = ['rent', 'deposit'].map((name, index): TemplateFieldRow => ({
    id: `field-${name}`,
    template_id: 'tpl-1',
    signer_id: index === 0 ? 'role-1' : 'role-2',
    field_name: name,
    field_type: 'text',
    field_label: name,
    placeholder_text: '',
    position_data: { x: 1, y: 1, width: 1, height: 1, page: 1 },
    validation_rules: {},
    required: true,
    version: 4,
    created_at: at,
  }));

  test('orders signers by order and fields by name', () => {
    const snapshot = buildTemplateSnapshot(template, signers, fields);

    expect(snapshot.templateVersion).toBe(4);
    expect(snapshot.pdf).toEqual({ bucket: 'bucket', key: 'templates/t/tpl.pdf', hash: 'a'.repeat(64), totalPages: 2 });
    expect(snapshot.signers.map((signer) => signer.id)).toEqual(['role-1', 'role-2']);
    expect(snapshot.fields.map((entry) => entry.name)).toEqual(['deposit', 'rent']);
  });

  test('hash does not depend on row order', () => {
    const first = hashTemplateSnapshot(buildTemplateSnapshot(template, signers, fields));
    const second = hashTemplateSnapshot(buildTemplateSnapshot(template, [...signers].reverse(), [...fields].reverse()));
    const bumped = hashTemplateSnapshot(buildTemplateSnapshot({ ...template, version: 5 }, signers, fields));

    expect(first).toMatch(/^[a-f0-9]{64}$/);
    expect(second).toBe(first);
    expect(bumped).not.toBe(first);
  });
});
