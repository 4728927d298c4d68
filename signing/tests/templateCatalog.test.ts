import { SigningRepository } from '../src/database/store';
import { NotFoundError, PermissionError, PersistenceError, ValidationError } from '../src/utils/errors';
import { sha256Hex } from '../src/utils/crypto';
import { createHarness, Harness, member, outsider, owner, purchaseAgreementInput, viewer } from './support';

describe('template catalog', () => {
  let harness: Harness;

  beforeEach(() => {
    harness = createHarness();
  });

  test('creates a template with ordered signers and role-bound fields', async () => {
    const input = await purchaseAgreementInput();
    const created = await harness.catalog.createTemplate(owner, input, { ip: '203.0.113.7' });

    expect(created.template).toMatchObject({
      name: 'Purchase Agreement',
      description: 'Two-party purchase agreement',
      s3_bucket: 'test-bucket',
      pdf_hash: sha256Hex(input.pdf),
      file_size: input.pdf.length,
      mime_type: 'application/pdf',
      total_pages: 2,
      created_by: 'user-owner',
      tenant_id: 'tenant-a',
      is_active: true,
      version: 1,
    });
    expect(created.template.s3_key).toMatch(/^templates\/tenant-a\/[0-9a-f-]{36}\.pdf$/);
    expect(harness.backend.keys()).toEqual([created.template.s3_key]);

    expect(created.signers.map((signer) => [signer.signer_order, signer.signer_name, signer.signer_color])).toEqual([
      [1, 'Buyer', '#2563EB'],
      [2, 'Seller', '#16A34A'],
    ]);

    const [buyer, seller] = created.signers;
    expect(created.fields.map((field) => [field.field_name, field.signer_id, field.required])).toEqual([
      ['buyer_name', buyer.id, true],
      ['buyer_signature', buyer.id, true],
      ['seller_email', seller.id, true],
      ['seller_note', seller.id, false],
    ]);

    const audit = await harness.documents.listAuditTrail(owner, { templateId: created.template.id });
    expect(audit).toHaveLength(1);
    expect(audit[0]).toMatchObject({
      action: 'template_created',
      user_id: 'user-owner',
      ip_address: '203.0.113.7',
      details: { name: 'Purchase Agreement', pdfHash: sha256Hex(input.pdf), signerCount: 2, fieldCount: 4 },
    });
  });

  test('lists active templates of the caller tenant with counts', async () => {
    const created = await harness.catalog.createTemplate(owner, await purchaseAgreementInput());
    await harness.catalog.createTemplate(outsider, await purchaseAgreementInput());

    const listed = await harness.catalog.listTemplates(viewer);
    expect(listed).toHaveLength(1);
    expect(listed[0]).toMatchObject({ id: created.template.id, signer_count: 2, field_count: 4 });
  });

  test('viewers cannot create templates and nothing is stored', async () => {
    await expect(harness.catalog.createTemplate(viewer, await purchaseAgreementInput())).rejects.toBeInstanceOf(
      PermissionError
    );
    expect(harness.backend.putCount).toBe(0);
  });

  test('rejects a PDF that cannot be parsed', async () => {
    const input = { ...(await purchaseAgreementInput()), pdf: Buffer.from('not a pdf at all') };

    await expect(harness.catalog.createTemplate(owner, input)).rejects.toThrow('pdf could not be parsed');
    expect(harness.backend.putCount).toBe(0);
  });

  test('rejects fields placed past the last page', async () => {
    const input = await purchaseAgreementInput();
    input.fields[0].position.page = 3;

    await expect(harness.catalog.createTemplate(owner, input)).rejects.toThrow(
      'page must be an integer between 1 and 2'
    );
  });

  test('removes the stored PDF when the database write fails', async () => {
    const repositoryPrototype: SigningRepository = Object.getPrototypeOf(harness.store.repository());
    const insertField = jest
      .spyOn(repositoryPrototype, 'insertTemplateField')
      .mockRejectedValueOnce(new Error('connection reset'));

    try {
      await expect(harness.catalog.createTemplate(owner, await purchaseAgreementInput())).rejects.toBeInstanceOf(
        PersistenceError
      );
    } finally {
      insertField.mockRestore();
    }

    expect(harness.backend.putCount).toBe(1);
    expect(harness.backend.keys()).toEqual([]);
    await expect(harness.catalog.listTemplates(owner)).resolves.toEqual([]);
  });

  test('updates details and records which ones changed', async () => {
    const created = await harness.catalog.createTemplate(owner, await purchaseAgreementInput());

    const updated = await harness.catalog.updateTemplateDetails(owner, created.template.id, { name: '  Sale Deed ' });
    expect(updated.name).toBe('Sale Deed');
    expect(updated.description).toBe('Two-party purchase agreement');

    await expect(harness.catalog.updateTemplateDetails(owner, created.template.id, { name: ' ' })).rejects.toThrow(
      'name is required'
    );

    const audit = await harness.documents.listAuditTrail(owner, { templateId: created.template.id });
    expect(audit.map((entry) => entry.action)).toEqual(['template_created', 'template_updated']);
    expect(audit[1].details).toEqual({ operation: 'update_details', changed: ['name'] });
  });

  test('replacing fields bumps the version', async () => {
    const created = await harness.catalog.createTemplate(owner, await purchaseAgreementInput());

    const replaced = await harness.catalog.replaceFields(owner, created.template.id, [
      { name: 'initials', type: 'text', signerOrder: 2, position: { x: 10, y: 10, width: 40, height: 20, page: 2 } },
    ]);

    expect(replaced.template.version).toBe(2);
    expect(replaced.fields).toHaveLength(1);
    expect(replaced.fields[0]).toMatchObject({
      field_name: 'initials',
      signer_id: created.signers[1].id,
      version: 2,
    });

    const reloaded = await harness.catalog.getTemplate(owner, created.template.id);
    expect(reloaded.fields.map((field) => field.field_name)).toEqual(['initials']);
  });

  test('an invalid field replacement leaves the template untouched', async () => {
    const created = await harness.catalog.createTemplate(owner, await purchaseAgreementInput());

    await expect(
      harness.catalog.replaceFields(owner, created.template.id, [
        { name: 'initials', type: 'text', signerOrder: 5, position: { x: 10, y: 10, width: 40, height: 20 } },
      ])
    ).rejects.toBeInstanceOf(ValidationError);

    const reloaded = await harness.catalog.getTemplate(owner, created.template.id);
    expect(reloaded.template.version).toBe(1);
    expect(reloaded.fields).toHaveLength(4);
  });

  test('replacing signers drops every field and reports how many', async () => {
    const created = await harness.catalog.createTemplate(owner, await purchaseAgreementInput());

    const replaced = await harness.catalog.replaceSigners(owner, created.template.id, [
      { order: 1, name: 'Buyer' },
      { order: 2, name: 'Seller' },
      { order: 3, name: 'Witness' },
    ]);

    expect(replaced.fieldsRemoved).toBe(4);
    expect(replaced.fields).toEqual([]);
    expect(replaced.template.version).toBe(2);
    expect(replaced.signers.map((signer) => [signer.signer_name, signer.signer_color])).toEqual([
      ['Buyer', '#2563EB'],
      ['Seller', '#DC2626'],
      ['Witness', '#16A34A'],
    ]);

    const reloaded = await harness.catalog.getTemplate(owner, created.template.id);
    expect(reloaded.fields).toEqual([]);
    expect(reloaded.signers).toHaveLength(3);
  });

  test('members cannot manage templates they did not create', async () => {
    const created = await harness.catalog.createTemplate(owner, await purchaseAgreementInput());

    await expect(harness.catalog.replaceFields(member, created.template.id, [])).rejects.toBeInstanceOf(
      PermissionError
    );
    await expect(harness.catalog.getTemplate(member, created.template.id)).resolves.toMatchObject({
      template: { id: created.template.id },
    });
  });

  test('templates of another tenant are not found', async () => {
    const created = await harness.catalog.createTemplate(owner, await purchaseAgreementInput());

    await expect(harness.catalog.getTemplate(outsider, created.template.id)).rejects.toThrow(
      `Template ${created.template.id} not found`
    );
  });

  test('deactivated templates disappear from reads', async () => {
    const created = await harness.catalog.createTemplate(owner, await purchaseAgreementInput());

    const deactivated = await harness.catalog.deactivateTemplate(owner, created.template.id);
    expect(deactivated.is_active).toBe(false);

    await expect(harness.catalog.getTemplate(owner, created.template.id)).rejects.toBeInstanceOf(NotFoundError);
    await expect(harness.catalog.listTemplates(owner)).resolves.toEqual([]);
    await expect(harness.catalog.deactivateTemplate(owner, created.template.id)).rejects.toBeInstanceOf(
      NotFoundError
    );
  });
});
