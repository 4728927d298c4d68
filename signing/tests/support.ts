import { PDFDocument } from 'pdf-lib';
import { InMemorySigningStore } from '../src/database/memory-store';
import { AesGcmCipher } from '../src/storage/cipher';
import { ContentStore } from '../src/storage/content-store';
import { InMemoryObjectBackend } from '../src/storage/memory-backend';
import { createSigningServices, SigningServices } from '../src/services';
import { CreateTemplateInput, Principal } from '../src/types';

export const TEST_KEY_HEX = '11'.repeat(32);

export const owner: Principal = { userId: 'user-owner', tenantId: 'tenant-a', role: 'owner' };
export const member: Principal = { userId: 'user-member', tenantId: 'tenant-a', role: 'member' };
export const viewer: Principal = { userId: 'user-viewer', tenantId: 'tenant-a', role: 'viewer' };
export const outsider: Principal = { userId: 'user-outsider', tenantId: 'tenant-b', role: 'owner' };

export async function buildPdf(pages = 1): Promise<Buffer> {
  const pdfDoc = await PDFDocument.create();
  for (let index = 0; index < pages; index += 1) {
    pdfDoc.addPage([612, 792]);
  }
  return Buffer.from(await pdfDoc.save());
}

export class TestClock {
  constructor(private current: Date = new Date('2026-03-01T12:00:00.000Z')) {}

  now = (): Date => new Date(this.current.getTime());

  advanceHours(hours: number): void {
    this.current = new Date(this.current.getTime() + hours * 60 * 60 * 1000);
  }
}

export interface Harness extends SigningServices {
  store: InMemorySigningStore;
  backend: InMemoryObjectBackend;
  content: ContentStore;
  clock: TestClock;
  notifier: { notify: jest.Mock };
}

export function createHarness(): Harness {
  const clock = new TestClock();
  const store = new InMemorySigningStore({ now: clock.now });
  const backend = new InMemoryObjectBackend('test-bucket');
  const content = new ContentStore(backend, AesGcmCipher.fromHex(TEST_KEY_HEX, 'test'));
  const notifier = { notify: jest.fn().mockResolvedValue(true) };

  const services = createSigningServices({
    store,
    content,
    submissionCipher: AesGcmCipher.fromHex(TEST_KEY_HEX, 'submissions-test'),
    notifier,
    defaultTtlHours: 72,
    auditFailureAlertThreshold: 3,
    now: clock.now,
  });

  return { ...services, store, backend, content, clock, notifier };
}

/** Purchase agreement with a Buyer (order 1) and a Seller (order 2). */
export async function purchaseAgreementInput(): Promise<CreateTemplateInput> {
  return {
    name: 'Purchase Agreement',
    description: 'Two-party purchase agreement',
    pdf: await buildPdf(2),
    signers: [
      { order: 1, name: 'Buyer' },
      { order: 2, name: 'Seller', color: '#16a34a' },
    ],
    fields: [
      {
        name: 'buyer_name',
        type: 'text',
        signerOrder: 1,
        position: { x: 72, y: 100, width: 200, height: 20, page: 1 },
      },
      {
        name: 'buyer_signature',
        type: 'signature',
        signerOrder: 1,
        position: { x: 72, y: 600, width: 200, height: 30, page: 2 },
      },
      {
        name: 'seller_email',
        type: 'email',
        signerOrder: 2,
        position: { x: 320, y: 100, width: 200, height: 20, page: 1 },
      },
      {
        name: 'seller_note',
        type: 'text',
        signerOrder: 2,
        required: false,
        position: { x: 320, y: 140, width: 200, height: 20, page: 1 },
      },
    ],
  };
}

export const recipients = [
  { order: 1, email: 'buyer@example.test', name: 'Bea Buyer' },
  { order: 2, email: 'seller@example.test', name: 'Sam Seller' },
];

export interface SentDocument {
  documentId: string;
  buyerToken: string;
  sellerToken: string;
  fieldIds: Record<string, string>;
}

export async function createSentDocument(harness: Harness): Promise<SentDocument> {
  const created = await harness.catalog.createTemplate(owner, await purchaseAgreementInput());
  const document = await harness.documents.createDocument(owner, {
    templateId: created.template.id,
    name: 'Purchase Agreement - Lot 7',
    recipients,
  });
  await harness.documents.sendDocument(owner, document.document.id);

  const byOrder = new Map(document.signers.map((signer) => [signer.signer_order, signer.access_token]));
  return {
    documentId: document.document.id,
    buyerToken: byOrder.get(1) ?? '',
    sellerToken: byOrder.get(2) ?? '',
    fieldIds: Object.fromEntries(created.fields.map((field) => [field.field_name, field.id])),
  };
}
