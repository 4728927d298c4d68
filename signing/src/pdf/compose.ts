import { PDFDocument, PDFFont, PDFPage, StandardFonts, rgb } from 'pdf-lib';
import { SnapshotField } from '../types';
import { ValidationError } from '../utils/errors';

export interface StampedValue {
  field: SnapshotField;
  value: string;
  signerColor: string;
}

export interface CertificateEntry {
  order: number;
  name: string;
  email: string;
  algorithm: string;
  signedAt: Date;
  ip: string | null;
}

export interface CompositionInput {
  sourcePdf: Buffer;
  documentId: string;
  documentName: string;
  snapshotHash: string;
  completedAt: Date;
  values: StampedValue[];
  signers: CertificateEntry[];
}

const CERTIFICATE_MARGIN = 48;
const MAX_FIELD_FONT_SIZE = 12;

async function loadPdf(pdf: Buffer): Promise<PDFDocument> {
  try {
    return await PDFDocument.load(pdf, { ignoreEncryption: true });
  } catch (error) {
    throw new ValidationError('pdf could not be parsed', [
      { path: 'pdf', message: error instanceof Error ? error.message : 'unreadable PDF' },
    ]);
  }
}

export async function countPdfPages(pdf: Buffer): Promise<number> {
  const pdfDoc = await loadPdf(pdf);
  const count = pdfDoc.getPageCount();
  if (count === 0) {
    throw new ValidationError('pdf has no pages', [{ path: 'pdf', message: 'pdf has no pages' }]);
  }
  return count;
}

// Standard fonts only encode WinAnsi.
function printable(text: string): string {
  return text.replace(/[^\x20-\x7E\xA0-\xFF]/g, '?');
}

function hexToRgb(hex: string) {
  const value = Number.parseInt(hex.slice(1), 16);
  return rgb(((value >> 16) & 0xff) / 255, ((value >> 8) & 0xff) / 255, (value & 0xff) / 255);
}

function fitText(text: string, font: PDFFont, size: number, maxWidth: number): string {
  let fitted = text;
  while (fitted.length > 0 && font.widthOfTextAtSize(fitted, size) > maxWidth) {
    fitted = fitted.slice(0, -1);
  }
  return fitted;
}

function stampValue(page: PDFPage, font: PDFFont, stamped: StampedValue): void {
  const { position, type } = stamped.field;
  const pageHeight = page.getHeight();
  const size = Math.max(4, Math.min(MAX_FIELD_FONT_SIZE, position.height * 0.7));
  // Positions are measured from the top-left corner; PDF space starts bottom-left.
  const bottom = pageHeight - position.y - position.height;
  const color = hexToRgb(stamped.signerColor);

  const text = type === 'checkbox' ? (stamped.value.trim() === 'true' ? 'X' : '') : printable(stamped.value.trim());
  if (text.length === 0) {
    return;
  }

  page.drawText(fitText(text, font, size, Math.max(0, position.width - 4)), {
    x: position.x + 2,
    y: bottom + (position.height - size) / 2 + size * 0.2,
    size,
    font,
    color,
  });

  if (type === 'signature') {
    page.drawLine({
      start: { x: position.x, y: bottom + 1 },
      end: { x: position.x + position.width, y: bottom + 1 },
      thickness: 0.75,
      color,
    });
  }
}

function certificateLines(input: CompositionInput): string[] {
  const lines = [
    `Document: ${input.documentName}`,
    `Document ID: ${input.documentId}`,
    `Template snapshot: ${input.snapshotHash}`,
    `Completed: ${input.completedAt.toISOString()}`,
    '',
  ];

  for (const signer of [...input.signers].sort((a, b) => a.order - b.order)) {
    lines.push(`${signer.order}. ${signer.name} <${signer.email}>`);
    lines.push(
      `   Signed ${signer.signedAt.toISOString()} with ${signer.algorithm}${signer.ip ? ` from ${signer.ip}` : ''}`
    );
  }

  return lines.map(printable);
}

function appendCertificate(pdfDoc: PDFDocument, font: PDFFont, input: CompositionInput): void {
  let page = pdfDoc.addPage();
  let y = page.getHeight() - CERTIFICATE_MARGIN;

  page.drawText('Signature Certificate', {
    x: CERTIFICATE_MARGIN,
    y,
    size: 18,
    font,
    color: rgb(0.05, 0.1, 0.1),
  });
  y -= 28;

  for (const line of certificateLines(input)) {
    if (y < CERTIFICATE_MARGIN) {
      page = pdfDoc.addPage();
      y = page.getHeight() - CERTIFICATE_MARGIN;
    }
    page.drawText(fitText(line, font, 10, page.getWidth() - CERTIFICATE_MARGIN * 2), {
      x: CERTIFICATE_MARGIN,
      y,
      size: 10,
      font,
      color: rgb(0.25, 0.3, 0.32),
    });
    y -= 14;
  }
}

/**
 * Stamps submitted values at their field positions and appends a certificate
 * page. Pages beyond the source document are ignored.
 */
export async function composeFinalPdf(input: CompositionInput): Promise<Buffer> {
  const pdfDoc = await loadPdf(input.sourcePdf);
  const font = await pdfDoc.embedFont(StandardFonts.Helvetica);
  const pages = pdfDoc.getPages();

  for (const stamped of input.values) {
    const page = pages[stamped.field.position.page - 1];
    if (page) {
      stampValue(page, font, stamped);
    }
  }

  appendCertificate(pdfDoc, font, input);
  pdfDoc.setModificationDate(input.completedAt);

  return Buffer.from(await pdfDoc.save());
}
