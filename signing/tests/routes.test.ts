import express from 'express';
import { Server } from 'http';
import { SigningController } from '../src/api/controller';
import { PRINCIPAL_HEADERS } from '../src/api/principal';
import { createRouter } from '../src/api/routes';
import { Principal } from '../src/types';
import { buildPdf, createHarness, Harness, outsider, owner, recipients, viewer } from './support';

function read(value: unknown, ...path: Array<string | number>): unknown {
  let current = value;
  for (const key of path) {
    if (typeof current !== 'object' || current === null) {
      return undefined;
    }
    current = Reflect.get(current, key);
  }
  return current;
}

function readString(value: unknown, ...path: Array<string | number>): string {
  const found = read(value, ...path);
  if (typeof found !== 'string') {
    throw new Error(`Expected a string at ${path.join('.')}`);
  }
  return found;
}

function headersFor(principal: Principal): Record<string, string> {
  return {
    [PRINCIPAL_HEADERS.userId]: principal.userId,
    [PRINCIPAL_HEADERS.tenantId]: principal.tenantId,
    [PRINCIPAL_HEADERS.role]: principal.role,
  };
}

describe('signing router', () => {
  let server: Server;
  let baseUrl: string;
  let harness: Harness;
  let ready: boolean;

  async function call(
    method: string,
    path: string,
    options: { principal?: Principal; body?: unknown } = {}
  ): Promise<{ status: number; body: unknown }> {
    const headers: Record<string, string> = options.principal ? headersFor(options.principal) : {};
    if (options.body !== undefined) {
      headers['content-type'] = 'application/json';
    }

    const response = await fetch(`${baseUrl}/api/signing/v1${path}`, {
      method,
      headers,
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
    });
    return { status: response.status, body: await response.json() };
  }

  async function createTemplate(): Promise<{ templateId: string; fieldIds: Record<string, string> }> {
    const pdf = await buildPdf(2);
    const created = await call('POST', '/templates', {
      principal: owner,
      body: {
        name: 'Service Agreement',
        pdfBase64: pdf.toString('base64'),
        signers: [
          { order: 1, name: 'Client' },
          { order: 2, name: 'Provider' },
        ],
        fields: [
          { name: 'client_name', type: 'text', signerOrder: 1, position: { x: 72, y: 90, width: 180, height: 20 } },
          { name: 'provider_phone', type: 'phone', signerOrder: 2, position: { x: 72, y: 130, width: 180, height: 20, page: 2 } },
        ],
      },
    });
    expect(created.status).toBe(201);

    const fields = read(created.body, 'data', 'fields');
    const fieldIds: Record<string, string> = {};
    if (Array.isArray(fields)) {
      for (const field of fields) {
        fieldIds[readString(field, 'name')] = readString(field, 'id');
      }
    }
    return { templateId: readString(created.body, 'data', 'template', 'id'), fieldIds };
  }

  beforeEach(async () => {
    harness = createHarness();
    ready = true;

    const app = express();
    app.use(express.json({ limit: '10mb' }));
    const controller = new SigningController(harness.catalog, harness.documents, harness.signing);
    app.use(
      '/api/signing/v1',
      createRouter(controller, {
        readinessCheck: async () => {
          if (!ready) {
            throw new Error('database unavailable');
          }
        },
      })
    );

    await new Promise<void>((resolve) => {
      server = app.listen(0, () => resolve());
    });

    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  });

  test('health and readiness', async () => {
    const health = await call('GET', '/health');
    expect(health.status).toBe(200);
    expect(health.body).toMatchObject({ success: true, service: 'signing', status: 'ok' });

    ready = false;
    const readiness = await call('GET', '/ready');
    expect(readiness.status).toBe(503);
    expect(readiness.body).toEqual({
      success: false,
      service: 'signing',
      ready: false,
      error: 'Dependencies not ready',
    });
  });

  test('management routes require principal headers', async () => {
    const missing = await call('GET', '/templates');
    expect(missing.status).toBe(401);
    expect(missing.body).toMatchObject({
      success: false,
      error: 'unauthenticated',
      message: 'Missing or invalid principal headers',
    });

    const response = await fetch(`${baseUrl}/api/signing/v1/templates`, {
      headers: { ...headersFor(owner), [PRINCIPAL_HEADERS.role]: 'superuser' },
    });
    expect(response.status).toBe(401);
  });

  test('malformed bodies report every issue', async () => {
    const response = await call('POST', '/templates', { principal: owner, body: {} });

    expect(response.status).toBe(400);
    expect(response.body).toMatchObject({
      success: false,
      error: 'validation',
      message: 'Invalid request body',
      issues: [
        { path: 'name', message: 'name must be a string' },
        { path: 'pdfBase64', message: 'pdfBase64 must be a string' },
        { path: 'signers', message: 'signers must be an array' },
        { path: 'fields', message: 'fields must be an array' },
      ],
    });
  });

  test('error kinds map onto status codes', async () => {
    const { templateId } = await createTemplate();

    const forbidden = await call('POST', '/documents', {
      principal: viewer,
      body: { templateId, name: 'Contract', recipients },
    });
    expect(forbidden.status).toBe(403);
    expect(read(forbidden.body, 'error')).toBe('permission');

    const created = await call('POST', '/documents', {
      principal: owner,
      body: { templateId, name: 'Contract', recipients },
    });
    const documentId = readString(created.body, 'data', 'document', 'id');

    const foreign = await call('GET', `/documents/${documentId}`, { principal: outsider });
    expect(foreign.status).toBe(404);
    expect(foreign.body).toMatchObject({ error: 'not_found', message: `Document ${documentId} not found` });

    const notCompleted = await call('GET', `/documents/${documentId}/final`, { principal: owner });
    expect(notCompleted.status).toBe(409);

    const unknownToken = await call('GET', '/sign/unknown-token');
    expect(unknownToken.status).toBe(404);
    expect(unknownToken.body).toMatchObject({ error: 'not_found', message: 'Access token not found' });
  });

  test('recipients complete a document with their tokens', async () => {
    const { templateId, fieldIds } = await createTemplate();

    const created = await call('POST', '/documents', {
      principal: owner,
      body: { templateId, name: 'Contract', recipients, expiresAt: '2026-03-10T00:00:00.000Z' },
    });
    expect(created.status).toBe(201);
    expect(read(created.body, 'data', 'document', 'expiresAt')).toBe('2026-03-10T00:00:00.000Z');
    const documentId = readString(created.body, 'data', 'document', 'id');
    const clientToken = readString(created.body, 'data', 'signers', 0, 'accessToken');
    const providerToken = readString(created.body, 'data', 'signers', 1, 'accessToken');

    const sent = await call('POST', `/documents/${documentId}/send`, { principal: owner });
    expect(read(sent.body, 'data', 'status')).toBe('sent');

    const session = await call('GET', `/sign/${clientToken}`);
    expect(session.status).toBe(200);
    expect(read(session.body, 'data', 'signer', 'email')).toBe('buyer@example.test');
    expect(read(session.body, 'data', 'document', 'totalPages')).toBe(2);

    const invalidPhone = await call('PUT', `/sign/${providerToken}/fields/${fieldIds.provider_phone}`, {
      body: { value: 'not a phone' },
    });
    expect(invalidPhone.status).toBe(400);
    expect(read(invalidPhone.body, 'message')).toBe('provider_phone must be a valid phone number');

    const submitted = await call('PUT', `/sign/${clientToken}/fields/${fieldIds.client_name}`, {
      body: { value: 'Casey Client' },
    });
    expect(submitted.status).toBe(200);
    expect(read(submitted.body, 'data', 'fieldName')).toBe('client_name');

    await call('PUT', `/sign/${providerToken}/fields/${fieldIds.provider_phone}`, { body: { value: '+1 555 010 9999' } });

    const values = await call('GET', `/sign/${clientToken}/values`);
    expect(read(values.body, 'data', 0, 'value')).toBe('Casey Client');

    const first = await call('POST', `/sign/${clientToken}/signature`, { body: { signature: 'sig-client' } });
    expect(read(first.body, 'data', 'completed')).toBe(false);

    const second = await call('POST', `/sign/${providerToken}/signature`, { body: { signature: 'sig-provider' } });
    expect(second.status).toBe(200);
    expect(read(second.body, 'data', 'completed')).toBe(true);
    const finalHash = readString(second.body, 'data', 'document', 'finalDocumentHash');

    const final = await fetch(`${baseUrl}/api/signing/v1/documents/${documentId}/final`, { headers: headersFor(owner) });
    expect(final.status).toBe(200);
    expect(final.headers.get('content-type')).toBe('application/pdf');
    expect(final.headers.get('x-document-hash')).toBe(finalHash);
    const pdf = Buffer.from(await final.arrayBuffer());
    expect(pdf.subarray(0, 5).toString()).toBe('%PDF-');

    const closed = await call('PUT', `/sign/${clientToken}/fields/${fieldIds.client_name}`, { body: { value: 'Late' } });
    expect(closed.status).toBe(409);

    const audit = await call('GET', `/documents/${documentId}/audit`, { principal: owner });
    const actions = read(audit.body, 'data');
    expect(Array.isArray(actions) ? actions.map((entry) => read(entry, 'action')) : []).toEqual([
      'document_created',
      'document_sent',
      'field_filled',
      'field_filled',
      'document_signed',
      'document_signed',
      'document_completed',
    ]);
  });
});
