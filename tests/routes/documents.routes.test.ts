import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import http from 'http';
import { once } from 'events';
import JSZip from 'jszip';
import { PDFDocument } from 'pdf-lib';
import { createApp } from '../../src/app';
import { initRegistry, ResourceRegistry } from '../../src/services/registry.service';
import { catalogJson, makeTemplatePdf } from '../helpers/fixtures';
import { MemoryBlobStore } from '../helpers/memory-blob-store';

const API_KEY = 'test-secret';
const fixedNow = () => new Date(Date.UTC(2024, 2, 10, 14, 5, 0));

interface Harness {
  readonly server: http.Server;
  readonly baseUrl: string;
}

async function listen(registry: ResourceRegistry, apiKey = API_KEY, bodyLimit?: string): Promise<Harness> {
  const app = createApp({ registry, apiKey, bodyLimit, now: fixedNow });
  const server = app.listen(0, '127.0.0.1');
  await once(server, 'listening');
  const address = server.address();
  const port = address && typeof address === 'object' ? address.port : 0;
  return { server, baseUrl: `http://127.0.0.1:${port}` };
}

function close(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
}

type FetchResponse = Awaited<ReturnType<typeof fetch>>;

async function readJson(res: FetchResponse): Promise<Record<string, unknown>> {
  const body: unknown = await res.json();
  if (!body || typeof body !== 'object' || Array.isArray(body)) {
    throw new Error('Expected a JSON object body');
  }
  return Object.fromEntries(Object.entries(body));
}

function postJson(baseUrl: string, path: string, body: unknown, apiKey = API_KEY): Promise<FetchResponse> {
  return fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', 'X-API-KEY': apiKey },
    body: JSON.stringify(body),
  });
}

function get(baseUrl: string, path: string, apiKey = API_KEY): Promise<FetchResponse> {
  return fetch(`${baseUrl}${path}`, { headers: { 'X-API-KEY': apiKey } });
}

const invoiceRequest = {
  template_names: ['invoice'],
  context: {
    customer_name: 'Acme',
    items: [{ name: 'Widget', qty: 1, price: '10', total: '10' }],
    total: '10',
    customer_nipt: 'K123',
  },
};

describe('documents API', () => {
  let store: MemoryBlobStore;
  let harness: Harness;

  beforeEach(async () => {
    store = new MemoryBlobStore();
    store.put('coordinates.json', catalogJson);
    store.put('templates/invoice.pdf', await makeTemplatePdf(1));
    store.put('templates/contract.pdf', await makeTemplatePdf(2));

    const registry = new ResourceRegistry();
    await initRegistry(registry, store, { coordinatesKey: 'coordinates.json', templatesPrefix: 'templates/' });
    harness = await listen(registry);
  });

  afterEach(async () => {
    await close(harness.server);
  });

  describe('POST /api/documents/merge', () => {
    it('returns the stamped PDF and files it under the customer key', async () => {
      const res = await postJson(harness.baseUrl, '/api/documents/merge', invoiceRequest);

      expect(res.status).toBe(200);
      expect(res.headers.get('content-type')).toBe('application/pdf');
      expect(res.headers.get('content-disposition')).toBe('attachment; filename="merged_document.pdf"');
      expect(res.headers.get('x-document-key')).toBe('contracts/K123_20240310140500.pdf');

      const body = Buffer.from(await res.arrayBuffer());
      expect((await PDFDocument.load(body)).getPageCount()).toBe(1);
      expect(store.objects.get('contracts/K123_20240310140500.pdf')?.bytes.equals(body)).toBe(true);
    });

    it('concatenates templates in the requested order', async () => {
      const res = await postJson(harness.baseUrl, '/api/documents/merge', {
        template_names: ['contract', 'invoice', 'contract'],
        context: { customer_name: 'Acme', nipt: 'L1' },
      });

      expect(res.status).toBe(200);
      const pdf = await PDFDocument.load(Buffer.from(await res.arrayBuffer()));
      expect(pdf.getPageCount()).toBe(5);
    });

    it('answers 404 and stores nothing for an unknown template', async () => {
      const res = await postJson(harness.baseUrl, '/api/documents/merge', {
        template_names: ['invoice', 'ghost'],
        context: { customer_name: 'Acme' },
      });

      expect(res.status).toBe(404);
      expect(await readJson(res)).toEqual({
        success: false,
        error: "Coordinates for template 'ghost' not found.",
        code: 'SPEC_NOT_FOUND',
      });
      expect(await store.list('contracts/')).toEqual([]);
    });

    it('answers 400 when template_names is not a list', async () => {
      const res = await postJson(harness.baseUrl, '/api/documents/merge', {
        template_names: 'invoice',
        context: { customer_name: 'Acme' },
      });

      expect(res.status).toBe(400);
      expect(await readJson(res)).toEqual({
        success: false,
        error: "template_names: 'template_names' must be a list",
        code: 'VALIDATION_FAILED',
      });
    });

    it('answers 400 for a malformed JSON body', async () => {
      const res = await fetch(`${harness.baseUrl}/api/documents/merge`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', 'X-API-KEY': API_KEY },
        body: '{"template_names": [',
      });

      expect(res.status).toBe(400);
      expect((await readJson(res)).error).toBe('Malformed JSON body');
    });

    it('answers 400 and stores nothing for a customer id retrieval could never match', async () => {
      const res = await postJson(harness.baseUrl, '/api/documents/merge', {
        template_names: ['invoice'],
        context: { customer_name: 'Acme', customer_nipt: 'K 12/3' },
      });

      expect(res.status).toBe(400);
      expect(await readJson(res)).toEqual({
        success: false,
        error: 'context.customer_nipt: Customer id may only contain letters, digits, dot, underscore and hyphen',
        code: 'VALIDATION_FAILED',
      });
      expect(await store.list('contracts/')).toEqual([]);
    });

    it('serves a generated document back through retrieval', async () => {
      const merged = await postJson(harness.baseUrl, '/api/documents/merge', {
        ...invoiceRequest,
        context: { ...invoiceRequest.context, customer_nipt: undefined, nipt: 'K-12.3' },
      });
      expect(merged.status).toBe(200);
      expect(merged.headers.get('x-document-key')).toBe('contracts/K-12.3_20240310140500.pdf');
      const generated = Buffer.from(await merged.arrayBuffer());

      const latest = await get(harness.baseUrl, '/api/documents/K-12.3/latest');

      expect(latest.status).toBe(200);
      expect(Buffer.from(await latest.arrayBuffer()).equals(generated)).toBe(true);
    });

    it('answers 500 without a document when storing fails', async () => {
      store.failUploads = true;

      const res = await postJson(harness.baseUrl, '/api/documents/merge', invoiceRequest);

      expect(res.status).toBe(500);
      expect(res.headers.get('content-type')).toContain('application/json');
      expect(await readJson(res)).toEqual({
        success: false,
        error: 'Storage upload failed.',
        code: 'STORAGE_FAILURE',
      });
    });

    it('rejects requests without the API key', async () => {
      const res = await postJson(harness.baseUrl, '/api/documents/merge', invoiceRequest, 'wrong-key');

      expect(res.status).toBe(401);
      expect(await readJson(res)).toEqual({ success: false, error: 'Unauthorized', code: 'UNAUTHORIZED' });
    });
  });

  describe('GET /api/documents/:customerId', () => {
    beforeEach(() => {
      store.put('contracts/K123_20240102030405.pdf', 't1');
      store.put('contracts/K123_20240304050607.pdf', 't3');
      store.put('contracts/K123_20240203040506.pdf', 't2');
      store.put('contracts/K123_4_20250101000000.pdf', 'someone else');
    });

    it('returns the latest document', async () => {
      const res = await get(harness.baseUrl, '/api/documents/K123/latest');

      expect(res.status).toBe(200);
      expect(res.headers.get('content-type')).toBe('application/pdf');
      expect(res.headers.get('content-disposition')).toBe('attachment; filename="K123_20240304050607.pdf"');
      expect(await res.text()).toBe('t3');
    });

    it('returns every document as a zip', async () => {
      const res = await get(harness.baseUrl, '/api/documents/K123/archive');

      expect(res.status).toBe(200);
      expect(res.headers.get('content-type')).toBe('application/zip');
      const zip = await JSZip.loadAsync(Buffer.from(await res.arrayBuffer()));
      expect(Object.keys(zip.files)).toEqual([
        'K123_20240102030405.pdf',
        'K123_20240203040506.pdf',
        'K123_20240304050607.pdf',
      ]);
    });

    it('answers 404 for a customer without documents', async () => {
      const res = await get(harness.baseUrl, '/api/documents/NOBODY/latest');

      expect(res.status).toBe(404);
      expect((await readJson(res)).code).toBe('DOCUMENT_NOT_FOUND');
    });

    it('answers 400 for an invalid customer id', async () => {
      const res = await get(harness.baseUrl, '/api/documents/K%2A1/archive');

      expect(res.status).toBe(400);
    });
  });

  describe('GET /api/templates', () => {
    it('lists templates that have both coordinates and a PDF', async () => {
      const res = await get(harness.baseUrl, '/api/templates');

      expect(await readJson(res)).toEqual({
        success: true,
        data: [
          { name: 'invoice', pageCount: 1 },
          { name: 'contract', pageCount: 2 },
        ],
      });
    });
  });
});

describe('service readiness', () => {
  it('reports not configured before resources are loaded', async () => {
    const harness = await listen(new ResourceRegistry());
    try {
      const res = await postJson(harness.baseUrl, '/api/documents/merge', invoiceRequest);

      expect(res.status).toBe(500);
      expect(await readJson(res)).toEqual({
        success: false,
        error: 'Server is not configured correctly. Cannot connect to storage.',
        code: 'NOT_CONFIGURED',
      });
    } finally {
      await close(harness.server);
    }
  });

  it('refuses to serve when no API key is configured', async () => {
    const harness = await listen(new ResourceRegistry(), '');
    try {
      const res = await get(harness.baseUrl, '/api/templates');

      expect(res.status).toBe(500);
      expect((await readJson(res)).error).toBe('Server configuration error');
    } finally {
      await close(harness.server);
    }
  });

  it('answers 413 for a body over the configured limit', async () => {
    const harness = await listen(new ResourceRegistry(), API_KEY, '1kb');
    try {
      const res = await postJson(harness.baseUrl, '/api/documents/merge', {
        ...invoiceRequest,
        context: { ...invoiceRequest.context, notes: 'x'.repeat(4096) },
      });

      expect(res.status).toBe(413);
      expect(await readJson(res)).toEqual({
        success: false,
        error: 'request entity too large',
        code: 'VALIDATION_FAILED',
      });
    } finally {
      await close(harness.server);
    }
  });

  it('serves health without an API key', async () => {
    const harness = await listen(new ResourceRegistry());
    try {
      const res = await fetch(`${harness.baseUrl}/api/health`);
      const body = await readJson(res);

      expect(res.status).toBe(200);
      expect(body.status).toBe('pending');
      expect(body.templates).toBe(0);
      expect(res.headers.get('x-request-id')).toMatch(/^[0-9a-f-]{36}$/);
    } finally {
      await close(harness.server);
    }
  });
});
