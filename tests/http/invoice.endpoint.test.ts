/**
 * Invoice endpoint tests (TOML in, TOML out).
 */

import request from 'supertest';

import { createApp } from '../../src/app';
import { Err } from '../../src/shared/result';
import type { InvoiceStore } from '../../src/storage/domain/InvoiceStore';
import { StorageErrors } from '../../src/storage/domain/StorageError';
import { InMemoryInvoiceStore } from '../../src/storage/infrastructure/InMemoryInvoiceStore';
import { SAMPLE_INVOICE_TOML, readmeLabel, sampleInvoice, wasmLabel } from '../support/fixtures';
import { tomlBody } from '../support/tomlBody';

function postInvoice(app: ReturnType<typeof createApp>, body: string): request.Test {
  return request(app).post('/v1/_i').set('Content-Type', 'application/toml').send(body);
}

describe('POST /v1/_i', () => {
  test('202 with the missing parcels when some are not uploaded yet', async () => {
    const app = createApp({ invoiceStore: new InMemoryInvoiceStore([readmeLabel.sha256]) });

    const res = await postInvoice(app, SAMPLE_INVOICE_TOML);

    expect(res.status).toBe(202);
    expect(res.headers['content-type']).toBe('application/toml');
    expect(tomlBody(res)).toEqual({ invoice: sampleInvoice(), missing: [wasmLabel] });
  });

  test('201 without a missing field when every parcel is stored', async () => {
    const app = createApp({
      invoiceStore: new InMemoryInvoiceStore([readmeLabel.sha256, wasmLabel.sha256]),
    });

    const res = await postInvoice(app, SAMPLE_INVOICE_TOML);

    expect(res.status).toBe(201);
    expect(tomlBody(res)).toEqual({ invoice: sampleInvoice() });
  });

  test('400 "resource already exists" on a duplicate', async () => {
    const app = createApp({ invoiceStore: new InMemoryInvoiceStore() });
    await postInvoice(app, SAMPLE_INVOICE_TOML);

    const res = await postInvoice(app, SAMPLE_INVOICE_TOML);

    expect(res.status).toBe(400);
    expect(tomlBody(res)).toEqual({ error: 'resource already exists' });
  });

  test('422 when creating an already yanked invoice', async () => {
    const app = createApp();

    const res = await postInvoice(app, `yanked = true\n${SAMPLE_INVOICE_TOML}`);

    expect(res.status).toBe(422);
    expect(tomlBody(res)).toEqual({ error: 'bindle cannot be created as yanked' });
  });

  test('400 malformed for a body that is not TOML', async () => {
    const app = createApp();

    const res = await postInvoice(app, 'bindleVersion = ');

    expect(res.status).toBe(400);
    expect(res.headers['content-type']).toBe('application/toml');
    expect(String(tomlBody(res).error)).toMatch(/^resource is malformed: /);
  });

  test('400 malformed when no TOML body was sent', async () => {
    const app = createApp();

    const res = await request(app).post('/v1/_i').send({ bindleVersion: '1.0.0' });

    expect(res.status).toBe(400);
    expect(tomlBody(res)).toEqual({
      error: 'resource is malformed: expected a non-empty application/toml body',
    });
  });

  test('400 with the validation issues for an incomplete invoice', async () => {
    const app = createApp();

    const res = await postInvoice(app, 'bindleVersion = "1.0.0"\n\n[bindle]\nname = "weather"\n');

    expect(res.status).toBe(400);
    expect(tomlBody(res)).toEqual({
      error: 'Invalid invoice payload: "invoice.bindle.version" must be a non-empty string.',
    });
  });

  test('500 with a generic message when the store throws', async () => {
    const failing: InvoiceStore = {
      createInvoice: jest.fn(async () => {
        throw new Error('connection reset by peer');
      }),
      getInvoice: jest.fn(async () => Err(StorageErrors.notFound())),
      yankInvoice: jest.fn(async () => Err(StorageErrors.notFound())),
    };
    const app = createApp({ invoiceStore: failing });

    const res = await postInvoice(app, SAMPLE_INVOICE_TOML);

    expect(res.status).toBe(500);
    expect(tomlBody(res)).toEqual({ error: 'internal server error' });
  });
});

describe('GET /v1/_i/:name/:version', () => {
  test('200 with the invoice', async () => {
    const app = createApp({ invoiceStore: new InMemoryInvoiceStore() });
    await postInvoice(app, SAMPLE_INVOICE_TOML);

    const res = await request(app).get('/v1/_i/weather/0.1.0');

    expect(res.status).toBe(200);
    expect(tomlBody(res)).toEqual(sampleInvoice());
  });

  test('404 "resource not found" for an unknown invoice', async () => {
    const res = await request(createApp()).get('/v1/_i/weather/0.1.0');

    expect(res.status).toBe(404);
    expect(tomlBody(res)).toEqual({ error: 'resource not found' });
  });

  test('400 "invalid ID given" for a version that is not semver', async () => {
    const res = await request(createApp()).get('/v1/_i/weather/latest');

    expect(res.status).toBe(400);
    expect(tomlBody(res)).toEqual({ error: 'invalid ID given' });
  });

  test('a storage I/O "not found" failure is rendered as 404 resource not found', async () => {
    const enoent: NodeJS.ErrnoException = Object.assign(new Error('ENOENT: no such file'), {
      code: 'ENOENT',
    });
    const store: InvoiceStore = {
      createInvoice: jest.fn(async () => Err(StorageErrors.exists())),
      getInvoice: jest.fn(async () => Err(StorageErrors.io(enoent))),
      yankInvoice: jest.fn(async () => Err(StorageErrors.io(enoent))),
    };

    const res = await request(createApp({ invoiceStore: store })).get('/v1/_i/weather/0.1.0');

    expect(res.status).toBe(404);
    expect(tomlBody(res)).toEqual({ error: 'resource not found' });
  });
});

describe('DELETE /v1/_i/:name/:version', () => {
  test('yanks the invoice; it then needs ?yanked=true', async () => {
    const app = createApp({ invoiceStore: new InMemoryInvoiceStore() });
    await postInvoice(app, SAMPLE_INVOICE_TOML);

    const yank = await request(app).delete('/v1/_i/weather/0.1.0');
    expect(yank.status).toBe(200);
    expect(tomlBody(yank)).toEqual({ id: 'weather/0.1.0', yanked: true });

    const hidden = await request(app).get('/v1/_i/weather/0.1.0');
    expect(hidden.status).toBe(400);
    expect(tomlBody(hidden)).toEqual({ error: 'bindle is yanked' });

    const shown = await request(app).get('/v1/_i/weather/0.1.0?yanked=true');
    expect(shown.status).toBe(200);
    expect(tomlBody(shown).yanked).toBe(true);
  });
});
