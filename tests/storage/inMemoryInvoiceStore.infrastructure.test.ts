/**
 * InMemoryInvoiceStore tests.
 */

import { InMemoryInvoiceStore } from '../../src/storage/infrastructure/InMemoryInvoiceStore';
import { readmeLabel, sampleInvoice, wasmLabel } from '../support/fixtures';

describe('InMemoryInvoiceStore', () => {
  test('createInvoice reports missing parcels in invoice order', async () => {
    const store = new InMemoryInvoiceStore();

    const result = await store.createInvoice(sampleInvoice());

    expect(result).toEqual({ ok: true, value: { invoice: sampleInvoice(), missing: [readmeLabel, wasmLabel] } });
  });

  test('stored parcels are not reported as missing', async () => {
    const store = new InMemoryInvoiceStore([readmeLabel.sha256]);

    const result = await store.createInvoice(sampleInvoice());

    expect(result.ok && result.value.missing).toEqual([wasmLabel]);
  });

  test('rejects duplicates, yanked creations and invalid ids', async () => {
    const store = new InMemoryInvoiceStore();
    await store.createInvoice(sampleInvoice());

    expect(await store.createInvoice(sampleInvoice())).toEqual({ ok: false, error: { kind: 'exists' } });
    expect(
      await store.createInvoice(
        sampleInvoice({ yanked: true, bindle: { name: 'weather', version: '0.2.0' } }),
      ),
    ).toEqual({ ok: false, error: { kind: 'createYanked' } });
    expect(
      await store.createInvoice(sampleInvoice({ bindle: { name: 'weather', version: 'latest' } })),
    ).toEqual({ ok: false, error: { kind: 'invalidId' } });
  });

  test('getInvoice hides yanked invoices unless asked', async () => {
    const store = new InMemoryInvoiceStore();
    await store.createInvoice(sampleInvoice());

    expect(await store.yankInvoice('weather/0.1.0')).toEqual({ ok: true, value: undefined });
    expect(await store.getInvoice('weather/0.1.0')).toEqual({ ok: false, error: { kind: 'yanked' } });

    const included = await store.getInvoice('weather/0.1.0', { includeYanked: true });
    expect(included.ok && included.value.yanked).toBe(true);
  });

  test('unknown ids are notFound, unparsable ids are invalidId', async () => {
    const store = new InMemoryInvoiceStore();

    expect(await store.getInvoice('weather/9.9.9')).toEqual({ ok: false, error: { kind: 'notFound' } });
    expect(await store.yankInvoice('weather/9.9.9')).toEqual({ ok: false, error: { kind: 'notFound' } });
    expect(await store.getInvoice('weather')).toEqual({ ok: false, error: { kind: 'invalidId' } });
  });
});
