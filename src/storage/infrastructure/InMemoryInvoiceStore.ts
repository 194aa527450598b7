/**
 * In-memory InvoiceStore.
 *
 * Keeps invoices keyed by `<name>/<version>` and a set of parcel digests that
 * are considered uploaded. Used by the composition root for local runs and by
 * the endpoint tests.
 */

import type { Invoice, Label } from '../../invoices/domain/Invoice';
import { invoiceId } from '../../invoices/domain/Invoice';
import { Err, Ok } from '../../shared/result';
import type { Result } from '../../shared/result';
import type { CreatedInvoice, GetInvoiceOptions, InvoiceStore } from '../domain/InvoiceStore';
import type { StorageError } from '../domain/StorageError';
import { StorageErrors } from '../domain/StorageError';

const SEMVER = /^\d+\.\d+\.\d+(?:-[0-9A-Za-z.-]+)?(?:\+[0-9A-Za-z.-]+)?$/;

export class InMemoryInvoiceStore implements InvoiceStore {
  private readonly invoices = new Map<string, Invoice>();
  private readonly parcels: Set<string>;

  public constructor(storedParcelDigests: Iterable<string> = []) {
    this.parcels = new Set(storedParcelDigests);
  }

  public async createInvoice(invoice: Invoice): Promise<Result<CreatedInvoice, StorageError>> {
    const id = invoiceId(invoice);
    if (!isValidId(id)) return Err(StorageErrors.invalidId());
    if (invoice.yanked === true) return Err(StorageErrors.createYanked());
    if (this.invoices.has(id)) return Err(StorageErrors.exists());

    this.invoices.set(id, invoice);

    return Ok({ invoice, missing: this.missingParcels(invoice) });
  }

  public async getInvoice(
    id: string,
    options: GetInvoiceOptions = {},
  ): Promise<Result<Invoice, StorageError>> {
    if (!isValidId(id)) return Err(StorageErrors.invalidId());

    const invoice = this.invoices.get(id);
    if (!invoice) return Err(StorageErrors.notFound());
    if (invoice.yanked === true && options.includeYanked !== true) {
      return Err(StorageErrors.yanked());
    }

    return Ok(invoice);
  }

  public async yankInvoice(id: string): Promise<Result<void, StorageError>> {
    if (!isValidId(id)) return Err(StorageErrors.invalidId());

    const invoice = this.invoices.get(id);
    if (!invoice) return Err(StorageErrors.notFound());

    this.invoices.set(id, { ...invoice, yanked: true });
    return Ok(undefined);
  }

  private missingParcels(invoice: Invoice): Label[] {
    return (invoice.parcel ?? [])
      .map((parcel) => parcel.label)
      .filter((label) => !this.parcels.has(label.sha256));
  }
}

function isValidId(id: string): boolean {
  const separator = id.lastIndexOf('/');
  if (separator <= 0) return false;

  const version = id.slice(separator + 1);
  return SEMVER.test(version);
}
