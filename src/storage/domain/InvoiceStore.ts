/**
 * InvoiceStore
 * ------------
 * Storage contract used by the invoice routes.
 *
 * Failures come back as StorageError values so the HTTP boundary can render
 * them; implementations only throw for programming errors.
 */

import type { Invoice, Label } from '../../invoices/domain/Invoice';
import type { Result } from '../../shared/result';
import type { StorageError } from './StorageError';

export interface CreatedInvoice {
  invoice: Invoice;

  /**
   * Labels of referenced parcels that are not stored yet, in invoice order.
   */
  missing: Label[];
}

export interface GetInvoiceOptions {
  /**
   * Return yanked invoices instead of failing with `yanked`.
   */
  includeYanked?: boolean;
}

export interface InvoiceStore {
  createInvoice(invoice: Invoice): Promise<Result<CreatedInvoice, StorageError>>;
  getInvoice(id: string, options?: GetInvoiceOptions): Promise<Result<Invoice, StorageError>>;
  yankInvoice(id: string): Promise<Result<void, StorageError>>;
}
