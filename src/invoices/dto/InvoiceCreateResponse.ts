// src/invoices/dto/InvoiceCreateResponse.ts

/**
 * InvoiceCreateResponse
 * ---------------------
 * Reply body for invoice creation. Invoices can be created before their
 * parcels are uploaded, so the reply also lists the parcels still missing.
 *
 * Serialized shape (fields are nested, never merged into the invoice):
 *
 *   [invoice]
 *   bindleVersion = "1.0.0"
 *   ...
 *   [[missing]]
 *   sha256 = "..."
 *
 * `missing` is only emitted when non-empty. When reading, an absent list and
 * an empty list both mean the invoice is fully satisfied.
 */

import type { Invoice, Label } from '../domain/Invoice';
import { readInvoice, readLabel } from './InvoiceDto';
import { InvoiceValidationError } from './InvoiceValidationError';

export interface InvoiceCreateResponse {
  readonly invoice: Invoice;
  readonly missing?: readonly Label[];
}

const ALLOWED_FIELDS: readonly string[] = ['invoice', 'missing'];

export function buildInvoiceCreateResponse(
  invoice: Invoice,
  missing: readonly Label[] = [],
): InvoiceCreateResponse {
  return Object.freeze({
    invoice,
    ...(missing.length > 0 ? { missing: Object.freeze([...missing]) } : {}),
  });
}

export function isFullySatisfied(response: InvoiceCreateResponse): boolean {
  return response.missing === undefined || response.missing.length === 0;
}

/**
 * Strict reader for a decoded invoice-creation reply.
 * Any field besides `invoice` and `missing` is rejected.
 */
export function parseInvoiceCreateResponse(payload: unknown): InvoiceCreateResponse {
  if (!isRecord(payload)) {
    throw new InvoiceValidationError('Invalid invoice create response', [
      'Payload must be a table.',
    ]);
  }

  const issues: string[] = [];

  for (const key of Object.keys(payload)) {
    if (!ALLOWED_FIELDS.includes(key)) {
      issues.push(`Unknown field "${key}".`);
    }
  }

  const invoice = readInvoice(payload.invoice, 'invoice', issues);
  const missing = readMissing(payload.missing, issues);

  if (issues.length > 0 || !invoice) {
    throw new InvoiceValidationError('Invalid invoice create response', issues);
  }

  return Object.freeze({ invoice, ...(missing !== undefined ? { missing } : {}) });
}

function readMissing(value: unknown, issues: string[]): Label[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    issues.push('"missing" must be an array of labels when provided.');
    return undefined;
  }
  return value.map((entry: unknown, index) => readLabel(entry, `missing[${index}]`, issues));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
