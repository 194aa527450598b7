// src/invoices/dto/InvoiceDto.ts

/**
 * Invoice DTO parser/validator
 *
 * Boundary validator for decoded invoice documents (POST /v1/_i) and for the
 * labels embedded in invoice-creation responses.
 * Returns a strongly typed domain object or throws InvoiceValidationError.
 */

import type { BindleSpec, Invoice, Label, Parcel } from '../domain/Invoice';
import { InvoiceValidationError } from './InvoiceValidationError';

export function parseInvoiceDto(payload: unknown): Invoice {
  const issues: string[] = [];
  const invoice = readInvoice(payload, 'invoice', issues);

  if (issues.length > 0 || !invoice) {
    throw new InvoiceValidationError('Invalid invoice payload', issues);
  }

  return invoice;
}

/**
 * Reads an invoice at `path`, collecting problems into `issues`.
 * Returns undefined when the value is not an object at all.
 */
export function readInvoice(value: unknown, path: string, issues: string[]): Invoice | undefined {
  if (!isRecord(value)) {
    issues.push(`"${path}" must be an object.`);
    return undefined;
  }

  const bindleVersion = readNonEmptyString(value, 'bindleVersion', path, issues);
  const yanked = readOptionalBoolean(value, 'yanked', path, issues);
  const bindle = readBindleSpec(value.bindle, `${path}.bindle`, issues);
  const annotations = readOptionalStringMap(value, 'annotations', path, issues);
  const parcel = readOptionalParcels(value, 'parcel', path, issues);

  return {
    bindleVersion,
    ...(yanked !== undefined ? { yanked } : {}),
    bindle,
    ...(annotations ? { annotations } : {}),
    ...(parcel ? { parcel } : {}),
  };
}

export function readLabel(value: unknown, path: string, issues: string[]): Label {
  if (!isRecord(value)) {
    issues.push(`"${path}" must be an object.`);
    return { sha256: '', mediaType: '', name: '', size: 0 };
  }

  const sha256 = readNonEmptyString(value, 'sha256', path, issues);
  const mediaType = readNonEmptyString(value, 'mediaType', path, issues);
  const name = readNonEmptyString(value, 'name', path, issues);
  const size = readSize(value, 'size', path, issues);
  const annotations = readOptionalStringMap(value, 'annotations', path, issues);

  return { sha256, mediaType, name, size, ...(annotations ? { annotations } : {}) };
}

/* ------------------------- small internal helpers ------------------------- */

function readBindleSpec(value: unknown, path: string, issues: string[]): BindleSpec {
  if (!isRecord(value)) {
    issues.push(`"${path}" must be an object.`);
    return { name: '', version: '' };
  }

  const name = readNonEmptyString(value, 'name', path, issues);
  const version = readNonEmptyString(value, 'version', path, issues);
  const description = readOptionalString(value, 'description', path, issues);
  const authors = readOptionalStringArray(value, 'authors', path, issues);

  return {
    name,
    version,
    ...(description !== undefined ? { description } : {}),
    ...(authors ? { authors } : {}),
  };
}

function readOptionalParcels(
  obj: Record<string, unknown>,
  key: string,
  path: string,
  issues: string[],
): Parcel[] | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    issues.push(`"${path}.${key}" must be an array when provided.`);
    return undefined;
  }

  return value.map((entry: unknown, index) => {
    const entryPath = `${path}.${key}[${index}]`;
    if (!isRecord(entry)) {
      issues.push(`"${entryPath}" must be an object.`);
      return { label: readLabel(undefined, `${entryPath}.label`, []) };
    }
    return { label: readLabel(entry.label, `${entryPath}.label`, issues) };
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNonEmptyString(
  obj: Record<string, unknown>,
  key: string,
  path: string,
  issues: string[],
): string {
  const value = obj[key];
  if (typeof value !== 'string' || value.trim().length === 0) {
    issues.push(`"${path}.${key}" must be a non-empty string.`);
    return '';
  }
  return value;
}

function readOptionalString(
  obj: Record<string, unknown>,
  key: string,
  path: string,
  issues: string[],
): string | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    issues.push(`"${path}.${key}" must be a string when provided.`);
    return undefined;
  }
  return value;
}

function readOptionalBoolean(
  obj: Record<string, unknown>,
  key: string,
  path: string,
  issues: string[],
): boolean | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    issues.push(`"${path}.${key}" must be a boolean when provided.`);
    return undefined;
  }
  return value;
}

function readOptionalStringArray(
  obj: Record<string, unknown>,
  key: string,
  path: string,
  issues: string[],
): string[] | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || value.some((v) => typeof v !== 'string')) {
    issues.push(`"${path}.${key}" must be an array of strings when provided.`);
    return undefined;
  }
  return value.filter((v): v is string => typeof v === 'string');
}

function readOptionalStringMap(
  obj: Record<string, unknown>,
  key: string,
  path: string,
  issues: string[],
): Record<string, string> | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    issues.push(`"${path}.${key}" must be a table of strings when provided.`);
    return undefined;
  }

  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(value)) {
    if (typeof v !== 'string') {
      issues.push(`"${path}.${key}.${k}" must be a string.`);
      continue;
    }
    out[k] = v;
  }
  return out;
}

function readSize(obj: Record<string, unknown>, key: string, path: string, issues: string[]): number {
  const value = obj[key];
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    issues.push(`"${path}.${key}" must be a non-negative integer.`);
    return 0;
  }
  return value;
}
