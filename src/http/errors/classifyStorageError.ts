// src/http/errors/classifyStorageError.ts

/**
 * Storage error -> HTTP status
 *
 * Client-caused and state-conflict failures are 4xx; only unexpected I/O
 * failures are 5xx. An I/O failure for a missing resource is reported as
 * `notFound`, and callers must render the returned (remapped) error.
 */

import type { StorageError } from '../../storage/domain/StorageError';
import { StorageErrors, assertNever, isResourceAbsent } from '../../storage/domain/StorageError';

export const HttpStatus = {
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  UNPROCESSABLE_ENTITY: 422,
  INTERNAL_SERVER_ERROR: 500,
} as const;

export type ClassifiedStorageError = Readonly<{ error: StorageError; status: number }>;

export function classifyStorageError(error: StorageError): ClassifiedStorageError {
  switch (error.kind) {
    case 'yanked':
      return { error, status: HttpStatus.BAD_REQUEST };
    case 'createYanked':
      return { error, status: HttpStatus.UNPROCESSABLE_ENTITY };
    case 'notFound':
      return { error, status: HttpStatus.NOT_FOUND };
    case 'io':
      return isResourceAbsent(error.cause)
        ? { error: StorageErrors.notFound(), status: HttpStatus.NOT_FOUND }
        : { error, status: HttpStatus.INTERNAL_SERVER_ERROR };
    case 'exists':
    case 'malformed':
    case 'unserializable':
    case 'digestMismatch':
    case 'invalidId':
      return { error, status: HttpStatus.BAD_REQUEST };
    default:
      return assertNever(error);
  }
}
