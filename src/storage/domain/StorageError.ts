// src/storage/domain/StorageError.ts

/**
 * StorageError
 * ------------
 * Closed set of failures the storage layer reports when an operation cannot
 * be completed as requested. The HTTP boundary only reads these values.
 *
 * Adding a kind here is a compile error in every exhaustive switch over
 * `kind` (message rendering, status classification) until it is handled.
 */

export type StorageError =
  | { readonly kind: 'yanked' }
  | { readonly kind: 'createYanked' }
  | { readonly kind: 'notFound' }
  | { readonly kind: 'io'; readonly cause: NodeJS.ErrnoException }
  | { readonly kind: 'exists' }
  | { readonly kind: 'malformed'; readonly detail: string }
  | { readonly kind: 'unserializable'; readonly detail: string }
  | { readonly kind: 'digestMismatch' }
  | { readonly kind: 'invalidId' };

export type StorageErrorKind = StorageError['kind'];

export const StorageErrors = {
  yanked: (): StorageError => ({ kind: 'yanked' }),
  createYanked: (): StorageError => ({ kind: 'createYanked' }),
  notFound: (): StorageError => ({ kind: 'notFound' }),
  io: (cause: NodeJS.ErrnoException): StorageError => ({ kind: 'io', cause }),
  exists: (): StorageError => ({ kind: 'exists' }),
  malformed: (detail: string): StorageError => ({ kind: 'malformed', detail }),
  unserializable: (detail: string): StorageError => ({ kind: 'unserializable', detail }),
  digestMismatch: (): StorageError => ({ kind: 'digestMismatch' }),
  invalidId: (): StorageError => ({ kind: 'invalidId' }),
} as const;

const STORAGE_ERROR_KINDS: ReadonlySet<string> = new Set<StorageErrorKind>([
  'yanked',
  'createYanked',
  'notFound',
  'io',
  'exists',
  'malformed',
  'unserializable',
  'digestMismatch',
  'invalidId',
]);

/**
 * Terse, caller-facing text for a storage failure.
 */
export function storageErrorMessage(error: StorageError): string {
  switch (error.kind) {
    case 'yanked':
      return 'bindle is yanked';
    case 'createYanked':
      return 'bindle cannot be created as yanked';
    case 'notFound':
      return 'resource not found';
    case 'io':
      return `resource could not be loaded: ${error.cause.message}`;
    case 'exists':
      return 'resource already exists';
    case 'malformed':
      return `resource is malformed: ${error.detail}`;
    case 'unserializable':
      return `resource cannot be stored: ${error.detail}`;
    case 'digestMismatch':
      return 'digest does not match';
    case 'invalidId':
      return 'invalid ID given';
    default:
      return assertNever(error);
  }
}

export function isStorageError(value: unknown): value is StorageError {
  if (typeof value !== 'object' || value === null) return false;
  const kind = (value as { kind?: unknown }).kind;
  return typeof kind === 'string' && STORAGE_ERROR_KINDS.has(kind);
}

/**
 * Whether an I/O failure means the resource simply is not there.
 * The HTTP boundary uses this to report such failures as `notFound`.
 */
export function isResourceAbsent(cause: NodeJS.ErrnoException): boolean {
  return cause.code === 'ENOENT';
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled storage error kind: ${JSON.stringify(value)}`);
}
