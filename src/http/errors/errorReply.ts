// src/http/errors/errorReply.ts

/**
 * TOML error replies
 *
 * Every error body is a single-field document:
 *
 *   error = "bindle is yanked"
 *
 * The text goes through the TOML encoder, so quotes and control characters
 * in a message cannot break the document.
 */

import type { DiagnosticLogger } from '../../shared/logging/Logger';
import { logger as defaultLogger } from '../../shared/logging/Logger';
import type { StorageError } from '../../storage/domain/StorageError';
import { isStorageError, storageErrorMessage } from '../../storage/domain/StorageError';
import type { StatusReply } from '../reply/tomlReply';
import { toml, withStatus } from '../reply/tomlReply';
import { classifyStorageError } from './classifyStorageError';

export type ErrorBody = { error: string };

/**
 * Anything that can be shown to a caller as error text.
 */
export type ErrorMessage = string | Error | StorageError | { toString(): string };

export function errorText(message: ErrorMessage): string {
  if (typeof message === 'string') return message;
  if (message instanceof Error) return message.message;
  if (isStorageError(message)) return storageErrorMessage(message);
  return message.toString();
}

/**
 * Build an error reply for any error-like value with an explicit status.
 */
export function replyFromError(
  message: ErrorMessage,
  status: number,
  logger: DiagnosticLogger = defaultLogger,
): StatusReply {
  const body: ErrorBody = { error: errorText(message) };
  return withStatus(toml(body, logger), status);
}

/**
 * Build an error reply for a storage failure, using the classified status and
 * the classified (possibly remapped) error for the message.
 */
export function intoReply(
  error: StorageError,
  logger: DiagnosticLogger = defaultLogger,
): StatusReply {
  const classified = classifyStorageError(error);
  return replyFromError(classified.error, classified.status, logger);
}
