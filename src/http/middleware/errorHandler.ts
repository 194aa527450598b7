// src/http/middleware/errorHandler.ts

/**
 * Global error handler
 *
 * - Invoice validation failures -> 400
 * - Client errors raised by Express body parsing (payload too large, bad charset) -> their status
 * - Anything else -> 500 with a generic message
 *
 * Every response uses the TOML error body: error = "<message>"
 */

import type { NextFunction, Request, Response } from 'express';

import { InvoiceValidationError } from '../../invoices/dto/InvoiceValidationError';
import { logger } from '../../shared/logging/Logger';
import { HttpStatus } from '../errors/classifyStorageError';
import { replyFromError } from '../errors/errorReply';
import { sendReply } from '../reply/tomlReply';
import { correlationIdOf } from './correlationId';

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  const correlationId = correlationIdOf(req);

  // 400: request payload validation failures (boundary protection)
  if (err instanceof InvoiceValidationError) {
    logger.debug({ correlationId, issues: err.issues }, 'Invoice validation failed');

    sendReply(
      res,
      replyFromError(`${err.message}: ${err.issues.join(' ')}`, HttpStatus.BAD_REQUEST),
    );
    return;
  }

  const clientError = readExposedClientError(err);
  if (clientError) {
    logger.debug({ correlationId, status: clientError.status }, 'Request rejected by body parser');

    sendReply(res, replyFromError(clientError.message, clientError.status));
    return;
  }

  // 500: unknown/unexpected failures
  logger.error({ correlationId, err }, 'Unhandled error in request pipeline');

  sendReply(res, replyFromError('internal server error', HttpStatus.INTERNAL_SERVER_ERROR));
}

/**
 * Errors created by Express' body parsers carry `status` and `expose`.
 * Only 4xx errors marked as exposable are shown to the caller.
 */
function readExposedClientError(err: unknown): { status: number; message: string } | undefined {
  if (!(err instanceof Error)) return undefined;

  const status = 'status' in err ? err.status : undefined;
  const expose = 'expose' in err ? err.expose : undefined;
  if (expose !== true || typeof status !== 'number' || status < 400 || status >= 500) {
    return undefined;
  }

  return { status, message: err.message };
}
