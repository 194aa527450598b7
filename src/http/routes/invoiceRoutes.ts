// src/http/routes/invoiceRoutes.ts

/**
 * Invoice routes
 * --------------
 * POST   /v1/_i                    create an invoice from a TOML document
 * GET    /v1/_i/:name/:version     fetch an invoice (?yanked=true to include yanked ones)
 * DELETE /v1/_i/:name/:version     yank an invoice
 *
 * Routes stay thin: decode -> call the store -> render the Result.
 * Storage failures are rendered here; validation errors go to the error handler.
 */

import { Router, text } from 'express';
import type { NextFunction, Request, Response } from 'express';
import * as TOML from '@iarna/toml';

import { parseInvoiceDto } from '../../invoices/dto/InvoiceDto';
import { buildInvoiceCreateResponse, isFullySatisfied } from '../../invoices/dto/InvoiceCreateResponse';
import type { Result } from '../../shared/result';
import { Err, Ok } from '../../shared/result';
import type { InvoiceStore } from '../../storage/domain/InvoiceStore';
import type { StorageError } from '../../storage/domain/StorageError';
import { StorageErrors } from '../../storage/domain/StorageError';
import { intoReply } from '../errors/errorReply';
import { TOML_MIME_TYPE, replyWith, sendReply } from '../reply/tomlReply';

const MAX_INVOICE_BYTES = '1mb';

export function createInvoiceRoutes(store: InvoiceStore): Router {
  const router = Router();

  router.post(
    '/v1/_i',
    text({ type: TOML_MIME_TYPE, limit: MAX_INVOICE_BYTES }),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const decoded = decodeToml(req.body);
        if (!decoded.ok) {
          sendReply(res, intoReply(decoded.error));
          return;
        }

        const created = await store.createInvoice(parseInvoiceDto(decoded.value));
        if (!created.ok) {
          sendReply(res, intoReply(created.error));
          return;
        }

        const response = buildInvoiceCreateResponse(created.value.invoice, created.value.missing);
        // 202: accepted, but some referenced parcels still have to be uploaded.
        sendReply(res, replyWith(response, isFullySatisfied(response) ? 201 : 202));
      } catch (err) {
        next(err);
      }
    },
  );

  router.get('/v1/_i/:name/:version', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await store.getInvoice(idFromParams(req), {
        includeYanked: req.query.yanked === 'true',
      });

      sendReply(res, result.ok ? replyWith(result.value, 200) : intoReply(result.error));
    } catch (err) {
      next(err);
    }
  });

  router.delete('/v1/_i/:name/:version', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = idFromParams(req);
      const result = await store.yankInvoice(id);

      sendReply(res, result.ok ? replyWith({ id, yanked: true }, 200) : intoReply(result.error));
    } catch (err) {
      next(err);
    }
  });

  return router;
}

function idFromParams(req: Request): string {
  return `${req.params.name}/${req.params.version}`;
}

function decodeToml(body: unknown): Result<unknown, StorageError> {
  if (typeof body !== 'string' || body.trim().length === 0) {
    return Err(StorageErrors.malformed(`expected a non-empty ${TOML_MIME_TYPE} body`));
  }

  try {
    return Ok(TOML.parse(body));
  } catch (err) {
    return Err(StorageErrors.malformed(err instanceof Error ? err.message : String(err)));
  }
}
