// src/http/reply/tomlReply.ts

/**
 * TOML reply envelope
 *
 * Wraps any serializable value as an HTTP reply body. Encoding happens once,
 * up front, so a reply is either fully encoded or marked as failed.
 *
 * Rules:
 * 1) Success -> encoded bytes + `Content-Type: application/toml`
 * 2) Encoding failure -> one diagnostic record, then an empty 500 reply
 * 3) The status is always decided by the caller
 */

import type { Response } from 'express';
import * as TOML from '@iarna/toml';

import { logger as defaultLogger } from '../../shared/logging/Logger';
import type { DiagnosticLogger } from '../../shared/logging/Logger';

export const TOML_MIME_TYPE = 'application/toml';

export const INTERNAL_SERVER_ERROR = 500;

export type TomlReply =
  | { readonly ok: true; readonly body: Buffer; readonly contentType: typeof TOML_MIME_TYPE }
  | { readonly ok: false };

export type StatusReply = Readonly<{ reply: TomlReply; status: number }>;

type TomlTable = Parameters<typeof TOML.stringify>[0];

/**
 * Encode `value` as a TOML document.
 * Never throws: encoding failures are logged and turned into a failed reply.
 */
export function toml(value: unknown, logger: DiagnosticLogger = defaultLogger): TomlReply {
  try {
    if (!isTomlTable(value)) {
      throw new TypeError(`Can only encode tables as TOML documents, not ${typeName(value)}`);
    }

    const body = Buffer.from(TOML.stringify(value), 'utf8');
    return { ok: true, body, contentType: TOML_MIME_TYPE };
  } catch (err) {
    logger.error({ err }, 'Error while serializing TOML');
    return { ok: false };
  }
}

export function withStatus(reply: TomlReply, status: number): StatusReply {
  return Object.freeze({ reply, status });
}

/**
 * Encode a success value together with the status the handler decided on.
 */
export function replyWith(
  value: unknown,
  status: number,
  logger: DiagnosticLogger = defaultLogger,
): StatusReply {
  return withStatus(toml(value, logger), status);
}

/**
 * Write a reply to an Express response.
 * A failed reply always becomes an empty 500, whatever status was requested.
 */
export function sendReply(res: Response, { reply, status }: StatusReply): void {
  if (!reply.ok) {
    res.status(INTERNAL_SERVER_ERROR).end();
    return;
  }

  res.status(status);
  res.setHeader('Content-Type', reply.contentType);
  res.send(reply.body);
}

/* ------------------------- small internal helpers ------------------------- */

function isTomlTable(value: unknown): value is TomlTable {
  return (
    typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
  );
}

function typeName(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Date) return 'date';
  return typeof value;
}
