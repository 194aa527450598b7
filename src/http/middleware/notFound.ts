// src/http/middleware/notFound.ts

import type { Request, Response } from 'express';

import { HttpStatus } from '../errors/classifyStorageError';
import { replyFromError } from '../errors/errorReply';
import { sendReply } from '../reply/tomlReply';

export function notFound(_req: Request, res: Response): void {
  sendReply(res, replyFromError('route not found', HttpStatus.NOT_FOUND));
}
