/**
 * Express application setup for the invoice reply service.
 *
 * This module:
 * - Creates and configures the Express 5 app instance.
 * - Registers global middleware (correlation ids, request logging).
 * - Exposes a healthcheck endpoint for monitoring.
 * - Mounts the invoice routes and the TOML not-found / error handlers.
 */
import express, { Application, NextFunction, Request, Response } from 'express';

import { createInvoiceRoutes } from './http/routes/invoiceRoutes';
import { correlationIdMiddleware } from './http/middleware/correlationId';
import { errorHandler } from './http/middleware/errorHandler';
import { notFound } from './http/middleware/notFound';
import { config } from './shared/config/Config';
import { logger } from './shared/logging/Logger';
import type { InvoiceStore } from './storage/domain/InvoiceStore';
import { InMemoryInvoiceStore } from './storage/infrastructure/InMemoryInvoiceStore';

export type AppDeps = {
  invoiceStore: InvoiceStore;
};

export function createApp(deps: Partial<AppDeps> = {}): Application {
  const app = express();
  const invoiceStore = deps.invoiceStore ?? new InMemoryInvoiceStore();

  app.use(correlationIdMiddleware);

  // Simple request logging for visibility in development
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug(
      { method: req.method, path: req.path, correlationId: req.correlationId },
      'Incoming request',
    );
    next();
  });

  // Basic healthcheck endpoint used by Kubernetes / monitors
  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'ok',
      service: config.serviceName,
      timestamp: new Date().toISOString(),
    });
  });

  app.use(createInvoiceRoutes(invoiceStore));

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
