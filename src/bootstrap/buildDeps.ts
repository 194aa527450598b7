// src/bootstrap/buildDeps.ts

/**
 * Composition Root
 * ----------------
 * The only place that picks concrete storage for the running service.
 */

import type { AppDeps } from '../app';
import { InMemoryInvoiceStore } from '../storage/infrastructure/InMemoryInvoiceStore';

export type RuntimeDeps = AppDeps & {
  /**
   * Called during graceful shutdown to release storage handles, flush buffers, etc.
   */
  shutdown: () => Promise<void>;
};

/**
 * Parcel digests listed in STORED_PARCELS (comma separated) are treated as
 * already uploaded, so invoices referencing them are fully satisfied.
 */
export function buildRuntimeDeps(env: NodeJS.ProcessEnv = process.env): RuntimeDeps {
  const storedParcels = (env.STORED_PARCELS ?? '')
    .split(',')
    .map((digest) => digest.trim())
    .filter((digest) => digest.length > 0);

  return {
    invoiceStore: new InMemoryInvoiceStore(storedParcels),
    shutdown: async () => undefined,
  };
}
