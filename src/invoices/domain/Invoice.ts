/**
 * Invoice and parcel label models.
 *
 * An invoice describes a bindle (name + version) and the parcels it is made
 * of. Parcels are content addressed: a Label identifies one by its SHA-256
 * digest. The reply layer treats both as opaque values it serializes.
 */

export interface Label {
  sha256: string;
  mediaType: string;
  name: string;
  size: number;
  annotations?: Record<string, string>;
}

export interface Parcel {
  label: Label;
}

export interface BindleSpec {
  name: string;
  version: string;
  description?: string;
  authors?: string[];
}

export interface Invoice {
  bindleVersion: string;
  yanked?: boolean;
  bindle: BindleSpec;
  annotations?: Record<string, string>;
  parcel?: Parcel[];
}

/**
 * Invoice ids are `<name>/<version>`.
 */
export function invoiceId(invoice: Pick<Invoice, 'bindle'>): string {
  return `${invoice.bindle.name}/${invoice.bindle.version}`;
}
