import type { Invoice, Label } from '../../src/invoices/domain/Invoice';

export const readmeLabel: Label = {
  sha256: 'e1706ab0a39ac88094b6d54a3f5cdba41fe5a901',
  mediaType: 'text/markdown',
  name: 'README.md',
  size: 1024,
};

export const wasmLabel: Label = {
  sha256: 'f7f3b33707fb76d208f5839a40e770452dcf9f0a',
  mediaType: 'application/wasm',
  name: 'server.wasm',
  size: 2048,
  annotations: { entrypoint: 'true' },
};

export function sampleInvoice(overrides: Partial<Invoice> = {}): Invoice {
  return {
    bindleVersion: '1.0.0',
    bindle: {
      name: 'weather',
      version: '0.1.0',
      description: 'Weather forecasting service',
      authors: ['Test Author <author@example.com>'],
    },
    annotations: { team: 'forecasts' },
    parcel: [{ label: readmeLabel }, { label: wasmLabel }],
    ...overrides,
  };
}

export const SAMPLE_INVOICE_TOML = `bindleVersion = "1.0.0"

[bindle]
name = "weather"
version = "0.1.0"
description = "Weather forecasting service"
authors = ["Test Author <author@example.com>"]

[annotations]
team = "forecasts"

[[parcel]]
[parcel.label]
sha256 = "e1706ab0a39ac88094b6d54a3f5cdba41fe5a901"
mediaType = "text/markdown"
name = "README.md"
size = 1024

[[parcel]]
[parcel.label]
sha256 = "f7f3b33707fb76d208f5839a40e770452dcf9f0a"
mediaType = "application/wasm"
name = "server.wasm"
size = 2048

[parcel.label.annotations]
entrypoint = "true"
`;
