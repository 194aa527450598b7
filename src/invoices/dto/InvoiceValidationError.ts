/**
 * InvoiceValidationError
 *
 * Thrown when an invoice-related payload does not match the expected contract.
 * Carries the individual issues so the HTTP error handler can report them.
 */
export class InvoiceValidationError extends Error {
  public readonly issues: string[];

  public constructor(message: string, issues: string[]) {
    super(message);
    this.name = 'InvoiceValidationError';
    this.issues = issues;
  }
}
