/**
 * Raised by an analyzer when a field value does not match its grammar.
 * The registry converts it into a bad note; it never escapes analysis.
 */
export class HeaderSyntaxError extends Error {
  readonly code = 'HEADER_SYNTAX';

  constructor(
    message: string,
    readonly fragment?: string
  ) {
    super(message);
    this.name = 'HeaderSyntaxError';
  }
}
