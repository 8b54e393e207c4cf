/**
 * Error raised when the message cannot be parsed past a point
 */
export class ParseError extends Error {
  readonly code = 'PARSE_ERROR';

  /**
   * @param rule - Grammar rule that was violated, e.g. "status-line"
   * @param offset - Byte offset of the offending input
   */
  constructor(
    message: string,
    readonly rule: string,
    readonly offset: number
  ) {
    super(message);
    this.name = 'ParseError';
  }
}
