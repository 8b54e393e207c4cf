import type { HttpMessage } from '@conformance/http-wire-parser';

/**
 * Status code of a response message; undefined for requests
 */
export function statusOf(message: HttpMessage): number | undefined {
  return message.startLine.kind === 'status' ? message.startLine.statusCode : undefined;
}
