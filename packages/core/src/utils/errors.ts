/**
 * HTTP error helpers shared by the gateway and the memory routes.
 *
 * Every error reply has the same body: `{ error, message, statusCode }`.
 */

import type { FastifyReply } from 'fastify';
import type { ZodError } from 'zod';

export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error';
}

const HTTP_STATUS_NAMES: Record<number, string> = {
  400: 'Bad Request',
  403: 'Forbidden',
  404: 'Not Found',
  409: 'Conflict',
  413: 'Payload Too Large',
  415: 'Unsupported Media Type',
  500: 'Internal Server Error',
  503: 'Service Unavailable',
};

export function httpStatusName(code: number): string {
  return HTTP_STATUS_NAMES[code] ?? 'Error';
}

/**
 * First validation issue as `path: message`; `body` stands in for an
 * issue on the root value.
 */
export function describeValidationError(error: ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'Invalid body';
  return `${issue.path.join('.') || 'body'}: ${issue.message}`;
}

export function sendError(reply: FastifyReply, statusCode: number, message: string): FastifyReply {
  return reply.code(statusCode).send({ error: httpStatusName(statusCode), message, statusCode });
}
