import type { ErrorRequestHandler, RequestHandler } from 'express';

import { AdvisorError, getDetail, getStatus } from '../errors';

// body-parser raises http-errors carrying `expose` and a `type` such as entity.parse.failed.
const isBodyParserError = (error: unknown): boolean =>
  error !== null &&
  typeof error === 'object' &&
  'expose' in error &&
  error.expose === true &&
  'type' in error &&
  typeof error.type === 'string';

export const notFoundHandler: RequestHandler = (req, res) => {
  res.status(404).json({ detail: `Route ${req.method} ${req.path} not found` });
};

// Express recognises error middleware by its four parameters.
// eslint-disable-next-line @typescript-eslint/no-unused-vars
export const errorHandler: ErrorRequestHandler = (error, req, res, _next) => {
  const requestId = typeof res.locals.requestId === 'string' ? res.locals.requestId : '-';

  if (error instanceof AdvisorError) {
    console.error(`[HTTP] ${requestId} ${error.name}: ${error.message}`);
    res.status(error.status).json({ detail: error.message });
    return;
  }

  if (isBodyParserError(error)) {
    res.status(getStatus(error) ?? 400).json({ errors: [{ message: getDetail(error) }] });
    return;
  }

  console.error(`[HTTP] ${requestId} Unhandled error while serving ${req.method} ${req.originalUrl}:`, error);
  res.status(500).json({ detail: getDetail(error) });
};
