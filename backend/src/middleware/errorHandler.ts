import type { ErrorRequestHandler, RequestHandler } from 'express';
import type { Logger } from '../lib/logger';

// express.json() rejects unparsable bodies with a SyntaxError carrying `type`
function isBodyParseError(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'type' in err &&
    err.type === 'entity.parse.failed'
  );
}

export function notFoundHandler(): RequestHandler {
  return (req, res) => {
    res.status(404).json({ error: { code: 'ROUTE_NOT_FOUND', message: `No route for ${req.method} ${req.path}` } });
  };
}

/** Last middleware: logs unexpected failures in full and answers an opaque 500. */
export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    if (isBodyParseError(err)) {
      res.status(400).json({ error: { code: 'INVALID_INPUT', message: 'Malformed JSON body' } });
      return;
    }

    logger.error(`[UNEXPECTED_ERROR] ${req.method} ${req.originalUrl}`, {
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    res.status(500).json({ error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } });
  };
}
