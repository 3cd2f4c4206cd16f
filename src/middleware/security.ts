// =============================================================================
// COURSEWORK — Request Hygiene & Error Envelope
//
//   requestId            X-Request-ID in, X-Request-ID out
//   requestSanitization  null bytes stripped from JSON string values
//   notFound / errorHandler
//
// Every error answers { error, code, details? }. A validation failure
// answers { error, code, errors, input } so the client can re-render the
// form next to its messages.
// =============================================================================

import { Request, Response, NextFunction, RequestHandler, ErrorRequestHandler } from 'express';
import { MulterError } from 'multer';
import { v4 as uuidv4 } from 'uuid';
import { AppError, ValidationFailed } from '../errors';
import '../types/express';

// ── Request ID ─────────────────────────────────────────────────────────

const REQUEST_ID_PATTERN = /^[\w.-]{1,64}$/;

export function requestId(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const incoming = req.get('X-Request-ID');
    const id = incoming && REQUEST_ID_PATTERN.test(incoming) ? incoming : uuidv4();
    res.set('X-Request-ID', id);
    req.requestId = id;
    next();
  };
}

// ── Input Sanitization ─────────────────────────────────────────────────

function stripNullBytes(value: unknown): unknown {
  if (typeof value === 'string') return value.replace(/\0/g, '');
  if (Array.isArray(value)) return value.map(stripNullBytes);
  if (typeof value === 'object' && value !== null) {
    const clean: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      clean[key] = stripNullBytes(inner);
    }
    return clean;
  }
  return value;
}

export function requestSanitization(): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (req.body && typeof req.body === 'object') {
      req.body = stripNullBytes(req.body);
    }
    next();
  };
}

// ── Error Handling ─────────────────────────────────────────────────────

export function notFound(): RequestHandler {
  return (_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found', code: 'NOT_FOUND' });
  };
}

/** Status and type that body-parser attaches to its errors */
function httpErrorInfo(err: unknown): { status?: number; type?: string } {
  if (typeof err !== 'object' || err === null) return {};
  const status = 'status' in err && typeof err.status === 'number' ? err.status : undefined;
  const type = 'type' in err && typeof err.type === 'string' ? err.type : undefined;
  return { status, type };
}

const MULTER_MESSAGES: Partial<Record<MulterError['code'], string>> = {
  LIMIT_FILE_SIZE: 'Uploaded file is too large',
  LIMIT_UNEXPECTED_FILE: 'Unexpected file field',
  LIMIT_FILE_COUNT: 'Too many files',
};

/**
 * Central error handler. Expected errors are serialized as they are;
 * anything else is logged (except under test) and answered with 500.
 */
export function errorHandler(): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const env = process.env.NODE_ENV;

    if (err instanceof ValidationFailed) {
      res.status(err.httpStatus).json({
        error: err.message,
        code: err.code,
        errors: err.errors,
        input: err.input,
      });
      return;
    }

    if (err instanceof AppError) {
      if (err.httpStatus >= 500 && env !== 'test') {
        console.error(`[Server] ${err.code} on ${req.method} ${req.path} (${req.requestId}): ${err.message}`);
      }
      res.status(err.httpStatus).json({
        error: err.message,
        code: err.code,
        ...(err.details === undefined ? {} : { details: err.details }),
      });
      return;
    }

    if (err instanceof MulterError) {
      res.status(err.code === 'LIMIT_FILE_SIZE' ? 413 : 400).json({
        error: MULTER_MESSAGES[err.code] ?? err.message,
        code: 'UPLOAD_REJECTED',
        details: { field: err.field },
      });
      return;
    }

    const { status, type } = httpErrorInfo(err);
    if (status === 413 || type === 'entity.too.large') {
      res.status(413).json({ error: 'Request body too large', code: 'PAYLOAD_TOO_LARGE' });
      return;
    }
    if (type === 'entity.parse.failed') {
      res.status(400).json({ error: 'Malformed JSON body', code: 'MALFORMED_BODY' });
      return;
    }

    if (env !== 'test') {
      const detail = err instanceof Error ? err.stack ?? err.message : String(err);
      console.error(`[Server] Unhandled error on ${req.method} ${req.path} (${req.requestId}):`, detail);
    }
    const message = env !== 'production' && err instanceof Error ? err.message : 'Internal server error';
    res.status(500).json({ error: message, code: 'INTERNAL_ERROR' });
  };
}
