import type { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import {
  NotFoundError,
  ForbiddenError,
  BadRequestError,
  ConflictError,
  UnauthorizedError,
  PayloadTooLargeError,
  BadGatewayError,
  ServiceUnavailableError,
} from './errors';

const isBodyTooLarge = (err: unknown): boolean =>
  typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.too.large';

const isMalformedBody = (err: unknown): boolean =>
  typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';

export const errorHandler = (err: unknown, req: Request, res: Response, next: NextFunction) => {
  // Too late for a JSON body; Express' final handler closes the connection.
  if (res.headersSent) {
    console.error('[api] error after response started:', err);
    return next(err);
  }

  if (err instanceof NotFoundError) {
    return res.status(404).json({ message: err.message });
  }
  if (err instanceof ForbiddenError) {
    return res.status(403).json({ message: err.message });
  }
  if (err instanceof BadRequestError) {
    return res.status(400).json({ message: err.message });
  }
  if (err instanceof ConflictError) {
    return res.status(409).json({ message: err.message });
  }
  if (err instanceof UnauthorizedError) {
    res.setHeader('WWW-Authenticate', 'Bearer');
    return res.status(401).json({ message: err.message });
  }
  if (err instanceof PayloadTooLargeError || isBodyTooLarge(err)) {
    return res.status(413).json({ message: err instanceof Error ? err.message : 'Request entity too large' });
  }

  if (err instanceof BadGatewayError) {
    console.error('[api] upstream failure:', err.message);
    return res.status(502).json({ message: err.message });
  }
  if (err instanceof ServiceUnavailableError) {
    return res.status(503).json({ message: err.message });
  }

  if (err instanceof multer.MulterError) {
    if (err.code === 'LIMIT_FILE_SIZE') {
      return res.status(413).json({ message: 'Uploaded file is too large' });
    }
    return res.status(400).json({ message: err.message });
  }

  if (isMalformedBody(err)) {
    return res.status(400).json({ message: 'Malformed request body' });
  }

  if (err instanceof Error && (err.name === 'ValidationError' || err.name === 'CastError')) {
    return res.status(400).json({ message: 'Invalid data format provided.', error: err.message });
  }

  console.error('[api] unhandled error:', err);
  return res.status(500).json({ message: 'Internal Server Error' });
};
