import { describe, it, expect, vi, afterEach } from 'vitest';
import type { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { errorHandler } from './errorHandler';
import {
  BadGatewayError,
  BadRequestError,
  ConflictError,
  ForbiddenError,
  NotFoundError,
  PayloadTooLargeError,
  ServiceUnavailableError,
  UnauthorizedError,
} from './errors';

const makeRes = (headersSent = false) => {
  const res = { headersSent, status: vi.fn(), json: vi.fn(), setHeader: vi.fn() };
  res.status.mockReturnValue(res);
  res.json.mockReturnValue(res);
  return res;
};

const handle = (err: unknown, headersSent = false) => {
  const res = makeRes(headersSent);
  const next = vi.fn();
  errorHandler(err, {} as Request, res as unknown as Response, next as unknown as NextFunction);
  return { res, next };
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe('utils/errorHandler', () => {
  it.each([
    { err: new NotFoundError('missing'), status: 404 },
    { err: new ForbiddenError('nope'), status: 403 },
    { err: new BadRequestError('bad'), status: 400 },
    { err: new ConflictError('taken'), status: 409 },
    { err: new PayloadTooLargeError('huge'), status: 413 },
    { err: new ServiceUnavailableError('later'), status: 503 },
  ])('maps $err.name to $status', ({ err, status }) => {
    const { res } = handle(err);

    expect(res.status).toHaveBeenCalledWith(status);
    expect(res.json).toHaveBeenCalledWith({ message: err.message });
  });

  it('adds a Bearer challenge to 401s', () => {
    const { res } = handle(new UnauthorizedError('Not authenticated'));

    expect(res.setHeader).toHaveBeenCalledWith('WWW-Authenticate', 'Bearer');
    expect(res.status).toHaveBeenCalledWith(401);
  });

  it('maps upstream failures to 502', () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { res } = handle(new BadGatewayError('TTS upstream error (500): x'));

    expect(res.status).toHaveBeenCalledWith(502);
    expect(res.json).toHaveBeenCalledWith({ message: 'TTS upstream error (500): x' });
  });

  it('maps multer size limits to 413', () => {
    const { res } = handle(new multer.MulterError('LIMIT_FILE_SIZE', 'audio_file'));

    expect(res.status).toHaveBeenCalledWith(413);
    expect(res.json).toHaveBeenCalledWith({ message: 'Uploaded file is too large' });
  });

  it('maps malformed JSON bodies to 400', () => {
    const { res } = handle(Object.assign(new SyntaxError('Unexpected token'), { type: 'entity.parse.failed' }));

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({ message: 'Malformed request body' });
  });

  it('maps mongoose cast errors to 400', () => {
    const err = Object.assign(new Error('Cast to ObjectId failed'), { name: 'CastError' });
    const { res } = handle(err);

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({ message: 'Invalid data format provided.', error: 'Cast to ObjectId failed' });
  });

  it('hides unexpected errors behind a 500', () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { res } = handle(new Error('secret detail'));

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({ message: 'Internal Server Error' });
  });

  it('delegates to next once the response has started', () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const err = new BadGatewayError('stream broke');
    const { res, next } = handle(err, true);

    expect(next).toHaveBeenCalledWith(err);
    expect(res.status).not.toHaveBeenCalled();
  });
});
