import { describe, it, expect, vi } from 'vitest';
import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import validate from './validate';

const makeRes = () => {
  const res = { status: vi.fn(), json: vi.fn() };
  res.status.mockReturnValue(res);
  res.json.mockReturnValue(res);
  return res;
};

const run = (schema: z.ZodTypeAny, req: { body?: unknown; query?: unknown; params: Record<string, string> }) => {
  const res = makeRes();
  const next = vi.fn();
  validate(schema)(req as unknown as Request, res as unknown as Response, next as unknown as NextFunction);
  return { res, next };
};

describe('middleware/validate', () => {
  it('replaces body with the parsed value and calls next', () => {
    const schema = z.object({ body: z.object({ email: z.string().trim().toLowerCase() }) });
    const req = { body: { email: ' A@B.C ' }, query: {}, params: {} };

    const { res, next } = run(schema, req);

    expect(next).toHaveBeenCalledTimes(1);
    expect(res.status).not.toHaveBeenCalled();
    expect(req.body).toEqual({ email: 'a@b.c' });
  });

  it('rewrites params in place', () => {
    const schema = z.object({ params: z.object({ id: z.string().toUpperCase() }) });
    const params = { id: 'abc' };

    run(schema, { query: {}, params });

    expect(params).toEqual({ id: 'ABC' });
  });

  it('treats a missing body as empty', () => {
    const schema = z.object({ body: z.object({ name: z.string().optional() }) });
    const req = { query: {}, params: {} };

    const { next } = run(schema, req);

    expect(next).toHaveBeenCalledTimes(1);
  });

  it('returns 400 with the first message and body-relative paths', () => {
    const schema = z.object({
      body: z.object({ name: z.string().min(3, 'name is too short'), age: z.number({ invalid_type_error: 'age must be a number' }) }),
    });

    const { res, next } = run(schema, { body: { name: 'a', age: 'x' }, query: {}, params: {} });

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({
      message: 'name is too short',
      errors: [
        { path: 'name', message: 'name is too short' },
        { path: 'age', message: 'age must be a number' },
      ],
    });
    expect(next).not.toHaveBeenCalled();
  });

  it('keeps the section prefix for query and params errors', () => {
    const schema = z.object({ params: z.object({ id: z.string().length(24, 'bad id') }) });

    const { res } = run(schema, { query: {}, params: { id: 'short' } });

    expect(res.json).toHaveBeenCalledWith({ message: 'bad id', errors: [{ path: 'params.id', message: 'bad id' }] });
  });
});
