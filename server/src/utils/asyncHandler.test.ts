import { describe, it, expect, vi } from 'vitest';
import type { NextFunction, Request, Response } from 'express';
import asyncHandler from './asyncHandler';

const req = {} as Request;
const res = {} as Response;

describe('utils/asyncHandler', () => {
  it('passes thrown errors to next', async () => {
    const handler = asyncHandler(async () => {
      throw new Error('boom');
    });

    const next = vi.fn();
    await handler(req, res, next as unknown as NextFunction);

    expect(next).toHaveBeenCalledTimes(1);
    expect(next).toHaveBeenCalledWith(new Error('boom'));
  });

  it('passes rejected promises to next', async () => {
    const handler = asyncHandler(async () => {
      return Promise.reject(new Error('nope'));
    });

    const next = vi.fn();
    await handler(req, res, next as unknown as NextFunction);

    expect(next).toHaveBeenCalledWith(new Error('nope'));
  });

  it('does not call next on success', async () => {
    const handler = asyncHandler(async () => undefined);

    const next = vi.fn();
    await handler(req, res, next as unknown as NextFunction);

    expect(next).not.toHaveBeenCalled();
  });
});
