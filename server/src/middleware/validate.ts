import type { Request, Response, NextFunction } from 'express';
import type { ZodTypeAny } from 'zod';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const replaceInPlace = (target: Record<string, unknown>, nextValue: Record<string, unknown>) => {
  for (const k of Object.keys(target)) delete target[k];
  Object.assign(target, nextValue);
};

/**
 * Validates `{ body, query, params }` against a zod schema.
 * Parsed `body` and `params` replace the originals; `query` is a getter in Express 5,
 * so handlers that need coerced query values parse `req.query` themselves.
 */
const validate = (schema: ZodTypeAny) => (req: Request, res: Response, next: NextFunction) => {
  const parsed = schema.safeParse({
    body: req.body ?? {},
    query: req.query,
    params: req.params,
  });

  if (!parsed.success) {
    const errors = parsed.error.issues.map((issue) => {
      const pathParts = issue.path[0] === 'body' ? issue.path.slice(1) : issue.path;
      return { path: pathParts.join('.'), message: issue.message };
    });

    return res.status(400).json({
      message: errors[0]?.message || 'Validation error',
      errors,
    });
  }

  const data: unknown = parsed.data;
  if (isRecord(data)) {
    if (Object.prototype.hasOwnProperty.call(data, 'body')) req.body = data.body;
    if (isRecord(data.params)) replaceInPlace(req.params, data.params);
  }
  next();
};

export default validate;
