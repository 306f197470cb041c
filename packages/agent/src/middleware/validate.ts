import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { ZodType, ZodTypeDef } from 'zod';

type Schema = ZodType<unknown, ZodTypeDef, unknown>;

/**
 * Parse the request body with `schema` and replace it with the parsed value.
 * A ZodError is passed on to the error handler.
 */
export function validate(schema: Schema): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body ?? {});
    if (!result.success) {
      next(result.error);
      return;
    }
    req.body = result.data;
    next();
  };
}

/** Check route params against `schema` without replacing them. */
export function validateParams(schema: Schema): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.params);
    next(result.success ? undefined : result.error);
  };
}

/** Check the query string against `schema` without replacing it. */
export function validateQuery(schema: Schema): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.query);
    next(result.success ? undefined : result.error);
  };
}
