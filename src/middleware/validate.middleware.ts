import { Request, Response, NextFunction } from 'express';
import { ZodSchema } from 'zod';
import { ApiError } from '../utils/ApiError';

export interface RequestShape {
  body?: unknown;
  query?: unknown;
  params?: unknown;
}

/**
 * Validates body, query and params against one schema. The parsed body
 * replaces the raw one so coerced and defaulted values reach the handler.
 */
export const validate = (schema: ZodSchema<RequestShape>) => {
  return (req: Request, _res: Response, next: NextFunction) => {
    const result = schema.safeParse({
      body: req.body,
      query: req.query,
      params: req.params,
    });
    if (!result.success) {
      const errorMessage = result.error.errors.map((e) => e.message).join(', ') || 'Validation failed';
      throw ApiError.badRequest(errorMessage, result.error.flatten());
    }
    if (result.data.body !== undefined) {
      req.body = result.data.body;
    }
    next();
  };
};
