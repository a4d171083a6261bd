import type { Request, RequestHandler, Response } from 'express';
import { ZodError, ZodSchema } from 'zod';

export type InvalidFormHandler = (req: Request, res: Response, error: ZodError) => void;

/**
 * Validate a submitted form body against `schema`. The parsed value replaces
 * req.body; on failure `onInvalid` renders the response instead.
 */
export function validateForm(schema: ZodSchema, onInvalid: InvalidFormHandler): RequestHandler {
  return (req, res, next) => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      onInvalid(req, res, result.error);
      return;
    }
    req.body = result.data;
    next();
  };
}
