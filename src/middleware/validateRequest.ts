import { Request, Response, NextFunction } from 'express';
import { z, ZodError } from 'zod';
import { ValidationError } from '../errors';

/**
 * Validation target - where to find the data to validate.
 * Express 5 exposes `req.query` as a read-only getter, so query strings are
 * parsed inside the controllers instead.
 */
export type ValidationTarget = 'body' | 'params';

/**
 * Format zod issues as comma-separated messages prefixed with their field path
 */
export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `"${issue.path.join('.')}" ` : '';
      return `${path}${issue.message}`;
    })
    .join(', ');
}

/**
 * Creates a middleware that validates request data against a Zod schema
 *
 * @param schema - Zod schema to validate against
 * @param target - Which part of the request to validate (body or params)
 * @returns Express middleware function
 */
export const validateRequest = (schema: z.ZodTypeAny, target: ValidationTarget = 'body') => {
  return (req: Request, _res: Response, next: NextFunction) => {
    const result = schema.safeParse(req[target]);
    if (!result.success) {
      throw new ValidationError(formatZodError(result.error));
    }

    // Replace request data with validated and sanitized data
    req[target] = result.data;
    next();
  };
};
