import { z, ZodError, ZodSchema } from 'zod';
import { AppError } from '../utils/AppError';

function toValidationError(error: ZodError): AppError {
  const issues = error.errors.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));
  return AppError.validation('Validation failed', { issues });
}

/**
 * Parses a value against a schema, turning zod failures into a VALIDATION_ERROR.
 */
export function validate<S extends ZodSchema>(schema: S, value: unknown): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw toValidationError(parsed.error);
  }
  return parsed.data;
}

// Common validation schemas
export const commonSchemas = {
  id: z.object({
    id: z.coerce.number().int().positive('Invalid ID format'),
  }),
  sessionToken: z.object({
    sessionToken: z.string().trim().min(1).max(128),
  }),
  limit: (fallback: number, max = 200) => z.coerce.number().int().min(1).max(max).default(fallback),
};

export default validate;
