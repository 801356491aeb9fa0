import { Response } from 'express';
import Joi from 'joi';

/**
 * Validates request input. On failure the 400 response is sent here and
 * null is returned, so handlers just `return`.
 */
export function validateRequest<T>(schema: Joi.ObjectSchema<T>, input: unknown, res: Response): T | null {
  const result = schema.validate(input, { abortEarly: false, stripUnknown: true });
  if (result.error !== undefined) {
    res.status(400).json({
      error: 'Validation error',
      details: result.error.details.map(detail => detail.message)
    });
    return null;
  }
  return result.value;
}
