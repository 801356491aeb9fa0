import Joi from 'joi';

/**
 * Validates untrusted data (bundled JSON, collaborator replies) against a Joi
 * schema and returns it typed. Throws with every violation in the message.
 */
export function validateWith<T>(schema: Joi.AnySchema<T>, value: unknown, source: string): T {
  const result = schema.validate(value, { abortEarly: false, convert: false });
  if (result.error !== undefined) {
    throw new Error(`Invalid ${source}: ${result.error.message}`);
  }
  return result.value;
}
