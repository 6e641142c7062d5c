import Ajv, { ErrorObject } from 'ajv';

/** Shared validator for data read from disk or from the store */
export const ajv = new Ajv({ allErrors: true });

export function describeErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) return 'unknown validation error';
  return errors
    .map((e) => `${e.instancePath || '(root)'} ${e.message ?? 'is invalid'}`)
    .join('; ');
}
