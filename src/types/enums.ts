import { ValidationError } from '../utils/errors';

/**
 * Narrows a persisted or user-supplied string to one member of a closed set
 */
export function parseEnum<T extends string>(
  values: readonly T[],
  value: string,
  label: string
): T {
  const match = values.find(candidate => candidate === value);
  if (match === undefined) {
    throw new ValidationError(
      `Unknown ${label} "${value}". Expected one of: ${values.join(', ')}`
    );
  }
  return match;
}

export function parseOptionalEnum<T extends string>(
  values: readonly T[],
  value: string | null,
  label: string
): T | null {
  return value === null ? null : parseEnum(values, value, label);
}
