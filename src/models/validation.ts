/**
 * Field Validation
 * Shared string-length check every entity validator delegates to
 */

import { ValidationError } from '../errors.js';

export interface StringLengthOptions {
  /** Minimum length after trimming (default: 2) */
  minLength?: number;
  /** Accept null/undefined and return null */
  allowNull?: boolean;
}

/**
 * Validate that a field holds a string of at least `minLength` characters once
 * trimmed. Returns the value as given (untrimmed) when it passes.
 */
export function validateStringLength(
  fieldName: string,
  value: unknown,
  options?: StringLengthOptions & { allowNull?: false }
): string;
export function validateStringLength(
  fieldName: string,
  value: unknown,
  options: StringLengthOptions & { allowNull: true }
): string | null;
export function validateStringLength(
  fieldName: string,
  value: unknown,
  options: StringLengthOptions = {}
): string | null {
  const { minLength = 2, allowNull = false } = options;

  if (value === null || value === undefined) {
    if (allowNull) {
      return null;
    }
    throw new ValidationError(`${fieldName} cannot be empty`);
  }

  if (typeof value !== 'string') {
    throw new ValidationError(`${fieldName} must be a string`);
  }

  if (value.trim().length < minLength) {
    throw new ValidationError(`${fieldName} must be at least ${minLength} characters`);
  }

  return value;
}

/**
 * Validate an optional numeric rating. Null clears the rating.
 */
export function validateRating(fieldName: string, value: unknown): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(`${fieldName} must be a number`);
  }
  return value;
}
