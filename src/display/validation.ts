import { TUBE_DIGITS, type TubeDigit } from '../types';
import { InvalidArgumentError, OutOfRangeError } from './errors';

export const LEVEL_MIN = 0;
export const LEVEL_MAX = 255;

const DIGITS: ReadonlySet<string> = new Set<string>(TUBE_DIGITS);

export function requireLevel(field: string, value: unknown): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new InvalidArgumentError(`${capitalize(field)} must be an integer`, { field, value });
  }
  if (value < LEVEL_MIN || value > LEVEL_MAX) {
    throw new OutOfRangeError(field, `${capitalize(field)} must be between ${LEVEL_MIN}-${LEVEL_MAX}`, { value });
  }
  return value;
}

export function requireFlag(field: string, value: unknown): boolean {
  if (typeof value !== 'boolean') {
    throw new InvalidArgumentError(`${capitalize(field)} must be of type boolean`, { field, value });
  }
  return value;
}

export function isTubeDigit(value: unknown): value is TubeDigit {
  return typeof value === 'string' && DIGITS.has(value);
}

// Unknown characters blank the tube instead of failing.
export function coerceDigit(value: unknown): TubeDigit {
  return isTubeDigit(value) ? value : '-';
}

function capitalize(field: string): string {
  return field.charAt(0).toUpperCase() + field.slice(1);
}
