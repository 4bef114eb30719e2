import { InvalidArgumentError, OutOfRangeError } from './errors';

export function toDigitString(value: number): string {
  if (!Number.isSafeInteger(value)) {
    throw new InvalidArgumentError('Display number must be an integer', { value });
  }
  if (value < 0) {
    throw new InvalidArgumentError('Display number must be positive', { value });
  }
  return value.toString(10);
}

/** Left-pads `value` with zeroes to exactly `width` digits. */
export function padDigits(value: number, width: number): string {
  const digits = toDigitString(value);
  if (digits.length > width) {
    throw new OutOfRangeError('displayNumber', 'Not enough tubes to display all digits', {
      value,
      digits: digits.length,
      tubes: width
    });
  }
  return digits.padStart(width, '0');
}
