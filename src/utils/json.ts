import { isInteger, parse, stringify } from 'lossless-json';
import { Result, ok, err } from '../types/result';

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

// Integers stay exact as bigint; anything with a fraction or exponent is a float
function parseNumber(value: string): bigint | number {
  return isInteger(value) ? BigInt(value) : parseFloat(value);
}

function hasLoneSurrogate(value: unknown): boolean {
  if (typeof value === 'string') {
    return LONE_SURROGATE.test(value);
  }
  if (Array.isArray(value)) {
    return value.some(item => hasLoneSurrogate(item));
  }
  if (typeof value === 'object' && value !== null) {
    return Object.entries(value).some(([key, item]) => LONE_SURROGATE.test(key) || hasLoneSurrogate(item));
  }
  return false;
}

/**
 * Parses a JSON document without rounding integers. Escaped strings must
 * still be valid Unicode once decoded.
 */
export function parseJson(text: string): Result<unknown, string> {
  let value: unknown;
  try {
    value = parse(text, null, parseNumber);
  } catch (error) {
    return err(error instanceof Error ? error.message : String(error));
  }

  if (hasLoneSurrogate(value)) {
    return err('string contains an unpaired surrogate');
  }
  return ok(value);
}

export function stringifyJson(value: unknown, space?: number): string {
  return stringify(value, undefined, space) ?? '';
}
