import fs from 'fs-extra';
import path from 'path';
import { DecodeResult, LayerDecoderError } from '../../src/types/errors';

export function expectError<T>(result: DecodeResult<T>): LayerDecoderError {
  if (result.ok) {
    throw new Error('expected a decoder error');
  }
  return result.error;
}

export function expectValue<T>(result: DecodeResult<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

export function fixtureBytes(name: string): Buffer {
  return fs.readFileSync(path.join(__dirname, name));
}

export function jsonBytes(value: unknown): Buffer {
  return Buffer.from(JSON.stringify(value), 'utf8');
}
