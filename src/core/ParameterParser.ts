import { TextDecoder } from 'util';
import { Parameters } from '../types/schema';
import { ScalarTraitValue, TraitOutput, WireTraitOutput, WireTraitValue } from '../types/traits';
import { DecodeResult, ErrorCode, fail } from '../types/errors';
import { Result, ok, err } from '../types/result';
import { parseJson } from '../utils/json';
import { checkSchemaRows, checkTraitOutput } from '../validators/inputValidator';
import { VALIDATION_RULES } from '../constants/validation';
import { SchemaDecoder } from './SchemaDecoder';
import logger from '../utils/logger';

export interface ParserOptions {
  maxInputBytes?: number;
}

const TRAIT_OUTPUT_INPUT = 0;
const TRAIT_SCHEMA_INPUT = 1;

/**
 * Decodes the two raw host inputs: the resolved trait output and the trait
 * schema table.
 */
export class ParameterParser {
  private maxInputBytes: number;
  private schemaDecoder: SchemaDecoder;
  private utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

  constructor(options: ParserOptions = {}) {
    this.maxInputBytes = options.maxInputBytes ?? VALIDATION_RULES.MAX_INPUT_BYTES;
    this.schemaDecoder = new SchemaDecoder();
  }

  parse(inputs: readonly Uint8Array[]): DecodeResult<Parameters> {
    if (inputs.length !== VALIDATION_RULES.EXPECTED_INPUT_COUNT) {
      return fail(ErrorCode.ParseInvalidArgCount, { inputCount: inputs.length });
    }
    const [traitOutputBytes, schemaBytes] = inputs;

    const traitOutput = this.parseTraitOutput(traitOutputBytes);
    if (!traitOutput.ok) {
      return traitOutput;
    }

    const schema = this.parseSchema(schemaBytes);
    if (!schema.ok) {
      return schema;
    }

    logger.debug('Parameters parsed', {
      traitCount: traitOutput.value.length,
      schemaEntries: schema.value.length
    });
    return ok({ traitOutput: traitOutput.value, schema: schema.value });
  }

  private parseTraitOutput(bytes: Uint8Array | undefined): DecodeResult<TraitOutput[]> {
    if (!bytes || bytes.length === 0) {
      return fail(ErrorCode.ParseInvalidDob0Output, { buffer: TRAIT_OUTPUT_INPUT, reason: 'empty' });
    }

    const json = this.readJson(bytes);
    if (!json.ok) {
      return fail(ErrorCode.ParseInvalidDob0Output, { buffer: TRAIT_OUTPUT_INPUT, reason: json.error });
    }

    const shape = checkTraitOutput(json.value);
    if (!shape.ok) {
      return fail(ErrorCode.ParseInvalidDob0Output, { buffer: TRAIT_OUTPUT_INPUT, errors: shape.error });
    }
    return ok(shape.value.map(fromWireTraitOutput));
  }

  private parseSchema(bytes: Uint8Array | undefined): DecodeResult<Parameters['schema']> {
    const json = bytes ? this.readJson(bytes) : undefined;
    if (!json || !json.ok) {
      return fail(ErrorCode.ParseInvalidTraitsBase, {
        buffer: TRAIT_SCHEMA_INPUT,
        reason: json ? json.error : 'missing'
      });
    }

    const shape = checkSchemaRows(json.value);
    if (!shape.ok) {
      return fail(ErrorCode.ParseInvalidTraitsBase, { buffer: TRAIT_SCHEMA_INPUT, errors: shape.error });
    }
    return this.schemaDecoder.decode(shape.value);
  }

  private readJson(bytes: Uint8Array): Result<unknown, string> {
    if (bytes.length > this.maxInputBytes) {
      return err(`input exceeds ${this.maxInputBytes} bytes`);
    }
    let text: string;
    try {
      text = this.utf8.decode(bytes);
    } catch (error) {
      return err(error instanceof Error ? error.message : String(error));
    }
    // A byte-order mark is kept in the text, so the JSON reader rejects it
    return parseJson(text);
  }
}

function fromWireTraitValue(value: WireTraitValue): ScalarTraitValue {
  return 'String' in value
    ? { kind: 'string', value: value.String }
    : { kind: 'number', value: value.Number };
}

function fromWireTraitOutput(output: WireTraitOutput): TraitOutput {
  return { name: output.name, values: output.traits.map(fromWireTraitValue) };
}
