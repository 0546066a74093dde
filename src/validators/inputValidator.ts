import Joi from 'joi';
import { WireTraitOutput } from '../types/traits';
import { SchemaRow } from '../types/schema';
import { Result, ok, err } from '../types/result';
import { toUint64 } from '../constants/validation';

// Integers arrive as bigint from the lossless JSON reader
const uint64Schema = Joi.any().custom((value: unknown, helpers) =>
  typeof value === 'bigint' && toUint64(value) !== undefined ? value : helpers.error('any.invalid')
);

// Unknown fields on a trait output are tolerated, but each trait value must be
// exactly one of the two tagged forms
const traitValueSchema = Joi.alternatives().try(
  Joi.object({ String: Joi.string().allow('').required() }),
  Joi.object({ Number: uint64Schema.required() })
);

const traitOutputSchema = Joi.array<WireTraitOutput[]>().items(
  Joi.object({
    name: Joi.string().allow('').required(),
    traits: Joi.array().items(traitValueSchema).required()
  }).unknown(true)
);

const schemaRowsSchema = Joi.array<SchemaRow[]>().items(Joi.array());

export type ShapeCheck<T> = Result<T, string[]>;

function check<T>(schema: Joi.ArraySchema<T>, input: unknown): ShapeCheck<T> {
  const result = schema.validate(input, { abortEarly: false, convert: false });
  if (result.error) {
    return err(result.error.details.map(detail => detail.message));
  }
  return ok(result.value);
}

export function checkTraitOutput(input: unknown): ShapeCheck<WireTraitOutput[]> {
  return check(traitOutputSchema, input);
}

export function checkSchemaRows(input: unknown): ShapeCheck<SchemaRow[]> {
  return check(schemaRowsSchema, input);
}
