import { Err, Result, err } from './result';

/**
 * Stable numeric codes surfaced to the host as the process exit code.
 * Values are part of the external contract and must never be renumbered.
 */
export enum ErrorCode {
  ParseInvalidArgCount = 1,
  ParseInvalidDob0Output = 2,
  ParseInvalidTraitsBase = 3,

  SchemaInsufficientElements = 4,
  SchemaInvalidName = 5,
  SchemaInvalidTraitName = 6,
  SchemaInvalidType = 7,
  SchemaTypeMismatch = 8,
  SchemaInvalidPattern = 9,
  SchemaPatternMismatch = 10,
  SchemaInvalidArgs = 11,
  SchemaInvalidArgsElement = 12,
  SchemaInvalidParsedTraitType = 13,

  DecodeInvalidOptionArgs = 14,
  DecodeInvalidRawValue = 15,
  DecodeBadUtf8Format = 16,
  DecodeBadColorCodeFormat = 17,
  DecodeInvalidItemList = 18
}

export const SUCCESS_EXIT_CODE = 0;

// Anything outside the decoder's own taxonomy: config, file access, compose failures
export const HOST_FAILURE_EXIT_CODE = 101;

export enum ErrorType {
  PARSE_ERROR = 'PARSE_ERROR',
  SCHEMA_ERROR = 'SCHEMA_ERROR',
  DECODE_ERROR = 'DECODE_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  FILE_ERROR = 'FILE_ERROR'
}

export interface ErrorContext {
  row?: number;
  element?: number;
  imageName?: string;
  sourceTrait?: string;
  buffer?: number;
  offset?: number;
  [key: string]: unknown;
}

export function errorTypeFor(code: ErrorCode): ErrorType {
  if (code <= ErrorCode.ParseInvalidTraitsBase) {
    return ErrorType.PARSE_ERROR;
  }
  if (code <= ErrorCode.SchemaInvalidParsedTraitType) {
    return ErrorType.SCHEMA_ERROR;
  }
  return ErrorType.DECODE_ERROR;
}

export class LayerDecoderError extends Error {
  public readonly type: ErrorType;
  public readonly code: ErrorCode | undefined;
  public readonly context: ErrorContext | undefined;

  constructor(
    type: ErrorType,
    message: string,
    context?: ErrorContext,
    code?: ErrorCode
  ) {
    super(message);
    this.name = 'LayerDecoderError';
    this.type = type;
    this.context = context;
    this.code = code;
  }

  static fromCode(code: ErrorCode, context?: ErrorContext): LayerDecoderError {
    return new LayerDecoderError(errorTypeFor(code), ERROR_MESSAGES[code], context, code);
  }

  get exitCode(): number {
    return this.code ?? HOST_FAILURE_EXIT_CODE;
  }
}

export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCode.ParseInvalidArgCount]: 'Expected exactly two inputs: trait output and trait schema',
  [ErrorCode.ParseInvalidDob0Output]: 'Trait output is empty or malformed',
  [ErrorCode.ParseInvalidTraitsBase]: 'Trait schema must be a JSON array of rows',
  [ErrorCode.SchemaInsufficientElements]: 'Schema row needs at least name, type, trait and pattern',
  [ErrorCode.SchemaInvalidName]: 'Schema image name must be a string',
  [ErrorCode.SchemaInvalidTraitName]: 'Schema trait name must be a string',
  [ErrorCode.SchemaInvalidType]: 'Schema image type must be a string',
  [ErrorCode.SchemaTypeMismatch]: 'Schema image type must be one of color, uri, image',
  [ErrorCode.SchemaInvalidPattern]: 'Schema pattern must be a string',
  [ErrorCode.SchemaPatternMismatch]: 'Schema pattern is unknown or not allowed for this image type',
  [ErrorCode.SchemaInvalidArgs]: 'Schema match table must be an array',
  [ErrorCode.SchemaInvalidArgsElement]: 'Schema match table entry must be [key, value] with a string value',
  [ErrorCode.SchemaInvalidParsedTraitType]: 'Trait value type does not match the match table key',
  [ErrorCode.DecodeInvalidOptionArgs]: 'Options and range patterns require a match table',
  [ErrorCode.DecodeInvalidRawValue]: 'Raw pattern requires a string trait value',
  [ErrorCode.DecodeBadUtf8Format]: 'Item payload is not valid UTF-8',
  [ErrorCode.DecodeBadColorCodeFormat]: 'Color code must be #RGB, #RRGGBB or #RRGGBBAA',
  [ErrorCode.DecodeInvalidItemList]: 'Item list bytes are malformed'
};

export type DecodeResult<T> = Result<T, LayerDecoderError>;

export const fail = (code: ErrorCode, context?: ErrorContext): Err<LayerDecoderError> =>
  err(LayerDecoderError.fromCode(code, context));
