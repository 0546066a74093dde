import { ImageKind, MatchPattern } from '../types/schema';

export const VALIDATION_RULES = {
  MIN_ROW_ELEMENTS: 4,
  MATCH_TABLE_INDEX: 4,
  EXPECTED_INPUT_COUNT: 2,
  MAX_INPUT_BYTES: 2 * 1024 * 1024, // 2MB, the host's working-memory arena
  WILDCARD_TOKEN: '*',
  MAX_UINT64: 18446744073709551615n,
  COLOR_CODE_PATTERN: /^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/
} as const;

export const IMAGE_KIND_KEYWORDS: ReadonlyMap<string, ImageKind> = new Map([
  ['color', ImageKind.ColorCode],
  ['uri', ImageKind.URI],
  ['image', ImageKind.RawImage]
]);

export const MATCH_PATTERN_KEYWORDS: ReadonlyMap<string, MatchPattern> = new Map([
  ['options', MatchPattern.Options],
  ['range', MatchPattern.Range],
  ['raw', MatchPattern.Raw]
]);

export const PATTERN_COMPATIBILITY: Record<MatchPattern, readonly ImageKind[]> = {
  [MatchPattern.Options]: [ImageKind.ColorCode, ImageKind.URI],
  [MatchPattern.Range]: [ImageKind.ColorCode, ImageKind.URI],
  [MatchPattern.Raw]: [ImageKind.RawImage, ImageKind.URI]
};

export function keywordForKind(kind: ImageKind): string {
  switch (kind) {
    case ImageKind.ColorCode:
      return 'color';
    case ImageKind.URI:
      return 'uri';
    case ImageKind.RawImage:
      return 'image';
  }
}

export function keywordForPattern(pattern: MatchPattern): string {
  switch (pattern) {
    case MatchPattern.Options:
      return 'options';
    case MatchPattern.Range:
      return 'range';
    case MatchPattern.Raw:
      return 'raw';
  }
}

/**
 * Accepts a non-negative integer no wider than 64 bits. Plain numbers are
 * taken only while they are still exact.
 */
export function toUint64(value: unknown): bigint | undefined {
  if (typeof value === 'bigint') {
    return value >= 0n && value <= VALIDATION_RULES.MAX_UINT64 ? value : undefined;
  }
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) {
    return BigInt(value);
  }
  return undefined;
}
