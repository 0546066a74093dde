import { ImageKind, MatchKey, MatchPattern, MatchTable, SchemaEntry } from '../types/schema';
import { ScalarTraitValue } from '../types/traits';
import { DecodeResult, ErrorCode, fail } from '../types/errors';
import { ok } from '../types/result';
import { VALIDATION_RULES } from '../constants/validation';

export interface MatcherOptions {
  strictColorCodes?: boolean;
}

export type KeyOutcome = 'match' | 'miss' | 'type-mismatch';

/**
 * Picks the content string for a resolved trait value.
 *
 * `undefined` means nothing in the table accepted the value, which ends the
 * image's layer stack without failing the run.
 */
export class ValueMatcher {
  private strictColorCodes: boolean;

  constructor(options: MatcherOptions = {}) {
    this.strictColorCodes = options.strictColorCodes ?? false;
  }

  match(entry: SchemaEntry, resolved: ScalarTraitValue): DecodeResult<string | undefined> {
    const selected = this.select(entry, resolved);
    if (!selected.ok || selected.value === undefined) {
      return selected;
    }

    if (
      this.strictColorCodes &&
      entry.kind === ImageKind.ColorCode &&
      !VALIDATION_RULES.COLOR_CODE_PATTERN.test(selected.value)
    ) {
      return fail(ErrorCode.DecodeBadColorCodeFormat, {
        imageName: entry.imageName,
        sourceTrait: entry.sourceTrait,
        content: selected.value
      });
    }
    return selected;
  }

  private select(entry: SchemaEntry, resolved: ScalarTraitValue): DecodeResult<string | undefined> {
    switch (entry.pattern) {
      case MatchPattern.Raw:
        if (resolved.kind !== 'string') {
          return fail(ErrorCode.DecodeInvalidRawValue, {
            imageName: entry.imageName,
            sourceTrait: entry.sourceTrait
          });
        }
        return ok(resolved.value);

      case MatchPattern.Options:
      case MatchPattern.Range:
        if (!entry.matchTable) {
          return fail(ErrorCode.DecodeInvalidOptionArgs, {
            imageName: entry.imageName,
            sourceTrait: entry.sourceTrait
          });
        }
        return this.lookup(entry, entry.matchTable, resolved);
    }
  }

  private lookup(
    entry: SchemaEntry,
    table: MatchTable,
    resolved: ScalarTraitValue
  ): DecodeResult<string | undefined> {
    for (const [index, rule] of table.entries()) {
      const outcome = testKey(rule.key, resolved);
      if (outcome === 'type-mismatch') {
        return fail(ErrorCode.SchemaInvalidParsedTraitType, {
          imageName: entry.imageName,
          sourceTrait: entry.sourceTrait,
          element: index
        });
      }
      if (outcome === 'match') {
        return ok(rule.content);
      }
    }
    return ok(undefined);
  }
}

export function testKey(key: MatchKey, resolved: ScalarTraitValue): KeyOutcome {
  switch (key.kind) {
    case 'wildcard':
      return 'match';
    case 'string':
      if (resolved.kind !== 'string') {
        return 'type-mismatch';
      }
      return resolved.value === key.value ? 'match' : 'miss';
    case 'number':
      if (resolved.kind !== 'number') {
        return 'type-mismatch';
      }
      return resolved.value === key.value ? 'match' : 'miss';
    case 'range':
      if (resolved.kind !== 'number') {
        return 'type-mismatch';
      }
      return key.start <= resolved.value && resolved.value <= key.end ? 'match' : 'miss';
  }
}
