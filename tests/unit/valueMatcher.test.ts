import { ValueMatcher, testKey } from '../../src/core/ValueMatcher';
import { ImageKind, MatchPattern, MatchTable, SchemaEntry } from '../../src/types/schema';
import { numberTrait, stringTrait } from '../../src/types/traits';
import { ErrorCode, ErrorType } from '../../src/types/errors';
import { expectError, expectValue } from '../fixtures/results';

function entry(pattern: MatchPattern, matchTable?: MatchTable, kind: ImageKind = ImageKind.URI): SchemaEntry {
  return { imageName: '0', kind, sourceTrait: 'Trait', pattern, matchTable };
}

describe('ValueMatcher', () => {
  let matcher: ValueMatcher;

  beforeEach(() => {
    matcher = new ValueMatcher();
  });

  describe('raw pattern', () => {
    it('should pass a string value through unchanged', () => {
      const result = matcher.match(entry(MatchPattern.Raw), stringTrait('btcfs://raw-layer'));
      expect(expectValue(result)).toBe('btcfs://raw-layer');
    });

    it('should reject a number value', () => {
      const error = expectError(matcher.match(entry(MatchPattern.Raw), numberTrait(5n)));

      expect(error.code).toBe(ErrorCode.DecodeInvalidRawValue);
      expect(error.type).toBe(ErrorType.DECODE_ERROR);
      expect(error.exitCode).toBe(15);
    });

    it('should ignore a match table', () => {
      const table: MatchTable = [{ key: { kind: 'wildcard' }, content: 'ignored' }];
      expect(expectValue(matcher.match(entry(MatchPattern.Raw, table), stringTrait('kept')))).toBe('kept');
    });
  });

  describe('options and range patterns', () => {
    it.each([MatchPattern.Options, MatchPattern.Range])('should require a match table for %s', pattern => {
      const error = expectError(matcher.match(entry(pattern), stringTrait('Ethan')));
      expect(error.code).toBe(ErrorCode.DecodeInvalidOptionArgs);
    });

    it('should select the content of an exact string key', () => {
      const table: MatchTable = [
        { key: { kind: 'string', value: 'Alice' }, content: '#0000FF' },
        { key: { kind: 'string', value: 'Ethan' }, content: '#FF0000' }
      ];
      const result = matcher.match(entry(MatchPattern.Options, table), stringTrait('Ethan'));
      expect(expectValue(result)).toBe('#FF0000');
    });

    it('should select the content of an exact number key', () => {
      const table: MatchTable = [
        { key: { kind: 'number', value: 1n }, content: 'one' },
        { key: { kind: 'number', value: 2n }, content: 'two' }
      ];
      expect(expectValue(matcher.match(entry(MatchPattern.Options, table), numberTrait(2n)))).toBe('two');
    });

    it('should treat range bounds as inclusive', () => {
      const table: MatchTable = [
        { key: { kind: 'range', start: 10n, end: 20n }, content: 'inside' }
      ];
      const rangeEntry = entry(MatchPattern.Range, table);

      expect(expectValue(matcher.match(rangeEntry, numberTrait(10n)))).toBe('inside');
      expect(expectValue(matcher.match(rangeEntry, numberTrait(15n)))).toBe('inside');
      expect(expectValue(matcher.match(rangeEntry, numberTrait(20n)))).toBe('inside');
      expect(expectValue(matcher.match(rangeEntry, numberTrait(9n)))).toBeUndefined();
      expect(expectValue(matcher.match(rangeEntry, numberTrait(21n)))).toBeUndefined();
    });

    it('should let an earlier wildcard win over a narrower key', () => {
      const table: MatchTable = [
        { key: { kind: 'wildcard' }, content: 'fallback' },
        { key: { kind: 'range', start: 0n, end: 50n }, content: 'young' }
      ];
      expect(expectValue(matcher.match(entry(MatchPattern.Range, table), numberTrait(23n)))).toBe('fallback');
    });

    it('should use a trailing wildcard as the fallback', () => {
      const table: MatchTable = [
        { key: { kind: 'range', start: 0n, end: 50n }, content: 'young' },
        { key: { kind: 'wildcard' }, content: 'fallback' }
      ];
      const rangeEntry = entry(MatchPattern.Range, table);

      expect(expectValue(matcher.match(rangeEntry, numberTrait(23n)))).toBe('young');
      expect(expectValue(matcher.match(rangeEntry, numberTrait(99n)))).toBe('fallback');
    });

    it('should pick the first of overlapping ranges', () => {
      const table: MatchTable = [
        { key: { kind: 'range', start: 40n, end: 100n }, content: 'later-declared-wide' },
        { key: { kind: 'range', start: 0n, end: 50n }, content: 'narrow' }
      ];
      expect(expectValue(matcher.match(entry(MatchPattern.Range, table), numberTrait(45n)))).toBe('later-declared-wide');
    });

    it('should return nothing when no key matches', () => {
      const table: MatchTable = [{ key: { kind: 'string', value: 'Alice' }, content: '#0000FF' }];
      expect(expectValue(matcher.match(entry(MatchPattern.Options, table), stringTrait('Zed')))).toBeUndefined();
    });

    it('should return nothing for an empty table', () => {
      expect(expectValue(matcher.match(entry(MatchPattern.Options, []), stringTrait('Zed')))).toBeUndefined();
    });

    it('should reject a number key reached with a string value', () => {
      const table: MatchTable = [
        { key: { kind: 'string', value: 'Alice' }, content: 'a' },
        { key: { kind: 'number', value: 3n }, content: 'b' }
      ];
      const error = expectError(matcher.match(entry(MatchPattern.Options, table), stringTrait('Zed')));

      expect(error.code).toBe(ErrorCode.SchemaInvalidParsedTraitType);
      expect(error.context).toEqual({ imageName: '0', sourceTrait: 'Trait', element: 1 });
    });

    it('should reject a string key reached with a number value', () => {
      const table: MatchTable = [{ key: { kind: 'string', value: '3' }, content: 'a' }];
      const error = expectError(matcher.match(entry(MatchPattern.Options, table), numberTrait(3n)));
      expect(error.code).toBe(ErrorCode.SchemaInvalidParsedTraitType);
    });

    it('should reject a range key reached with a string value', () => {
      const table: MatchTable = [{ key: { kind: 'range', start: 0n, end: 5n }, content: 'a' }];
      const error = expectError(matcher.match(entry(MatchPattern.Range, table), stringTrait('3')));
      expect(error.code).toBe(ErrorCode.SchemaInvalidParsedTraitType);
    });

    it('should stop before a mismatched key once an earlier key matched', () => {
      const table: MatchTable = [
        { key: { kind: 'string', value: 'Ethan' }, content: 'hit' },
        { key: { kind: 'number', value: 3n }, content: 'never reached' }
      ];
      expect(expectValue(matcher.match(entry(MatchPattern.Options, table), stringTrait('Ethan')))).toBe('hit');
    });
  });

  describe('strict color codes', () => {
    const table: MatchTable = [
      { key: { kind: 'string', value: 'short' }, content: '#F00' },
      { key: { kind: 'string', value: 'alpha' }, content: '#FF000080' },
      { key: { kind: 'string', value: 'named' }, content: 'red' }
    ];

    it('should accept hex color codes', () => {
      const strict = new ValueMatcher({ strictColorCodes: true });
      const colorEntry = entry(MatchPattern.Options, table, ImageKind.ColorCode);

      expect(expectValue(strict.match(colorEntry, stringTrait('short')))).toBe('#F00');
      expect(expectValue(strict.match(colorEntry, stringTrait('alpha')))).toBe('#FF000080');
    });

    it('should reject other color content', () => {
      const strict = new ValueMatcher({ strictColorCodes: true });
      const error = expectError(strict.match(entry(MatchPattern.Options, table, ImageKind.ColorCode), stringTrait('named')));

      expect(error.code).toBe(ErrorCode.DecodeBadColorCodeFormat);
      expect(error.context?.content).toBe('red');
    });

    it('should leave uri content alone', () => {
      const strict = new ValueMatcher({ strictColorCodes: true });
      expect(expectValue(strict.match(entry(MatchPattern.Options, table), stringTrait('named')))).toBe('red');
    });

    it('should be off by default', () => {
      const result = matcher.match(entry(MatchPattern.Options, table, ImageKind.ColorCode), stringTrait('named'));
      expect(expectValue(result)).toBe('red');
    });
  });

  describe('testKey', () => {
    it('should accept any scalar for a wildcard', () => {
      expect(testKey({ kind: 'wildcard' }, stringTrait('x'))).toBe('match');
      expect(testKey({ kind: 'wildcard' }, numberTrait(0n))).toBe('match');
    });

    it('should never match a reversed range', () => {
      expect(testKey({ kind: 'range', start: 5n, end: 1n }, numberTrait(3n))).toBe('miss');
    });
  });
});
