import {
  MatchKey,
  MatchRule,
  MatchTable,
  SchemaEntry,
  SchemaRow
} from '../types/schema';
import { DecodeResult, ErrorCode, fail } from '../types/errors';
import { ok } from '../types/result';
import {
  IMAGE_KIND_KEYWORDS,
  MATCH_PATTERN_KEYWORDS,
  PATTERN_COMPATIBILITY,
  VALIDATION_RULES,
  keywordForKind,
  keywordForPattern,
  toUint64
} from '../constants/validation';
import logger from '../utils/logger';

/**
 * Turns positional schema rows into typed entries and back.
 *
 * A row is `[name, type, trait, pattern, matchTable?]`; every field is checked
 * in that order and the first failure decides the error code.
 */
export class SchemaDecoder {
  decode(rows: readonly SchemaRow[]): DecodeResult<SchemaEntry[]> {
    const entries: SchemaEntry[] = [];

    for (const [index, row] of rows.entries()) {
      const entry = this.decodeRow(row, index);
      if (!entry.ok) {
        logger.debug('Schema row rejected', { row: index, code: entry.error.code });
        return entry;
      }
      entries.push(entry.value);
    }

    logger.debug('Trait schema decoded', { entryCount: entries.length });
    return ok(entries);
  }

  encode(entries: readonly SchemaEntry[]): unknown[][] {
    return entries.map(entry => {
      const row: unknown[] = [
        entry.imageName,
        keywordForKind(entry.kind),
        entry.sourceTrait,
        keywordForPattern(entry.pattern)
      ];
      if (entry.matchTable) {
        row.push(entry.matchTable.map(rule => [this.encodeKey(rule.key), rule.content]));
      }
      return row;
    });
  }

  private decodeRow(row: SchemaRow, index: number): DecodeResult<SchemaEntry> {
    if (row.length < VALIDATION_RULES.MIN_ROW_ELEMENTS) {
      return fail(ErrorCode.SchemaInsufficientElements, { row: index, elements: row.length });
    }

    const [imageName, kindKeyword, sourceTrait, patternKeyword] = row;

    if (typeof imageName !== 'string') {
      return fail(ErrorCode.SchemaInvalidName, { row: index });
    }

    if (typeof kindKeyword !== 'string') {
      return fail(ErrorCode.SchemaInvalidType, { row: index });
    }
    const kind = IMAGE_KIND_KEYWORDS.get(kindKeyword);
    if (kind === undefined) {
      return fail(ErrorCode.SchemaTypeMismatch, { row: index, keyword: kindKeyword });
    }

    if (typeof sourceTrait !== 'string') {
      return fail(ErrorCode.SchemaInvalidTraitName, { row: index });
    }

    if (typeof patternKeyword !== 'string') {
      return fail(ErrorCode.SchemaInvalidPattern, { row: index });
    }
    const pattern = MATCH_PATTERN_KEYWORDS.get(patternKeyword);
    if (pattern === undefined || !PATTERN_COMPATIBILITY[pattern].includes(kind)) {
      return fail(ErrorCode.SchemaPatternMismatch, {
        row: index,
        keyword: patternKeyword,
        kind
      });
    }

    const entry: SchemaEntry = { imageName, kind, sourceTrait, pattern };
    if (row.length <= VALIDATION_RULES.MATCH_TABLE_INDEX) {
      return ok(entry);
    }

    const matchTable = this.decodeMatchTable(row[VALIDATION_RULES.MATCH_TABLE_INDEX], index);
    if (!matchTable.ok) {
      return matchTable;
    }
    return ok({ ...entry, matchTable: matchTable.value });
  }

  private decodeMatchTable(value: unknown, row: number): DecodeResult<MatchTable> {
    if (!Array.isArray(value)) {
      return fail(ErrorCode.SchemaInvalidArgs, { row });
    }

    const rules: MatchRule[] = [];
    for (const [element, item] of value.entries()) {
      if (!Array.isArray(item) || item.length !== 2) {
        return fail(ErrorCode.SchemaInvalidArgsElement, { row, element });
      }
      const [rawKey, content] = item;
      const key = this.decodeKey(rawKey);
      if (key === undefined || typeof content !== 'string') {
        return fail(ErrorCode.SchemaInvalidArgsElement, { row, element });
      }
      rules.push({ key, content });
    }
    return ok(rules);
  }

  private decodeKey(raw: unknown): MatchKey | undefined {
    if (typeof raw === 'number' || typeof raw === 'bigint') {
      const value = toUint64(raw);
      return value === undefined ? undefined : { kind: 'number', value };
    }
    if (typeof raw === 'string') {
      return { kind: 'string', value: raw };
    }
    if (!Array.isArray(raw)) {
      return undefined;
    }
    if (raw.length === 1 && raw[0] === VALIDATION_RULES.WILDCARD_TOKEN) {
      return { kind: 'wildcard' };
    }
    if (raw.length === 2) {
      const start = toUint64(raw[0]);
      const end = toUint64(raw[1]);
      if (start !== undefined && end !== undefined) {
        return { kind: 'range', start, end };
      }
    }
    return undefined;
  }

  private encodeKey(key: MatchKey): unknown {
    switch (key.kind) {
      case 'string':
      case 'number':
        return key.value;
      case 'range':
        return [key.start, key.end];
      case 'wildcard':
        return [VALIDATION_RULES.WILDCARD_TOKEN];
    }
  }
}
