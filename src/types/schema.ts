import { TraitOutput } from './traits';

export enum ImageKind {
  ColorCode = 'ColorCode',
  URI = 'URI',
  RawImage = 'RawImage'
}

export enum MatchPattern {
  Options = 'Options',
  Range = 'Range',
  Raw = 'Raw'
}

export type MatchKey =
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'number'; readonly value: bigint }
  | { readonly kind: 'range'; readonly start: bigint; readonly end: bigint }
  | { readonly kind: 'wildcard' };

export interface MatchRule {
  readonly key: MatchKey;
  readonly content: string;
}

/**
 * Candidate keys in declared order. The first rule whose key accepts the
 * resolved trait value selects the content.
 */
export type MatchTable = readonly MatchRule[];

export interface SchemaEntry {
  readonly imageName: string;
  readonly kind: ImageKind;
  readonly sourceTrait: string;
  readonly pattern: MatchPattern;
  readonly matchTable?: MatchTable;
}

/** One positional schema row as it appears in the input JSON. */
export type SchemaRow = readonly unknown[];

export interface Parameters {
  readonly traitOutput: readonly TraitOutput[];
  readonly schema: readonly SchemaEntry[];
}
