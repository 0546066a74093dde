export type ScalarTraitValue =
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'number'; readonly value: bigint };

export interface TraitOutput {
  readonly name: string;
  readonly values: readonly ScalarTraitValue[];
}

// Wire form of a trait value, e.g. {"String": "Ethan"} or {"Number": 23}
export type WireTraitValue = { String: string } | { Number: bigint };

export interface WireTraitOutput {
  name: string;
  traits: WireTraitValue[];
}

export const stringTrait = (value: string): ScalarTraitValue => ({ kind: 'string', value });

export const numberTrait = (value: bigint): ScalarTraitValue => ({ kind: 'number', value });

export function toWireTraitValue(value: ScalarTraitValue): WireTraitValue {
  switch (value.kind) {
    case 'string':
      return { String: value.value };
    case 'number':
      return { Number: value.value };
  }
}

export function toWireTraitOutput(output: TraitOutput): WireTraitOutput {
  return {
    name: output.name,
    traits: output.values.map(toWireTraitValue)
  };
}
