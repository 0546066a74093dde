import { ScalarTraitValue, TraitOutput } from '../types/traits';

export class LayerResolver {
  private index: Map<string, ScalarTraitValue | undefined> = new Map();

  constructor(traitOutput: readonly TraitOutput[]) {
    // Only the first output carrying a name is ever looked at
    for (const output of traitOutput) {
      if (!this.index.has(output.name)) {
        this.index.set(output.name, output.values[0]);
      }
    }
  }

  resolve(sourceTrait: string): ScalarTraitValue | undefined {
    return this.index.get(sourceTrait);
  }
}
