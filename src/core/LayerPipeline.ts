import { Parameters, SchemaEntry } from '../types/schema';
import { DecodeResult } from '../types/errors';
import { ok } from '../types/result';
import { LayerResolver } from './LayerResolver';
import { ValueMatcher, MatcherOptions } from './ValueMatcher';
import { EncodedItem, ItemEncoder } from './ItemEncoder';
import logger from '../utils/logger';

export interface ImageLayers {
  readonly name: string;
  readonly items: readonly EncodedItem[];
  /** The items as one encoded item list, ready for the compose step. */
  readonly itemList: Uint8Array;
}

/**
 * Splits the schema into maximal runs of adjacent entries sharing an image
 * name. Non-adjacent entries with the same name stay separate runs.
 */
export function groupByImageName(schema: readonly SchemaEntry[]): SchemaEntry[][] {
  const groups: SchemaEntry[][] = [];
  let current: SchemaEntry[] | undefined;

  for (const entry of schema) {
    if (current && current[0]?.imageName === entry.imageName) {
      current.push(entry);
    } else {
      current = [entry];
      groups.push(current);
    }
  }
  return groups;
}

export class LayerPipeline {
  private matcher: ValueMatcher;
  private encoder: ItemEncoder;

  constructor(options: MatcherOptions = {}) {
    this.matcher = new ValueMatcher(options);
    this.encoder = new ItemEncoder();
  }

  build(parameters: Parameters): DecodeResult<ImageLayers[]> {
    const resolver = new LayerResolver(parameters.traitOutput);
    const images: ImageLayers[] = [];

    for (const group of groupByImageName(parameters.schema)) {
      const name = group[0]?.imageName ?? '';
      const items: EncodedItem[] = [];

      for (const entry of group) {
        const resolved = resolver.resolve(entry.sourceTrait);
        if (resolved === undefined) {
          logger.debug('Trait not resolved, truncating image', {
            imageName: name,
            sourceTrait: entry.sourceTrait,
            layers: items.length
          });
          break;
        }

        const matched = this.matcher.match(entry, resolved);
        if (!matched.ok) {
          return matched;
        }
        if (matched.value === undefined) {
          logger.debug('No match table entry accepted trait, truncating image', {
            imageName: name,
            sourceTrait: entry.sourceTrait,
            layers: items.length
          });
          break;
        }

        items.push(this.encoder.encodeItem(entry.kind, matched.value));
      }

      images.push({ name, items, itemList: this.encoder.encodeItemList(items) });
    }

    logger.debug('Image layers built', {
      imageCount: images.length,
      itemCount: images.reduce((count, image) => count + image.items.length, 0)
    });
    return ok(images);
  }
}
