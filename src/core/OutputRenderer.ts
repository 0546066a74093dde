import { TraitOutput, WireTraitOutput, toWireTraitOutput } from '../types/traits';
import { ImageLayers } from './LayerPipeline';
import logger from '../utils/logger';

/**
 * The external compose step: turns one encoded item list into the rendered
 * image bytes. Called once per image, synchronously.
 */
export interface ImageComposer {
  compose(itemList: Uint8Array): Uint8Array;
}

/**
 * Stands in for a real compositor by handing the item list back unchanged, so
 * the result document carries the encoded layers themselves.
 */
export class ItemListComposer implements ImageComposer {
  compose(itemList: Uint8Array): Uint8Array {
    return itemList;
  }
}

export interface RenderedImage {
  name: string;
  type: string;
  content: string;
}

export interface RenderedOutput {
  traits: WireTraitOutput[];
  images: RenderedImage[];
}

export class OutputRenderer {
  private composer: ImageComposer;
  private mediaType: string;

  constructor(composer: ImageComposer, mediaType: string) {
    this.composer = composer;
    this.mediaType = mediaType;
  }

  render(traitOutput: readonly TraitOutput[], layers: readonly ImageLayers[]): RenderedOutput {
    const images = layers.map(layer => {
      const rendered = this.composer.compose(layer.itemList);
      logger.debug('Image composed', {
        imageName: layer.name,
        items: layer.items.length,
        bytes: rendered.length
      });
      return {
        name: layer.name,
        type: this.mediaType,
        content: Buffer.from(rendered).toString('base64')
      };
    });

    return {
      traits: traitOutput.map(toWireTraitOutput),
      images
    };
  }
}
