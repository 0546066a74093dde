import { DecoderConfig } from '../types/config';
import { Parameters } from '../types/schema';
import { DecodeResult } from '../types/errors';
import { ok } from '../types/result';
import { ConfigValidator } from '../validators/configValidator';
import { ParameterParser } from './ParameterParser';
import { ImageLayers, LayerPipeline } from './LayerPipeline';
import { ImageComposer, OutputRenderer, RenderedOutput } from './OutputRenderer';
import logger from '../utils/logger';

export interface DecodedLayers {
  parameters: Parameters;
  images: ImageLayers[];
}

/**
 * Runs a whole invocation: raw inputs in, per-image item lists (or the final
 * result document) out.
 */
export class LayerDecoder {
  private config: DecoderConfig;
  private parser: ParameterParser;
  private pipeline: LayerPipeline;

  constructor(config?: DecoderConfig) {
    this.config = config ?? new ConfigValidator().createDefaultConfig();
    this.parser = new ParameterParser({ maxInputBytes: this.config.limits.max_input_bytes });
    this.pipeline = new LayerPipeline({ strictColorCodes: this.config.matching.strict_color_codes });
  }

  decode(inputs: readonly Uint8Array[]): DecodeResult<DecodedLayers> {
    const parameters = this.parser.parse(inputs);
    if (!parameters.ok) {
      logger.warn('Failed to parse decoder inputs', {
        code: parameters.error.code,
        message: parameters.error.message,
        context: parameters.error.context
      });
      return parameters;
    }

    const images = this.pipeline.build(parameters.value);
    if (!images.ok) {
      logger.warn('Failed to build image layers', {
        code: images.error.code,
        message: images.error.message,
        context: images.error.context
      });
      return images;
    }

    logger.info('Decoded image layers', {
      traits: parameters.value.traitOutput.length,
      schemaEntries: parameters.value.schema.length,
      images: images.value.length
    });
    return ok({ parameters: parameters.value, images: images.value });
  }

  render(inputs: readonly Uint8Array[], composer: ImageComposer): DecodeResult<RenderedOutput> {
    const decoded = this.decode(inputs);
    if (!decoded.ok) {
      return decoded;
    }
    const renderer = new OutputRenderer(composer, this.config.output.media_type);
    return ok(renderer.render(decoded.value.parameters.traitOutput, decoded.value.images));
  }
}
