import fs from 'fs-extra';
import Joi from 'joi';
import { DecoderConfig } from '../types/config';
import { LayerDecoderError, ErrorType } from '../types/errors';
import { VALIDATION_RULES } from '../constants/validation';
import logger from '../utils/logger';

export const DEFAULT_CONFIG_PATH = 'config/decoder_config.json';

export class ConfigValidator {
  private schema: Joi.ObjectSchema<DecoderConfig>;

  constructor() {
    this.schema = Joi.object<DecoderConfig>({
      logging: Joi.object({
        level: Joi.string().valid('error', 'warn', 'info', 'verbose', 'debug').required()
      }).required(),

      matching: Joi.object({
        strict_color_codes: Joi.boolean().required()
      }).required(),

      limits: Joi.object({
        max_input_bytes: Joi.number().integer().min(1).max(64 * 1024 * 1024).required()
      }).required(),

      output: Joi.object({
        media_type: Joi.string().pattern(/^[\w.+-]+\/[\w.+-]+(;[\w=.+-]+)*$/).required(),
        pretty: Joi.boolean().required()
      }).required()
    });
  }

  validate(config: unknown): DecoderConfig {
    const result = this.schema.validate(config, {
      abortEarly: false,
      stripUnknown: true
    });

    if (result.error) {
      const errorMessages = result.error.details.map(detail => detail.message);
      throw new LayerDecoderError(
        ErrorType.CONFIG_ERROR,
        'Configuration validation failed',
        { errors: errorMessages }
      );
    }

    logger.debug('Configuration validation passed');
    return result.value;
  }

  /**
   * Loads and validates a config file. Without an explicit path the default
   * file is optional and the built-in defaults apply when it is missing.
   */
  load(configPath?: string): DecoderConfig {
    const resolvedPath = configPath || DEFAULT_CONFIG_PATH;

    if (!configPath && !fs.pathExistsSync(resolvedPath)) {
      logger.debug('No config file found, using defaults', { configPath: resolvedPath });
      return this.createDefaultConfig();
    }

    let configData: unknown;
    try {
      configData = fs.readJsonSync(resolvedPath);
    } catch (error) {
      throw new LayerDecoderError(
        ErrorType.CONFIG_ERROR,
        `Failed to load configuration: ${error}`,
        { configPath: resolvedPath }
      );
    }
    return this.validate(configData);
  }

  createDefaultConfig(): DecoderConfig {
    return {
      logging: {
        level: 'info'
      },
      matching: {
        strict_color_codes: false
      },
      limits: {
        max_input_bytes: VALIDATION_RULES.MAX_INPUT_BYTES
      },
      output: {
        media_type: 'image/png;base64',
        pretty: false
      }
    };
  }
}
