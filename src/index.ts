#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import fs from 'fs-extra';
import { LayerDecoder } from './core/LayerDecoder';
import { SchemaDecoder } from './core/SchemaDecoder';
import { ItemEncoder } from './core/ItemEncoder';
import { ItemListComposer } from './core/OutputRenderer';
import { ConfigValidator } from './validators/configValidator';
import { checkSchemaRows } from './validators/inputValidator';
import { DecoderConfig } from './types/config';
import { DecodeResult, ERROR_MESSAGES, ErrorCode, ErrorType, HOST_FAILURE_EXIT_CODE, LayerDecoderError, SUCCESS_EXIT_CODE } from './types/errors';
import logger, { setLogLevel } from './utils/logger';
import { parseJson, stringifyJson } from './utils/json';

interface CommonOptions {
  config?: string;
  verbose?: boolean;
  files?: boolean;
}

const program = new Command();

program
  .name('layerdec')
  .description('Decode trait output into per-image layer item lists using a trait schema')
  .version('1.0.0');

function loadConfig(options: CommonOptions): DecoderConfig {
  const config = new ConfigValidator().load(options.config);
  setLogLevel(options.verbose ? 'debug' : config.logging.level);
  return config;
}

function readInputs(inputs: string[], fromFiles: boolean): Uint8Array[] {
  if (!fromFiles) {
    return inputs.map(input => Buffer.from(input, 'utf8'));
  }
  return inputs.map(filePath => {
    try {
      return fs.readFileSync(filePath);
    } catch (error) {
      throw new LayerDecoderError(ErrorType.FILE_ERROR, `Failed to read input: ${error}`, { filePath });
    }
  });
}

function unwrap<T>(result: DecodeResult<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

function print(value: unknown, config: DecoderConfig): void {
  console.log(stringifyJson(value, config.output.pretty ? 2 : undefined));
}

function exitWithError(error: unknown): never {
  if (error instanceof LayerDecoderError) {
    const code = error.code !== undefined ? ` (code ${error.code})` : '';
    console.error(chalk.red(`Error${code}:`), error.message);
    if (error.context) {
      console.error(chalk.gray(stringifyJson(error.context)));
    }
    process.exit(error.exitCode);
  }
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : error);
  process.exit(HOST_FAILURE_EXIT_CODE);
}

// Decode command
program
  .command('decode')
  .description('Resolve image layers and print each image\'s item list')
  .argument('<inputs...>', 'Trait output JSON and trait schema JSON')
  .option('-c, --config <path>', 'Config file path')
  .option('-f, --files', 'Treat inputs as file paths')
  .option('-v, --verbose', 'Verbose output')
  .action((inputs: string[], options: CommonOptions) => {
    const spinner = ora('Decoding image layers...').start();

    try {
      const config = loadConfig(options);
      const decoder = new LayerDecoder(config);
      const decoded = unwrap(decoder.decode(readInputs(inputs, options.files ?? false)));

      spinner.succeed(`Decoded ${decoded.images.length} image(s)`);
      print({
        images: decoded.images.map(image => ({
          name: image.name,
          items: image.items.map(item => ({ type: item.kind, content: item.content })),
          item_list: Buffer.from(image.itemList).toString('hex')
        }))
      }, config);
    } catch (error) {
      spinner.fail('Decoding failed');
      exitWithError(error);
    }
  });

// Render command
program
  .command('render')
  .description('Compose every image and print the final result document')
  .argument('<inputs...>', 'Trait output JSON and trait schema JSON')
  .option('-c, --config <path>', 'Config file path')
  .option('-f, --files', 'Treat inputs as file paths')
  .option('-v, --verbose', 'Verbose output')
  .action((inputs: string[], options: CommonOptions) => {
    const spinner = ora('Rendering images...').start();

    try {
      const config = loadConfig(options);
      const decoder = new LayerDecoder(config);
      const output = unwrap(decoder.render(readInputs(inputs, options.files ?? false), new ItemListComposer()));

      spinner.succeed(`Rendered ${output.images.length} image(s)`);
      print(output, config);
    } catch (error) {
      spinner.fail('Rendering failed');
      exitWithError(error);
    }
  });

// Schema command
program
  .command('schema')
  .description('Validate a trait schema and print it in normalized form')
  .argument('<schema>', 'Trait schema JSON')
  .option('-c, --config <path>', 'Config file path')
  .option('-f, --files', 'Treat the input as a file path')
  .option('-v, --verbose', 'Verbose output')
  .action((schema: string, options: CommonOptions) => {
    const spinner = ora('Validating trait schema...').start();

    try {
      const config = loadConfig(options);
      const [bytes] = readInputs([schema], options.files ?? false);
      const rows = parseJson(Buffer.from(bytes ?? []).toString('utf8'));
      if (!rows.ok) {
        throw LayerDecoderError.fromCode(ErrorCode.ParseInvalidTraitsBase, { reason: rows.error });
      }

      const shape = checkSchemaRows(rows.value);
      if (!shape.ok) {
        throw LayerDecoderError.fromCode(ErrorCode.ParseInvalidTraitsBase, { errors: shape.error });
      }

      const schemaDecoder = new SchemaDecoder();
      const entries = unwrap(schemaDecoder.decode(shape.value));
      spinner.succeed(`Schema is valid: ${entries.length} layer(s)`);
      print(schemaDecoder.encode(entries), config);
    } catch (error) {
      spinner.fail('Schema validation failed');
      exitWithError(error);
    }
  });

// Inspect command
program
  .command('inspect')
  .description('Decode a hex-encoded item list')
  .argument('<hex>', 'Item list bytes as hex')
  .option('-c, --config <path>', 'Config file path')
  .action((hex: string, options: CommonOptions) => {
    try {
      const config = loadConfig(options);
      const digits = hex.replace(/^0x/, '');
      if (!/^([0-9a-fA-F]{2})*$/.test(digits)) {
        throw LayerDecoderError.fromCode(ErrorCode.DecodeInvalidItemList, { reason: 'not a hex string' });
      }
      const items = unwrap(new ItemEncoder().decodeItemList(Buffer.from(digits, 'hex')));
      print(items, config);
    } catch (error) {
      exitWithError(error);
    }
  });

// Codes command
program
  .command('codes')
  .description('List exit codes')
  .action(() => {
    console.log(`${chalk.yellow(String(SUCCESS_EXIT_CODE).padStart(3))}  ${chalk.green('Success')}`);
    for (const [code, message] of Object.entries(ERROR_MESSAGES)) {
      const name = ErrorCode[Number(code)];
      console.log(`${chalk.yellow(code.padStart(3))}  ${chalk.cyan(name)} ${chalk.gray(message)}`);
    }
    console.log(`${chalk.yellow(String(HOST_FAILURE_EXIT_CODE))}  ${chalk.cyan('HostFailure')} ${chalk.gray('Config, file or compose failure')}`);
  });

process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception:', error);
  process.exit(HOST_FAILURE_EXIT_CODE);
});

program.parse();
