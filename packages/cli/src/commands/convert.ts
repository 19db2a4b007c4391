/**
 * knit print, to-json and from-json commands
 */

import {
  fromJSON,
  parse,
  stringify,
  toJSON,
  type Document,
  type ParseOptions,
} from '@knit/format';
import { Command } from 'commander';
import * as fs from 'node:fs';
import { createContext, parseOptionsFor, type CliContext } from '../context.js';

/**
 * Raised when an input file cannot be converted; the message is printed as-is
 */
export class ConversionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConversionError';
  }
}

function parseDocument(content: string, filePath: string, options: ParseOptions): Document {
  const result = parse(content, options);
  if (!result.success) {
    const { line, column } = result.error.position;
    throw new ConversionError(`${filePath}:${line}:${column + 1}: ${result.error.reason}`);
  }
  return result.document;
}

/**
 * Canonical form of a document: constants substituted, comments dropped
 */
export function printSource(
  content: string,
  filePath: string,
  options: ParseOptions & { inline?: boolean } = {},
): string {
  return stringify(parseDocument(content, filePath, options), options.inline ?? false);
}

export function toJsonText(
  content: string,
  filePath: string,
  options: ParseOptions & { indent?: number } = {},
): string {
  return JSON.stringify(toJSON(parseDocument(content, filePath, options)), null, options.indent ?? 2);
}

export function fromJsonText(content: string, filePath: string): string {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ConversionError(
      `${filePath}: invalid JSON (${error instanceof Error ? error.message : String(error)})`,
    );
  }

  try {
    return stringify(fromJSON(data));
  } catch (error) {
    if (error instanceof TypeError) {
      throw new ConversionError(`${filePath}: ${error.message}`);
    }
    throw error;
  }
}

function parseIndent(value: string): number {
  const indent = Number(value);
  if (!Number.isInteger(indent) || indent < 0 || indent > 10) {
    throw new ConversionError(`Indent must be an integer from 0 to 10, got '${value}'`);
  }
  return indent;
}

/**
 * Read a file, run a conversion and print the result; exit 1 on failure
 */
function runConversion(file: string, convert: (content: string, context: CliContext) => string): void {
  try {
    const context = createContext();
    const output = convert(fs.readFileSync(file, 'utf-8'), context);
    context.logger.debug('file_converted', { file, length: output.length });
    console.log(output);
  } catch (error) {
    if (error instanceof ConversionError) {
      console.error(error.message);
      process.exit(1);
    }
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(2);
  }
}

export const printCommand = new Command('print')
  .description('Print a file in canonical form with constants resolved')
  .argument('<file>', 'File to print')
  .option('--inline', 'Print all entries on one line')
  .action((file: string, options: { inline?: boolean }) => {
    runConversion(file, (content, context) =>
      printSource(content, file, { ...parseOptionsFor(context, file), inline: options.inline }),
    );
  });

export const toJsonCommand = new Command('to-json')
  .description('Print a file as JSON')
  .argument('<file>', 'File to convert')
  .option('--indent <n>', 'Spaces of indentation', '2')
  .action((file: string, options: { indent: string }) => {
    runConversion(file, (content, context) =>
      toJsonText(content, file, {
        ...parseOptionsFor(context, file),
        indent: parseIndent(options.indent),
      }),
    );
  });

export const fromJsonCommand = new Command('from-json')
  .description('Print a JSON object file in the knit format')
  .argument('<file>', 'JSON file to convert')
  .action((file: string) => {
    runConversion(file, (content) => fromJsonText(content, file));
  });
