/**
 * knit check command
 *
 * Parses every given file (directories are searched by extension) and reports
 * the first error in each.
 */

import { parse, type ParseOptions } from '@knit/format';
import chalk from 'chalk';
import { Command } from 'commander';
import * as fs from 'node:fs';
import { createContext, parseOptionsFor } from '../context.js';
import { collectFiles } from '../files.js';

export interface CheckDiagnostic {
  /** 1-based line */
  line: number;
  /** 1-based column */
  column: number;
  code: string;
  message: string;
}

export interface CheckResult {
  path: string;
  errors: CheckDiagnostic[];
  /** Number of top-level entries when the file parsed */
  entries: number;
}

export interface ReportOptions {
  quiet?: boolean;
  color?: boolean;
}

interface CheckOptions extends ReportOptions {
  format: string;
}

/**
 * Check one document held in memory
 */
export function checkSource(
  content: string,
  filePath: string,
  options: ParseOptions = {},
): CheckResult {
  const result = parse(content, options);

  if (result.success) {
    return { path: filePath, errors: [], entries: result.document.size };
  }

  const { error } = result;
  return {
    path: filePath,
    entries: 0,
    errors: [
      {
        line: error.position.line,
        column: error.position.column + 1,
        code: error.kind.toUpperCase().replace(/-/g, '_'),
        message: error.reason,
      },
    ],
  };
}

export function reportPretty(results: CheckResult[], options: ReportOptions): string {
  const c =
    options.color === false
      ? {
          red: (s: string) => s,
          green: (s: string) => s,
          gray: (s: string) => s,
        }
      : chalk;

  const lines: string[] = [];
  let totalErrors = 0;

  for (const result of results) {
    const hasIssues = result.errors.length > 0;

    if (options.quiet && !hasIssues) continue;

    lines.push('');
    lines.push(`  ${result.path}`);

    if (!hasIssues) {
      lines.push(`    ${c.green('✓')} No issues`);
    }

    for (const error of result.errors) {
      lines.push(`    ${c.red('✗')} error  ${error.line}:${error.column}  ${error.message}`);
      totalErrors++;
    }
  }

  lines.push('');

  if (totalErrors === 0) {
    lines.push(c.green(`  ✓ All ${results.length} file${results.length !== 1 ? 's' : ''} passed`));
  } else {
    const failed = results.filter((r) => r.errors.length > 0).length;
    lines.push(
      c.gray(
        `  Found ${totalErrors} error${totalErrors !== 1 ? 's' : ''} in ${failed} of ${results.length} file${results.length !== 1 ? 's' : ''}`,
      ),
    );
  }

  return lines.join('\n');
}

export function reportJson(results: CheckResult[]): string {
  const output = {
    files: results.map((r) => ({
      path: r.path,
      errors: r.errors.map((d) => ({
        line: d.line,
        column: d.column,
        severity: 'error',
        code: d.code,
        message: d.message,
      })),
    })),
    summary: {
      files: results.length,
      errors: results.reduce((sum, r) => sum + r.errors.length, 0),
    },
  };

  return JSON.stringify(output, null, 2);
}

export const checkCommand = new Command('check')
  .description('Check files for syntax errors')
  .argument('[paths...]', 'Files or directories to check', ['.'])
  .option('--format <type>', 'Output format: pretty, json', 'pretty')
  .option('--quiet', 'Only output on errors')
  .option('--no-color', 'Disable colored output')
  .action(async (paths: string[], options: CheckOptions) => {
    try {
      const context = createContext();
      const { files, missing } = await collectFiles(paths, context.config.extensions);

      for (const p of missing) {
        console.error(`Path not found: ${p}`);
      }

      if (files.length === 0) {
        if (!options.quiet) {
          console.log('No files found to check');
        }
        process.exit(missing.length > 0 ? 2 : 0);
      }

      const results = files.map((file) =>
        checkSource(fs.readFileSync(file, 'utf-8'), file, parseOptionsFor(context, file)),
      );
      const totalErrors = results.reduce((sum, r) => sum + r.errors.length, 0);

      context.logger.info('check_completed', { files: results.length, errors: totalErrors });

      console.log(options.format === 'json' ? reportJson(results) : reportPretty(results, options));

      process.exit(totalErrors > 0 ? 1 : 0);
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(2);
    }
  });
