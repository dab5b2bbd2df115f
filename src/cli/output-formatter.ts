/**
 * CLI Output Formatter
 *
 * Turns CliResult values into chalk-styled text.
 */

import chalk from 'chalk';
import type { CliResult, CliOutput } from './types/cli-result.js';

/** Where printed results go. Tests capture lines instead of the console. */
export interface OutputSink {
  out(text: string): void;
  err(text: string): void;
}

export const consoleSink: OutputSink = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

export function formatOutput(output: CliOutput, isError: boolean = false): string {
  const lines: string[] = [];

  lines.push(isError ? chalk.red(`❌ ${output.message}`) : chalk.green(`✅ ${output.message}`));

  if (output.fields && output.fields.length > 0) {
    output.fields.forEach(([key, value]) => {
      lines.push(formatKeyValue(key, value));
    });
  }

  if (output.details && output.details.length > 0) {
    lines.push('');
    output.details.forEach((detail) => {
      lines.push(chalk.white(`  • ${detail}`));
    });
  }

  if (output.suggestions && output.suggestions.length > 0) {
    lines.push('');
    lines.push(chalk.gray('💡 Suggestions:'));
    output.suggestions.forEach((suggestion) => {
      lines.push(chalk.gray(`  • ${suggestion}`));
    });
  }

  return lines.join('\n');
}

export function formatResult(result: CliResult): string {
  switch (result.kind) {
    case 'success':
      return result.output ? formatOutput(result.output, false) : '';

    case 'failure':
      return formatOutput(result.output, true);
  }
}

export function printResult(result: CliResult, sink: OutputSink = consoleSink): void {
  const formatted = formatResult(result);
  if (!formatted) return;

  if (result.kind === 'failure') {
    sink.err(formatted);
  } else {
    sink.out(formatted);
  }
}

export function formatKeyValue(key: string, value: string): string {
  return `${chalk.white(`   ${key}:`)} ${chalk.cyan(value)}`;
}
