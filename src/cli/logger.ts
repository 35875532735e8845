/**
 * Terminal output helpers for the CLI.
 */

import chalk from 'chalk';
import ora from 'ora';
import boxen from 'boxen';
import gradient from 'gradient-string';
import Table from 'cli-table3';

const shopGradient = gradient(['#FF8A00', '#FF5E62', '#E52E71']);

/**
 * Print the store assistant banner.
 */
export function printBanner(): void {
  const banner = `
╔═══════════════════════════════════════╗
║                                       ║
║   ${shopGradient('store assistant')}                     ║
║   ${chalk.gray('ask your inventory anything')}         ║
║                                       ║
╚═══════════════════════════════════════╝
  `;
  console.log(banner);
}

export function success(message: string): void {
  console.log(`${chalk.green('✔')} ${message}`);
}

/**
 * Error message, with an optional hint underneath.
 */
export function error(message: string, suggestion?: string): void {
  console.log(`${chalk.red('✖')} ${message}`);
  if (suggestion) {
    console.log(`  ${chalk.yellow('→')} ${chalk.dim(suggestion)}`);
  }
}

export function warn(message: string): void {
  console.log(`${chalk.yellow('⚠')} ${message}`);
}

export function spinner(text: string): ReturnType<typeof ora> {
  return ora({
    text,
    color: 'cyan',
    spinner: 'dots',
  }).start();
}

/**
 * Print a boxed message.
 */
export function box(message: string, title?: string, borderColor: string = 'cyan'): void {
  console.log(
    boxen(message, {
      padding: 1,
      margin: 1,
      borderStyle: 'round',
      borderColor,
      title,
      titleAlignment: 'center',
    })
  );
}

/**
 * Print code block.
 */
export function code(content: string, language?: string): void {
  const border = chalk.gray('─'.repeat(50));
  console.log(border);
  if (language) {
    console.log(chalk.gray(`# ${language}`));
  }
  console.log(chalk.cyan(content));
  console.log(border);
}

/**
 * Print a section header.
 */
export function section(title: string): void {
  console.log('');
  console.log(shopGradient(`▶ ${title}`));
  console.log(chalk.gray('─'.repeat(50)));
}

export function newline(): void {
  console.log('');
}

/**
 * Print rows of strings as a table.
 */
export function table(head: string[], rows: string[][]): void {
  const output = new Table({
    head: head.map((cell) => chalk.bold(cell)),
    style: { head: [], border: ['gray'] },
  });
  output.push(...rows);
  console.log(output.toString());
}

/**
 * Print a labelled value.
 */
export function row(label: string, value: string): void {
  console.log(`  ${chalk.bold(label)}: ${chalk.cyan(value)}`);
}
