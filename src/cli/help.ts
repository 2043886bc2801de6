import chalk from 'chalk';
import type { Command } from 'commander';

const EXAMPLES = [
  'taxon-loader --database my_database --table taxon_col Taxon.tsv',
  'taxon-loader -d my_database -m -t merged_table',
];

/**
 * Usage screen in the same layout as the rest of the tooling:
 * bold headings, cyan flags, dimmed descriptions.
 */
export function renderHelp(command: Command): string {
  const helper = command.createHelp();

  let help = `${chalk.bold('Usage:')} ${chalk.blue(
    `${command.name()} ${command.usage()}`
  )}\n\n`;

  if (command.description()) {
    help += `${command.description()}\n\n`;
  }

  const args = helper.visibleArguments(command);
  if (args.length > 0) {
    help += `${chalk.bold('Arguments')}:\n`;
    for (const argument of args) {
      help += `  ${chalk.cyan(helper.argumentTerm(argument).padEnd(24))} ${chalk.dim(
        helper.argumentDescription(argument)
      )}\n`;
    }
    help += '\n';
  }

  const options = helper.visibleOptions(command);
  if (options.length > 0) {
    help += `${chalk.bold('Options')}:\n`;
    for (const option of options) {
      help += `  ${chalk.cyan(helper.optionTerm(option).padEnd(24))} ${chalk.dim(
        helper.optionDescription(option)
      )}\n`;
    }
    help += '\n';
  }

  help += `${chalk.bold('Examples')}:\n`;
  for (const example of EXAMPLES) {
    help += `  ${chalk.green(example)}\n`;
  }

  return help;
}
