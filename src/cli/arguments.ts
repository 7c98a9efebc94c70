import { Command } from 'commander';
import chalk from 'chalk';
import type { OutputSink } from '../lib/output.js';
import type { CommandSpec } from '../types/command.js';
import { formatFlags, isHelpOption } from './help.js';

/**
 * Build a commander parser for a command's declared flags.
 *
 * Help handling is left to the dispatcher, so commander's own help option is
 * turned off and the spec's `--help` entry is skipped. Parse errors
 * surface as a thrown CommanderError instead of exiting the process.
 */
export function buildParser(spec: CommandSpec, output: OutputSink): Command {
  const command = new Command(spec.name)
    .helpOption(false)
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => output.writeOut(text),
      writeErr: (text) => output.writeErr(text),
      outputError: (text, write) => write(chalk.red(text)),
    });

  for (const option of spec.options) {
    if (isHelpOption(option)) continue;
    command.option(formatFlags(option), option.description);
  }

  return command;
}

/**
 * Parse `args` (everything after the command name) into boolean flag values.
 */
export function parseCommandOptions(
  spec: CommandSpec,
  args: readonly string[],
  output: OutputSink
): Record<string, boolean> {
  const command = buildParser(spec, output);
  // An action makes commander check unknown options and excess operands.
  command.action(() => undefined);
  command.parse([...args], { from: 'user' });

  const options: Record<string, boolean> = {};
  for (const [key, value] of Object.entries(command.opts())) {
    if (typeof value === 'boolean') {
      options[key] = value;
    }
  }
  return options;
}
