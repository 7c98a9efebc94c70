import { padAnsi, visibleWidth } from '../lib/tty/layout.js';
import type { CommandSpec, OptionSpec, ProgramSpec } from '../types/command.js';

export const HELP_INDENT = '    ';
export const OPTIONS_HEADER = 'Optional arguments:';
export const COMMANDS_HEADER = 'Available commands:';

/** Minimum gap between a flag token and its description. */
const COLUMN_GAP = 2;

export const HELP_OPTION: OptionSpec = Object.freeze({
  short: 'h',
  long: 'help',
  description: 'Show this message and exit',
});

interface HelpRow {
  label: string;
  text: string;
  width?: number;
}

/** An option is the help option when it owns `--help`; `-h` alone is not enough. */
export function isHelpOption(option: OptionSpec): boolean {
  return option.long === HELP_OPTION.long;
}

/**
 * Format the flag token for an option: `-h, --help`, `--debug` or `-v`.
 */
export function formatFlags(option: OptionSpec): string {
  const flags: string[] = [];
  if (option.short !== undefined) flags.push(`-${option.short}`);
  if (option.long !== undefined) flags.push(`--${option.long}`);
  return flags.join(', ');
}

function formatRows(rows: HelpRow[]): string[] {
  const alignedWidth = Math.max(0, ...rows.map((row) => visibleWidth(row.label))) + COLUMN_GAP;

  return rows.map((row) => {
    const width = Math.max(row.width ?? alignedWidth, visibleWidth(row.label) + COLUMN_GAP);
    return `${HELP_INDENT}${padAnsi(row.label, width)}${row.text}`;
  });
}

function joinSections(sections: string[][]): string {
  return `${sections.map((lines) => lines.join('\n')).join('\n\n')}\n`;
}

/**
 * Render the help block for a single command.
 *
 * Output depends on nothing but the spec: no terminal width, colour or locale.
 */
export function renderHelp(spec: CommandSpec): string {
  const sections: string[][] = [[spec.usage], [spec.description]];

  if (spec.options.length > 0) {
    const rows = spec.options.map((option) => ({
      label: formatFlags(option),
      text: option.description,
      width: option.width,
    }));
    sections.push([OPTIONS_HEADER, ...formatRows(rows)]);
  }

  return joinSections(sections);
}

export function formatProgramUsage(program: ProgramSpec): string {
  return `${program.name} <command> [options]`;
}

/**
 * Render top-level help listing every registered command.
 */
export function renderProgramHelp(program: ProgramSpec, commands: readonly CommandSpec[]): string {
  const sections: string[][] = [[formatProgramUsage(program)], [program.description]];

  const sorted = [...commands].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  if (sorted.length > 0) {
    sections.push([
      COMMANDS_HEADER,
      ...formatRows(sorted.map((command) => ({ label: command.name, text: command.description }))),
    ]);
  }

  sections.push([
    OPTIONS_HEADER,
    ...formatRows([{ label: formatFlags(HELP_OPTION), text: HELP_OPTION.description }]),
  ]);

  return joinSections(sections);
}
