import { ExitCodes, printInfo } from '../lib/output.js';
import type { CommandModule } from '../types/command.js';

export const TEST_SUITES = ['pep8', 'pylint', 'unit', 'cli'] as const;

export const testsCommand: CommandModule = {
  // Column widths reproduce the published help text exactly.
  spec: {
    name: 'tests',
    usage: 'improver tests [--debug]',
    description: 'Run pep8, pylint, unit and CLI acceptance tests.',
    options: [
      {
        long: 'debug',
        description: 'Run in verbose mode (may take longer for CLI)',
        width: 16,
      },
      // Declared here rather than appended by the dispatcher so it can pin column 20.
      {
        short: 'h',
        long: 'help',
        description: 'Show this message and exit',
        width: 20,
      },
    ],
  },
  action: ({ options, output }) => {
    if (options.debug === true) {
      printInfo(output, 'Verbose mode enabled (CLI acceptance tests may take longer)');
    }
    output.writeOut(`Test suites: ${TEST_SUITES.join(', ')}\n`);
    return ExitCodes.SUCCESS;
  },
};
