import chalk from 'chalk';

export const ExitCodes = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE_ERROR: 2,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Destination for everything a command prints.
 *
 * The executable wires this to the process streams; tests and the
 * in-process dispatcher collect into strings instead.
 */
export interface OutputSink {
  writeOut(text: string): void;
  writeErr(text: string): void;
}

export interface BufferedOutput extends OutputSink {
  contents(): { stdout: string; stderr: string };
}

export function createBufferedOutput(): BufferedOutput {
  let stdout = '';
  let stderr = '';

  return {
    writeOut(text) {
      stdout += text;
    },
    writeErr(text) {
      stderr += text;
    },
    contents() {
      return { stdout, stderr };
    },
  };
}

export const processOutput: OutputSink = {
  writeOut(text) {
    process.stdout.write(text);
  },
  writeErr(text) {
    process.stderr.write(text);
  },
};

/**
 * Print an error message.
 */
export function printError(output: OutputSink, message: string): void {
  output.writeErr(`${chalk.red(message)}\n`);
}

/**
 * Print an info message.
 */
export function printInfo(output: OutputSink, message: string): void {
  output.writeOut(`${chalk.cyan(message)}\n`);
}
