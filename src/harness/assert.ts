import { RenderMismatchError } from './errors.js';
import type { LineDifference } from './errors.js';
import type { InvocationResult } from './invocation.js';

/**
 * Locate the first line where two texts differ, or null when equal.
 *
 * Lines are split on `\n` only, so a stray `\r` or a missing final newline
 * shows up as a difference.
 */
export function findFirstDifference(expected: string, actual: string): LineDifference | null {
  if (expected === actual) return null;

  const expectedLines = expected.split('\n');
  const actualLines = actual.split('\n');
  const count = Math.max(expectedLines.length, actualLines.length);

  for (let i = 0; i < count; i += 1) {
    if (expectedLines[i] !== actualLines[i]) {
      return { line: i + 1, expected: expectedLines[i], actual: actualLines[i] };
    }
  }

  return null;
}

function quoteLine(line: string | undefined): string {
  return line === undefined ? '<end of output>' : JSON.stringify(line);
}

export function formatDifference(difference: LineDifference): string {
  return `first difference at line ${difference.line}: expected ${quoteLine(difference.expected)}, got ${quoteLine(difference.actual)}`;
}

/**
 * Fail unless the CLI exited with `expectedExit` and printed exactly `expectedStdout`.
 */
export function assertExact(actual: InvocationResult, expectedExit: number, expectedStdout: string): void {
  const exitMatches = actual.exitCode === expectedExit;
  const stdoutMatches = actual.stdout === expectedStdout;
  if (exitMatches && stdoutMatches) return;

  const firstDifference = findFirstDifference(expectedStdout, actual.stdout);
  const lines = ['CLI output did not match the golden text'];

  if (!exitMatches) {
    lines.push(`exit code: expected ${expectedExit}, got ${actual.exitCode}`);
  }
  if (firstDifference) {
    lines.push(formatDifference(firstDifference));
  }
  lines.push('--- expected stdout', expectedStdout, '--- actual stdout', actual.stdout);
  if (actual.stderr) {
    lines.push('--- stderr', actual.stderr);
  }

  throw new RenderMismatchError(lines.join('\n'), {
    expectedExitCode: expectedExit,
    actualExitCode: actual.exitCode,
    expectedStdout,
    actualStdout: actual.stdout,
    firstDifference,
  });
}
