export interface LineDifference {
  /** 1-based. */
  line: number;
  /** `undefined` when the text ends before this line. */
  expected: string | undefined;
  actual: string | undefined;
}

export interface RenderMismatch {
  expectedExitCode: number;
  actualExitCode: number;
  expectedStdout: string;
  actualStdout: string;
  firstDifference: LineDifference | null;
}

/**
 * Golden text or exit code did not match what the CLI produced.
 */
export class RenderMismatchError extends Error {
  readonly mismatch: RenderMismatch;

  constructor(message: string, mismatch: RenderMismatch) {
    super(message);
    this.name = 'RenderMismatchError';
    this.mismatch = mismatch;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RenderMismatchError);
    }
  }

  get firstDifference(): LineDifference | null {
    return this.mismatch.firstDifference;
  }
}

export class HarnessTimeoutError extends Error {
  readonly argv: readonly string[];
  readonly timeoutMs: number;
  readonly stdout: string;
  readonly stderr: string;

  constructor(argv: readonly string[], timeoutMs: number, stdout: string, stderr: string) {
    super(`CLI did not exit within ${timeoutMs}ms (argv: ${JSON.stringify(argv)})`);
    this.name = 'HarnessTimeoutError';
    this.argv = argv;
    this.timeoutMs = timeoutMs;
    this.stdout = stdout;
    this.stderr = stderr;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HarnessTimeoutError);
    }
  }
}

export class HarnessSpawnError extends Error {
  readonly command: string;

  constructor(command: string, cause: Error) {
    super(`Failed to start ${command}: ${cause.message}`, { cause });
    this.name = 'HarnessSpawnError';
    this.command = command;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HarnessSpawnError);
    }
  }
}

export class InvocationStateError extends Error {
  constructor(state: string) {
    super(`Invocation has already been started (state: ${state})`);
    this.name = 'InvocationStateError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InvocationStateError);
    }
  }
}
