import { spawn } from 'node:child_process';
import { constants } from 'node:os';
import { HarnessSpawnError, HarnessTimeoutError, InvocationStateError } from './errors.js';

export type InvocationState = 'not_run' | 'running' | 'completed' | 'timed_out';

export interface InvocationResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * How to start the CLI: `command` is run with `args` followed by the
 * invocation's own argv (e.g. `tsx src/index.ts tests -h`).
 */
export interface CliEntrypoint {
  command: string;
  args: readonly string[];
}

export interface InvocationOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  stdin?: string;
  /** Kill the child and fail after this many milliseconds. */
  timeoutMs?: number;
  trimOutput?: boolean;
}

function buildChildEnv(overrides: NodeJS.ProcessEnv = {}): Record<string, string> {
  const childEnv: Record<string, string> = Object.fromEntries(
    Object.entries(process.env).filter(
      (entry): entry is [string, string] => entry[0] !== 'FORCE_COLOR' && typeof entry[1] === 'string'
    )
  );

  for (const [key, value] of Object.entries(overrides)) {
    if (typeof value === 'string') {
      childEnv[key] = value;
    }
  }

  if (childEnv['NO_COLOR'] === undefined) {
    childEnv['NO_COLOR'] = '1';
  }

  return childEnv;
}

function exitCodeFor(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  for (const [name, value] of Object.entries(constants.signals)) {
    if (name === signal && typeof value === 'number') return 128 + value;
  }
  return 1;
}

/**
 * One run of the CLI in its own process.
 *
 * Single use: not_run -> running -> completed | timed_out.
 */
export class CliInvocation {
  private currentState: InvocationState = 'not_run';

  constructor(
    private readonly entrypoint: CliEntrypoint,
    private readonly argv: readonly string[],
    private readonly options: InvocationOptions = {}
  ) {}

  get state(): InvocationState {
    return this.currentState;
  }

  run(): Promise<InvocationResult> {
    if (this.currentState !== 'not_run') {
      return Promise.reject(new InvocationStateError(this.currentState));
    }
    this.currentState = 'running';

    const { cwd, env, stdin, timeoutMs, trimOutput = false } = this.options;
    const { command } = this.entrypoint;

    return new Promise((resolve, reject) => {
      let settled = false;
      let stdout = '';
      let stderr = '';
      let timer: NodeJS.Timeout | undefined;

      const proc = spawn(command, [...this.entrypoint.args, ...this.argv], {
        cwd,
        env: buildChildEnv(env),
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      const finish = (outcome: () => void) => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        outcome();
      };

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          finish(() => {
            this.currentState = 'timed_out';
            proc.kill('SIGKILL');
            reject(new HarnessTimeoutError(this.argv, timeoutMs, stdout, stderr));
          });
        }, timeoutMs);
      }

      proc.stdout.setEncoding('utf8');
      proc.stderr.setEncoding('utf8');

      proc.stdout.on('data', (chunk: string) => {
        stdout += chunk;
      });

      proc.stderr.on('data', (chunk: string) => {
        stderr += chunk;
      });

      // The child may exit before reading stdin.
      proc.stdin.on('error', () => undefined);
      if (stdin !== undefined) {
        proc.stdin.write(stdin);
      }
      proc.stdin.end();

      proc.on('error', (error) => {
        finish(() => {
          this.currentState = 'completed';
          reject(new HarnessSpawnError(command, error));
        });
      });

      proc.on('close', (code, signal) => {
        finish(() => {
          this.currentState = 'completed';
          resolve({
            exitCode: exitCodeFor(code, signal),
            stdout: trimOutput ? stdout.trim() : stdout,
            stderr: trimOutput ? stderr.trim() : stderr,
          });
        });
      });
    });
  }
}

export function runCli(
  entrypoint: CliEntrypoint,
  argv: readonly string[],
  options: InvocationOptions = {}
): Promise<InvocationResult> {
  return new CliInvocation(entrypoint, argv, options).run();
}
