import { CommanderError } from 'commander';
import { createBufferedOutput, ExitCodes, printError } from '../lib/output.js';
import type { ExitCode, OutputSink } from '../lib/output.js';
import type { CommandAction, CommandSpec, ProgramSpec } from '../types/command.js';
import { parseCommandOptions } from './arguments.js';
import { UnknownCommandError } from './errors.js';
import { HELP_OPTION, isHelpOption, renderHelp, renderProgramHelp } from './help.js';
import type { CommandRegistry } from './registry.js';

export const HELP_FLAGS: readonly string[] = ['-h', '--help'];

export interface DispatchResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface DispatcherOptions {
  program: ProgramSpec;
  registry: CommandRegistry;
  actions?: ReadonlyMap<string, CommandAction>;
  /** Defaults to {@link renderHelp}. */
  render?: (spec: CommandSpec) => string;
}

export function isHelpRequested(args: readonly string[]): boolean {
  return args.some((arg) => HELP_FLAGS.includes(arg));
}

/**
 * Append the built-in `-h, --help` row unless the spec declares its own.
 */
export function withHelpOption(spec: CommandSpec): CommandSpec {
  if (spec.options.some(isHelpOption)) {
    return spec;
  }
  return { ...spec, options: [...spec.options, HELP_OPTION] };
}

export class Dispatcher {
  private readonly program: ProgramSpec;
  private readonly registry: CommandRegistry;
  private readonly actions: ReadonlyMap<string, CommandAction>;
  private readonly render: (spec: CommandSpec) => string;

  constructor(options: DispatcherOptions) {
    this.program = options.program;
    this.registry = options.registry;
    this.actions = options.actions ?? new Map();
    this.render = options.render ?? renderHelp;
  }

  /**
   * Run `argv` and collect everything written into strings.
   */
  async dispatch(argv: readonly string[]): Promise<DispatchResult> {
    const output = createBufferedOutput();
    const exitCode = await this.run(argv, output);
    return { exitCode, ...output.contents() };
  }

  /**
   * Run `argv`, streaming output to `output`, and return the exit code.
   */
  async run(argv: readonly string[], output: OutputSink): Promise<ExitCode> {
    const [commandName, ...args] = argv;

    if (commandName === undefined) {
      this.usageError(output, 'missing command');
      return ExitCodes.USAGE_ERROR;
    }

    if (HELP_FLAGS.includes(commandName)) {
      output.writeOut(renderProgramHelp(this.program, this.registry.list()));
      return ExitCodes.SUCCESS;
    }

    let spec: CommandSpec;
    try {
      spec = this.registry.lookup(commandName);
    } catch (err) {
      if (err instanceof UnknownCommandError) {
        this.usageError(output, `unknown command '${err.commandName}'`);
        return ExitCodes.USAGE_ERROR;
      }
      throw err;
    }

    // Help wins over every other argument, valid or not.
    if (isHelpRequested(args)) {
      output.writeOut(this.render(withHelpOption(spec)));
      return ExitCodes.SUCCESS;
    }

    return this.execute(spec, args, output);
  }

  private async execute(spec: CommandSpec, args: readonly string[], output: OutputSink): Promise<ExitCode> {
    const action = this.actions.get(spec.name);
    if (!action) {
      printError(output, `${this.program.name}: command '${spec.name}' has no handler`);
      return ExitCodes.FAILURE;
    }

    let options: Record<string, boolean>;
    try {
      options = parseCommandOptions(spec, args, output);
    } catch (err) {
      if (err instanceof CommanderError) {
        return ExitCodes.USAGE_ERROR;
      }
      throw err;
    }

    const exitCode = await action({ options, output });
    return exitCode ?? ExitCodes.SUCCESS;
  }

  private usageError(output: OutputSink, message: string): void {
    printError(output, `${this.program.name}: ${message}`);
    output.writeErr(`Run '${this.program.name} --help' for available commands.\n`);
  }
}
