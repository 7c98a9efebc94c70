import { z } from 'zod';
import type { ExitCode, OutputSink } from '../lib/output.js';

/**
 * One row of a command's "Optional arguments:" section.
 *
 * Flags are written without their leading dashes (`short: 'h'`, `long: 'help'`).
 */
export interface OptionSpec {
  readonly short?: string;
  readonly long?: string;
  readonly description: string;
  /**
   * Column at which the description starts, counted from the end of the
   * row indent. Rows without a width are aligned to the widest flag token.
   */
  readonly width?: number;
}

export interface CommandSpec {
  readonly name: string;
  readonly usage: string;
  readonly description: string;
  /** Render order. */
  readonly options: readonly OptionSpec[];
}

export interface ProgramSpec {
  readonly name: string;
  readonly description: string;
}

export interface CommandContext {
  /** Boolean flag values keyed by commander's attribute name (`--dry-run` -> `dryRun`). */
  options: Record<string, boolean>;
  output: OutputSink;
}

export type CommandAction = (
  context: CommandContext
) => ExitCode | undefined | Promise<ExitCode | undefined>;

export interface CommandModule {
  spec: CommandSpec;
  action: CommandAction;
}

const COMMAND_NAME_PATTERN = /^[a-z][a-z0-9-]*$/;
const SHORT_FLAG_PATTERN = /^[A-Za-z0-9]$/;
const LONG_FLAG_PATTERN = /^[A-Za-z0-9][A-Za-z0-9-]*$/;

export const OptionSpecSchema = z
  .object({
    short: z.string().regex(SHORT_FLAG_PATTERN, 'short flag must be a single letter or digit').optional(),
    long: z.string().regex(LONG_FLAG_PATTERN, 'long flag must be words joined by hyphens, without leading dashes').optional(),
    description: z.string().min(1, 'option description must not be empty'),
    width: z.number().int().positive().optional(),
  })
  .refine((option) => option.short !== undefined || option.long !== undefined, {
    message: 'option needs a short or a long flag',
  });

export const CommandSpecSchema: z.ZodType<CommandSpec> = z
  .object({
    name: z.string().regex(COMMAND_NAME_PATTERN, 'command name must be lowercase words joined by hyphens'),
    usage: z.string().min(1, 'usage must not be empty'),
    description: z.string().min(1, 'description must not be empty'),
    options: z.array(OptionSpecSchema),
  })
  .superRefine((spec, ctx) => {
    const seen = new Set<string>();
    spec.options.forEach((option, index) => {
      // -h and --help belong to the help option and may only appear together.
      if (option.short === 'h' && option.long !== 'help') {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['options', index, 'short'],
          message: '-h is reserved for --help',
        });
      }
      if (option.long === 'help' && option.short !== undefined && option.short !== 'h') {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['options', index, 'long'],
          message: `--help can only be paired with -h, not -${option.short}`,
        });
      }

      const flags = [
        option.short !== undefined ? `-${option.short}` : null,
        option.long !== undefined ? `--${option.long}` : null,
      ].filter((flag): flag is string => flag !== null);

      for (const flag of flags) {
        if (seen.has(flag)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['options', index],
            message: `flag ${flag} is declared more than once`,
          });
        }
        seen.add(flag);
      }
    });
  });
