import { CommandSpecSchema } from '../types/command.js';
import type { CommandSpec } from '../types/command.js';
import {
  DuplicateCommandError,
  InvalidCommandSpecError,
  RegistrySealedError,
  UnknownCommandError,
} from './errors.js';

/**
 * Validate a command spec and return a frozen copy of it.
 */
export function parseCommandSpec(spec: CommandSpec): CommandSpec {
  const result = CommandSpecSchema.safeParse(spec);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '<root>';
      return `${path}: ${issue.message}`;
    });
    throw new InvalidCommandSpecError(typeof spec.name === 'string' ? spec.name : '<unnamed>', issues);
  }

  const parsed = result.data;
  return Object.freeze({
    ...parsed,
    options: Object.freeze(parsed.options.map((option) => Object.freeze({ ...option }))),
  });
}

/**
 * Name -> help spec for every command the CLI knows.
 *
 * Filled once at start-up, then sealed; lookups never mutate.
 */
export class CommandRegistry {
  private readonly commands = new Map<string, CommandSpec>();
  private sealed = false;

  get isSealed(): boolean {
    return this.sealed;
  }

  register(spec: CommandSpec): this {
    if (this.sealed) {
      throw new RegistrySealedError(spec.name);
    }

    const parsed = parseCommandSpec(spec);
    if (this.commands.has(parsed.name)) {
      throw new DuplicateCommandError(parsed.name);
    }

    this.commands.set(parsed.name, parsed);
    return this;
  }

  lookup(name: string): CommandSpec {
    const spec = this.commands.get(name);
    if (!spec) {
      throw new UnknownCommandError(name, this.names());
    }
    return spec;
  }

  has(name: string): boolean {
    return this.commands.has(name);
  }

  names(): string[] {
    return [...this.commands.keys()].sort();
  }

  list(): CommandSpec[] {
    return this.names().map((name) => this.lookup(name));
  }

  seal(): this {
    this.sealed = true;
    return this;
  }
}

export function createRegistry(specs: Iterable<CommandSpec>): CommandRegistry {
  const registry = new CommandRegistry();
  for (const spec of specs) {
    registry.register(spec);
  }
  return registry.seal();
}
