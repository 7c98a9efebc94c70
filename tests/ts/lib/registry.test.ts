import { describe, expect, it } from 'vitest';
import { CommandRegistry, createRegistry, parseCommandSpec } from '../../../src/cli/registry.js';
import {
  DuplicateCommandError,
  InvalidCommandSpecError,
  RegistrySealedError,
  UnknownCommandError,
} from '../../../src/cli/errors.js';
import { testsCommand } from '../../../src/commands/tests.js';
import type { CommandSpec } from '../../../src/types/command.js';

const lintSpec: CommandSpec = {
  name: 'lint',
  usage: 'improver lint [--fix]',
  description: 'Check code style.',
  options: [{ long: 'fix', description: 'Rewrite files in place' }],
};

describe('CommandRegistry', () => {
  it('returns an equal spec after registration', () => {
    const registry = new CommandRegistry().register(testsCommand.spec);

    expect(registry.lookup('tests')).toEqual(testsCommand.spec);
  });

  it('preserves option declaration order', () => {
    const spec: CommandSpec = {
      name: 'ordered',
      usage: 'improver ordered',
      description: 'Ordering check.',
      options: [
        { long: 'zeta', description: 'Last alphabetically' },
        { short: 'a', description: 'Short only' },
        { long: 'middle', description: 'In between' },
      ],
    };
    const registry = new CommandRegistry().register(spec);

    expect(registry.lookup('ordered').options.map((option) => option.description)).toEqual([
      'Last alphabetically',
      'Short only',
      'In between',
    ]);
  });

  it('stores a frozen copy detached from the caller', () => {
    const options = [{ long: 'fix', description: 'Rewrite files in place' }];
    const registry = new CommandRegistry().register({ ...lintSpec, options });
    options.push({ long: 'late', description: 'Added after registration' });

    const stored = registry.lookup('lint');
    expect(stored.options).toHaveLength(1);
    expect(Object.isFrozen(stored)).toBe(true);
    expect(Object.isFrozen(stored.options)).toBe(true);
  });

  it('rejects a duplicate name', () => {
    const registry = new CommandRegistry().register(lintSpec);

    expect(() => registry.register({ ...lintSpec, usage: 'improver lint' })).toThrow(DuplicateCommandError);
    expect(registry.lookup('lint').usage).toBe('improver lint [--fix]');
  });

  it('throws UnknownCommandError with the known names', () => {
    const registry = createRegistry([testsCommand.spec, lintSpec]);

    try {
      registry.lookup('bogus');
      expect.fail('lookup should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(UnknownCommandError);
      if (err instanceof UnknownCommandError) {
        expect(err.commandName).toBe('bogus');
        expect(err.knownCommands).toEqual(['lint', 'tests']);
      }
    }
  });

  it('lists commands sorted by name regardless of registration order', () => {
    const registry = createRegistry([testsCommand.spec, lintSpec]);

    expect(registry.names()).toEqual(['lint', 'tests']);
    expect(registry.list().map((spec) => spec.name)).toEqual(['lint', 'tests']);
    expect(registry.has('lint')).toBe(true);
    expect(registry.has('bogus')).toBe(false);
  });

  it('refuses registration once sealed', () => {
    const registry = createRegistry([testsCommand.spec]);

    expect(registry.isSealed).toBe(true);
    expect(() => registry.register(lintSpec)).toThrow(RegistrySealedError);
    expect(registry.has('lint')).toBe(false);
  });
});

describe('parseCommandSpec', () => {
  it('rejects an option without flags', () => {
    const spec: CommandSpec = { ...lintSpec, options: [{ description: 'Nothing to type' }] };

    expect(() => parseCommandSpec(spec)).toThrow(
      'Invalid command spec "lint": options.0: option needs a short or a long flag'
    );
  });

  it('rejects a multi-character short flag and an empty description', () => {
    const spec: CommandSpec = { ...lintSpec, options: [{ short: 'fx', description: '' }] };

    try {
      parseCommandSpec(spec);
      expect.fail('parseCommandSpec should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidCommandSpecError);
      if (err instanceof InvalidCommandSpecError) {
        expect(err.issues).toEqual([
          'options.0.short: short flag must be a single letter or digit',
          'options.0.description: option description must not be empty',
        ]);
      }
    }
  });

  it('rejects a flag declared twice in one command', () => {
    const spec: CommandSpec = {
      ...lintSpec,
      options: [
        { long: 'fix', description: 'Rewrite files in place' },
        { short: 'f', long: 'fix', description: 'Again' },
      ],
    };

    expect(() => parseCommandSpec(spec)).toThrow('options.1: flag --fix is declared more than once');
  });

  it('reserves -h for the help option', () => {
    const spec: CommandSpec = { ...lintSpec, options: [{ short: 'h', long: 'host', description: 'Bind host' }] };

    expect(() => parseCommandSpec(spec)).toThrow('options.0.short: -h is reserved for --help');
  });

  it('rejects --help paired with another short flag', () => {
    const spec: CommandSpec = { ...lintSpec, options: [{ short: 'x', long: 'help', description: 'Explain' }] };

    expect(() => parseCommandSpec(spec)).toThrow('options.0.long: --help can only be paired with -h, not -x');
  });

  it('accepts -h on its own row with --help', () => {
    const spec: CommandSpec = {
      ...lintSpec,
      options: [{ short: 'h', long: 'help', description: 'Show this message and exit' }],
    };

    expect(parseCommandSpec(spec)).toEqual(spec);
  });

  it('rejects names that are not lowercase words', () => {
    expect(() => parseCommandSpec({ ...lintSpec, name: 'Lint' })).toThrow(
      'name: command name must be lowercase words joined by hyphens'
    );
  });

  it('drops keys the spec does not define', () => {
    const extended = { ...lintSpec, hidden: true };

    expect(parseCommandSpec(extended)).toEqual(lintSpec);
  });
});
