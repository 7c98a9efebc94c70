import { COMMANDS } from '../commands/index.js';
import type { CommandAction, CommandModule, ProgramSpec } from '../types/command.js';
import { Dispatcher } from './dispatcher.js';
import { createRegistry } from './registry.js';

export const PROGRAM: ProgramSpec = {
  name: 'improver',
  description: 'Developer entry point for improver checks and tools.',
};

export function createCli(commands: readonly CommandModule[] = COMMANDS): Dispatcher {
  const registry = createRegistry(commands.map((command) => command.spec));
  const actions = new Map<string, CommandAction>(
    commands.map((command): [string, CommandAction] => [command.spec.name, command.action])
  );

  return new Dispatcher({ program: PROGRAM, registry, actions });
}
