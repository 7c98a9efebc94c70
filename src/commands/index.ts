import type { CommandModule } from '../types/command.js';
import { testsCommand } from './tests.js';

export const COMMANDS: readonly CommandModule[] = [testsCommand];
