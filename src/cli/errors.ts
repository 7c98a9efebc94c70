export class InvalidCommandSpecError extends Error {
  readonly commandName: string;
  readonly issues: string[];

  constructor(commandName: string, issues: string[]) {
    super(`Invalid command spec "${commandName}": ${issues.join('; ')}`);
    this.name = 'InvalidCommandSpecError';
    this.commandName = commandName;
    this.issues = issues;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InvalidCommandSpecError);
    }
  }
}

export class DuplicateCommandError extends Error {
  readonly commandName: string;

  constructor(commandName: string) {
    super(`Command "${commandName}" is already registered`);
    this.name = 'DuplicateCommandError';
    this.commandName = commandName;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DuplicateCommandError);
    }
  }
}

export class UnknownCommandError extends Error {
  readonly commandName: string;
  readonly knownCommands: string[];

  constructor(commandName: string, knownCommands: string[]) {
    super(`Unknown command "${commandName}"`);
    this.name = 'UnknownCommandError';
    this.commandName = commandName;
    this.knownCommands = knownCommands;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UnknownCommandError);
    }
  }
}

export class RegistrySealedError extends Error {
  readonly commandName: string;

  constructor(commandName: string) {
    super(`Cannot register "${commandName}": the command registry is sealed`);
    this.name = 'RegistrySealedError';
    this.commandName = commandName;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RegistrySealedError);
    }
  }
}
