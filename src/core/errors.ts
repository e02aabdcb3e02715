/**
 * Base class for errors raised by the bootstrap tool itself.
 * Step failures are not errors: they come back as StepOutcome values.
 */
export class BootstrapError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The configuration file could not be read or failed validation.
 */
export class ConfigError extends BootstrapError {
  readonly configPath: string;

  constructor(configPath: string, message: string) {
    super(`${configPath}: ${message}`);
    this.configPath = configPath;
  }
}

/**
 * The sequencer was misused: an empty sequence, or a second run.
 */
export class SequenceError extends BootstrapError {}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
