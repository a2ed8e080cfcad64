import {
  EXIT_CONFIG,
  EXIT_CONNECTION,
  EXIT_UNEXPECTED,
} from './app.constants';

export abstract class SelectorFatalError extends Error {
  abstract readonly exitCode: number;
}

/** Required configuration is absent/invalid, or the snapshot database is missing. */
export class SelectorConfigError extends SelectorFatalError {
  readonly exitCode = EXIT_CONFIG;

  constructor(message: string) {
    super(message);
    this.name = 'SelectorConfigError';
  }
}

/** The media server (or its snapshot database) could not be reached. */
export class SelectorConnectionError extends SelectorFatalError {
  readonly exitCode = EXIT_CONNECTION;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SelectorConnectionError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function exitCodeForError(err: unknown): number {
  return err instanceof SelectorFatalError ? err.exitCode : EXIT_UNEXPECTED;
}
