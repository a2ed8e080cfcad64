import { ConsoleLogger, type LogLevel } from '@nestjs/common';
import type { SelectorLogLevel } from '../settings/selector-settings';

const LEVELS: Record<SelectorLogLevel, LogLevel[]> = {
  error: ['fatal', 'error'],
  warn: ['fatal', 'error', 'warn'],
  info: ['fatal', 'error', 'warn', 'log'],
  debug: ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'],
};

export function toNestLogLevels(level: SelectorLogLevel): LogLevel[] {
  return LEVELS[level];
}

/** stdout belongs to the path list the mover reads; every log line goes to stderr. */
export class StderrLogger extends ConsoleLogger {
  protected override printMessages(
    messages: unknown[],
    context?: string,
    logLevel?: LogLevel,
  ): void {
    super.printMessages(messages, context, logLevel, 'stderr');
  }
}
