import type { LoggerService, LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { MEDIA_BACKEND } from './app.constants';
import { SelectorConfigError } from './app.errors';
import type { MediaBackend } from './backends/media-backend';
import { DemotionSelector } from './selection/demotion.selector';
import { PromotionSelector } from './selection/promotion.selector';
import type { SelectorSettings } from './settings/selector-settings';

export type SelectorCommand = 'promote' | 'demote';

const COMMAND_ALIASES = new Map<string, SelectorCommand>([
  ['promote', 'promote'],
  ['warm', 'promote'],
  ['ondeck', 'promote'],
  ['demote', 'demote'],
  ['watched-back', 'demote'],
  ['move-back', 'demote'],
]);

export function parseCommand(argv: readonly string[]): SelectorCommand {
  const raw = argv[0]?.trim().toLowerCase() || 'promote';
  const command = COMMAND_ALIASES.get(raw);
  if (!command) {
    throw new SelectorConfigError(
      `Unknown command "${argv[0]}" (expected promote or demote)`,
    );
  }
  return command;
}

/**
 * One selection run inside a Nest application context. Paths are handed to
 * `write` one line at a time as they are decided, so a late failure keeps the
 * lines already written. The context (and with it the snapshot database) is
 * closed on every exit path.
 */
export async function runSelector(params: {
  command: SelectorCommand;
  settings: SelectorSettings;
  write: (line: string) => void;
  logger?: LoggerService | LogLevel[] | false;
  nowMs?: number;
}): Promise<string[]> {
  const { command, settings, write } = params;
  const app = await NestFactory.createApplicationContext(
    AppModule.forSettings(settings),
    { logger: params.logger ?? false, abortOnError: false },
  );

  try {
    const backend = app.get<MediaBackend>(MEDIA_BACKEND);
    await backend.connect();

    const sink = (path: string) => write(`${path}\n`);
    if (command === 'promote') {
      return await app.get(PromotionSelector).select(sink);
    }
    return await app.get(DemotionSelector).select(sink, params.nowMs);
  } finally {
    await app.close();
  }
}
