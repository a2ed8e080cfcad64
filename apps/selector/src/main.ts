#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { EXIT_OK } from './app.constants';
import {
  SelectorFatalError,
  errorMessage,
  exitCodeForError,
} from './app.errors';
import { applyTlsPolicy, ensureBootstrapEnv } from './bootstrap-env';
import { StderrLogger, toNestLogLevels } from './logs/stderr-logger';
import { parseCommand, runSelector } from './selector.runner';
import { loadSelectorSettings } from './settings/selector-settings';

async function bootstrap(): Promise<number> {
  const stderrLogger = new StderrLogger('Selector', {
    logLevels: toNestLogLevels('info'),
  });
  Logger.overrideLogger(stderrLogger);
  const logger = new Logger('Selector');

  try {
    ensureBootstrapEnv();
    const command = parseCommand(process.argv.slice(2));
    const settings = loadSelectorSettings(process.env);
    stderrLogger.setLogLevels(toNestLogLevels(settings.logLevel));
    applyTlsPolicy(settings);

    logger.log(
      `${command} via ${settings.backend} (array=${settings.paths.arrayRoot} cache=${settings.paths.cacheRoot})`,
    );

    await runSelector({
      command,
      settings,
      write: (line) => process.stdout.write(line),
      logger: stderrLogger,
    });
    return EXIT_OK;
  } catch (err) {
    if (err instanceof SelectorFatalError) {
      logger.error(err.message);
    } else {
      logger.error(
        errorMessage(err),
        err instanceof Error ? err.stack : undefined,
      );
    }
    return exitCodeForError(err);
  }
}

void bootstrap().then((code) => {
  process.exitCode = code;
});
