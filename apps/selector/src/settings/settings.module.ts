import { DynamicModule, Global, Module } from '@nestjs/common';
import { SELECTOR_SETTINGS } from '../app.constants';
import type { SelectorSettings } from './selector-settings';

@Global()
@Module({})
export class SettingsModule {
  static forRoot(settings: SelectorSettings): DynamicModule {
    return {
      module: SettingsModule,
      providers: [{ provide: SELECTOR_SETTINGS, useValue: settings }],
      exports: [SELECTOR_SETTINGS],
    };
  }
}
