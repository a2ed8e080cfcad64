import { DynamicModule, Module } from '@nestjs/common';
import { SelectionModule } from './selection/selection.module';
import type { SelectorSettings } from './settings/selector-settings';
import { SettingsModule } from './settings/settings.module';

@Module({})
export class AppModule {
  static forSettings(settings: SelectorSettings): DynamicModule {
    return {
      module: AppModule,
      imports: [SettingsModule.forRoot(settings), SelectionModule],
    };
  }
}
