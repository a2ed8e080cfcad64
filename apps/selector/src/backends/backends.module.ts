import { Module } from '@nestjs/common';
import { MEDIA_BACKEND, SELECTOR_SETTINGS } from '../app.constants';
import { PlexModule } from '../plex/plex.module';
import type { SelectorSettings } from '../settings/selector-settings';
import type { MediaBackend } from './media-backend';
import { PlexApiBackend } from './plex-api.backend';
import { PlexDbBackend } from './plex-db.backend';

@Module({
  imports: [PlexModule],
  providers: [
    PlexApiBackend,
    PlexDbBackend,
    {
      provide: MEDIA_BACKEND,
      inject: [SELECTOR_SETTINGS, PlexApiBackend, PlexDbBackend],
      useFactory: (
        settings: SelectorSettings,
        api: PlexApiBackend,
        db: PlexDbBackend,
      ): MediaBackend => (settings.backend === 'sqlite' ? db : api),
    },
  ],
  exports: [MEDIA_BACKEND],
})
export class BackendsModule {}
