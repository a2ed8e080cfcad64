import { Module } from '@nestjs/common';
import { PlexServerService } from './plex-server.service';
import { PlexWatchlistService } from './plex-watchlist.service';

@Module({
  providers: [PlexServerService, PlexWatchlistService],
  exports: [PlexServerService, PlexWatchlistService],
})
export class PlexModule {}
