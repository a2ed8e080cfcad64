import { Module } from '@nestjs/common';
import { BackendsModule } from '../backends/backends.module';
import { PathTranslator } from '../paths/path-translator';
import { ContinueWatchingResolver } from './continue-watching.resolver';
import { DemotionSelector } from './demotion.selector';
import { PromotionSelector } from './promotion.selector';

@Module({
  imports: [BackendsModule],
  providers: [
    PathTranslator,
    ContinueWatchingResolver,
    PromotionSelector,
    DemotionSelector,
  ],
  exports: [PromotionSelector, DemotionSelector, BackendsModule],
})
export class SelectionModule {}
