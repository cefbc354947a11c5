import { Module } from '@nestjs/common';
import { OverlayModule } from '../overlay/overlay.module';
import { RelevanceModule } from '../relevance/relevance.module';
import { SearchModule } from '../search/search.module';
import { CategoryRelevanceService } from './category-relevance.service';

@Module({
  imports: [SearchModule, OverlayModule, RelevanceModule],
  providers: [CategoryRelevanceService],
  exports: [CategoryRelevanceService],
})
export class CategoryModule {}
