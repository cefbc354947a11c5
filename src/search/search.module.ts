import { Module } from '@nestjs/common';
import { EmbeddingModule } from '../embedding/embedding.module';
import { OverlayModule } from '../overlay/overlay.module';
import { RelevanceModule } from '../relevance/relevance.module';
import { TypesenseModule } from '../storage/typesense/typesense.module';
import { FanoutExecutorService } from './fanout-executor.service';
import { FederatedSearchService } from './federated-search.service';
import { QueryPlannerService } from './query-planner.service';

@Module({
  imports: [TypesenseModule, EmbeddingModule, OverlayModule, RelevanceModule],
  providers: [QueryPlannerService, FanoutExecutorService, FederatedSearchService],
  exports: [QueryPlannerService, FanoutExecutorService, FederatedSearchService],
})
export class SearchModule {}
