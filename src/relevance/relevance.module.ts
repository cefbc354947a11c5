import { Module } from '@nestjs/common';
import { RELEVANCE_SOURCE } from './interfaces/relevance.interface';
import { VolumetryRelevanceService } from './volumetry-relevance.service';

@Module({
  providers: [
    VolumetryRelevanceService,
    {
      provide: RELEVANCE_SOURCE,
      useExisting: VolumetryRelevanceService,
    },
  ],
  exports: [RELEVANCE_SOURCE],
})
export class RelevanceModule {}
