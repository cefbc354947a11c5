import { Module } from '@nestjs/common';
import { SchemaModule } from '../schema/schema.module';
import { TypesenseModule } from '../storage/typesense/typesense.module';
import { REDIRECTION_INDEX } from './interfaces/redirection.interface';
import { OverlayFilterService } from './overlay-filter.service';
import { TypesenseRedirectionIndex } from './typesense-redirection-index.service';

@Module({
  imports: [TypesenseModule, SchemaModule],
  providers: [
    TypesenseRedirectionIndex,
    {
      provide: REDIRECTION_INDEX,
      useExisting: TypesenseRedirectionIndex,
    },
    OverlayFilterService,
  ],
  exports: [OverlayFilterService],
})
export class OverlayModule {}
