import { Module } from '@nestjs/common';
import { SchemaManagerService } from './schema-manager.service';
import { TypesenseModule } from '../storage/typesense/typesense.module';

@Module({
  imports: [TypesenseModule],
  providers: [SchemaManagerService],
  exports: [SchemaManagerService],
})
export class SchemaModule {}
