import { Module } from '@nestjs/common';
import { HealthController } from './health.controller';
import { TypesenseModule } from '../storage/typesense/typesense.module';

@Module({
  imports: [TypesenseModule],
  controllers: [HealthController],
})
export class HealthModule {}
