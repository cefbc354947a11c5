import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import searchConfig from './config/search.config';
import { SchemaModule } from './schema/schema.module';
import { HealthModule } from './health/health.module';
import { ApiModule } from './api/api.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [searchConfig],
    }),
    SchemaModule,
    HealthModule,
    ApiModule,
  ],
})
export class AppModule {}
