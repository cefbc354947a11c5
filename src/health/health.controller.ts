import { Controller, Get, Inject } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { DOCUMENT_STORE, DocumentStore } from '../storage/interfaces/document-store.interface';

export interface ServiceStatus {
  name: string;
  status: 'up' | 'down';
  message: string;
}

export interface HealthReport {
  status: 'ok' | 'degraded';
  timestamp: string;
  services: ServiceStatus[];
}

@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(@Inject(DOCUMENT_STORE) private readonly store: DocumentStore) {}

  @Get()
  @ApiOperation({ summary: 'Backing store reachability' })
  async check(): Promise<HealthReport> {
    const storeStatus: ServiceStatus = (await this.store.isHealthy())
      ? { name: 'typesense', status: 'up', message: 'Typesense is reachable' }
      : { name: 'typesense', status: 'down', message: 'Typesense is not responding' };

    return {
      status: storeStatus.status === 'up' ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      services: [storeStatus],
    };
  }
}
