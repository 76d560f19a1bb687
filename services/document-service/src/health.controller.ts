import { Controller, Get } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { HealthCheckResponse } from '@medidoc/shared';
import { SERVICE_NAME } from './config/service.config';

@Controller()
export class HealthController {
  constructor(private readonly dataSource: DataSource) {}

  @Get('/health')
  health(): HealthCheckResponse {
    return {
      status: 'healthy',
      service: SERVICE_NAME,
      database: this.dataSource.isInitialized ? 'connected' : 'disconnected',
      timestamp: new Date().toISOString(),
    };
  }
}
