import { DynamicModule, Global, Module } from '@nestjs/common';
import { SERVICE_CONFIG } from '../tokens';
import { ServiceConfig } from './service.config';

@Global()
@Module({})
export class ConfigModule {
  static register(config: ServiceConfig): DynamicModule {
    return {
      module: ConfigModule,
      providers: [{ provide: SERVICE_CONFIG, useValue: config }],
      exports: [SERVICE_CONFIG],
    };
  }
}
