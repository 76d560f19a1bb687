import { DynamicModule, Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { createDataSourceOptions } from '@medidoc/shared';
import { ConfigModule } from './config/config.module';
import { ServiceConfig } from './config/service.config';
import { MedicalDocument } from './entities/MedicalDocument';
import { HealthController } from './health.controller';
import { DocumentsController } from './documents.controller';
import { DocumentsService } from './documents.service';
import { DocumentStore } from './document-store';
import { UploadStorage } from './upload-storage';
import { TextExtractor } from './ocr/text-extractor';
import { Pdf2PicRasterizer } from './ocr/pdf-rasterizer';
import { FieldExtractor } from './extraction/field-extractor';
import { CopilotController } from './copilot/copilot.controller';
import { CopilotService } from './copilot/copilot.service';
import { GeminiModule } from './gemini/gemini.module';
import { GroqModule } from './groq/groq.module';
import { PDF_RASTERIZER } from './tokens';

@Module({})
export class AppModule {
  static register(config: ServiceConfig): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule.register(config),
        TypeOrmModule.forRoot(createDataSourceOptions(config.database, [MedicalDocument])),
        TypeOrmModule.forFeature([MedicalDocument]),
        GeminiModule,
        GroqModule,
      ],
      controllers: [HealthController, DocumentsController, CopilotController],
      providers: [
        UploadStorage,
        DocumentStore,
        TextExtractor,
        FieldExtractor,
        DocumentsService,
        CopilotService,
        { provide: PDF_RASTERIZER, useClass: Pdf2PicRasterizer },
      ],
    };
  }
}
