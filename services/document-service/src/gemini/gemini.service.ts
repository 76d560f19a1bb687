import { Inject, Injectable } from '@nestjs/common';
import { GenerativeModel, GoogleGenerativeAI } from '@google/generative-ai';
import { createLogger } from '@medidoc/shared';
import { SERVICE_CONFIG } from '../tokens';
import { SERVICE_NAME, ServiceConfig } from '../config/service.config';
import { OcrEngine } from '../ocr/ocr.types';

const OCR_PROMPT =
  'Extract all text from this image. Return only the extracted text without any additional commentary.';

/** OCR backed by a Gemini vision model. */
@Injectable()
export class GeminiService implements OcrEngine {
  private readonly logger = createLogger({ serviceName: SERVICE_NAME }).child({ component: 'GeminiService' });
  private model?: GenerativeModel;

  constructor(@Inject(SERVICE_CONFIG) private readonly config: ServiceConfig) {}

  async recognize(image: Buffer, mimeType: string): Promise<string> {
    const imagePart = {
      inlineData: {
        data: image.toString('base64'),
        mimeType,
      },
    };

    try {
      const result = await this.getModel().generateContent([OCR_PROMPT, imagePart]);
      return result.response.text();
    } catch (error) {
      this.logger.error('Error extracting text from image with Gemini', error, { mimeType, bytes: image.length });
      throw error;
    }
  }

  private getModel(): GenerativeModel {
    if (this.model) return this.model;

    const { apiKey, model } = this.config.ocr;
    if (!apiKey) {
      throw new Error('GOOGLE_API_KEY is not set');
    }

    this.model = new GoogleGenerativeAI(apiKey).getGenerativeModel({
      model,
      generationConfig: {
        temperature: 0,
        topK: 32,
        topP: 0.95,
        maxOutputTokens: 8192,
      },
    });
    return this.model;
  }
}
