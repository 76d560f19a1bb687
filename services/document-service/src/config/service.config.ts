import path from 'path';
import {
  DatabaseConfig,
  Env,
  envBool,
  envInt,
  envOptional,
  envString,
  isDatabaseType,
} from '@medidoc/shared';

export const SERVICE_NAME = 'document-service';

export interface CompletionConfig {
  apiKey?: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
}

export interface OcrConfig {
  apiKey?: string;
  model: string;
  /** DPI used when rendering PDF pages before OCR. */
  pdfDensity: number;
}

export interface ServiceConfig {
  port: number;
  host: string;
  uploadDir: string;
  database: DatabaseConfig;
  completion: CompletionConfig;
  ocr: OcrConfig;
}

export function loadConfig(env: Env = process.env): ServiceConfig {
  const dbType = envString(env, 'DB_TYPE', 'better-sqlite3');
  if (!isDatabaseType(dbType)) {
    throw new Error(`Unsupported DB_TYPE "${dbType}" (expected better-sqlite3 or postgres)`);
  }

  return {
    port: envInt(env, 'PORT', 8000),
    host: envString(env, 'HOST', '0.0.0.0'),
    uploadDir: envString(env, 'UPLOAD_DIR', path.join(process.cwd(), 'uploads')),
    database: {
      type: dbType,
      database: envString(env, 'DB_NAME', 'medidoc.db'),
      host: envString(env, 'DB_HOST', 'localhost'),
      port: envInt(env, 'DB_PORT', 5432),
      username: envString(env, 'DB_USER', 'postgres'),
      password: envString(env, 'DB_PASSWORD', 'postgres'),
      synchronize: envBool(env, 'DB_SYNC', dbType === 'better-sqlite3'),
    },
    completion: {
      apiKey: envOptional(env, 'GROQ_API_KEY'),
      baseUrl: envString(env, 'GROQ_BASE_URL', 'https://api.groq.com/openai').replace(/\/$/, ''),
      model: envString(env, 'GROQ_MODEL', 'llama-3.1-8b-instant'),
      timeoutMs: envInt(env, 'LLM_TIMEOUT_MS', 60000),
    },
    ocr: {
      apiKey: envOptional(env, 'GOOGLE_API_KEY'),
      model: envString(env, 'GEMINI_MODEL', 'gemini-1.5-flash'),
      pdfDensity: envInt(env, 'PDF_RASTER_DENSITY', 200),
    },
  };
}
