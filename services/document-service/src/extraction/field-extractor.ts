import { Inject, Injectable } from '@nestjs/common';
import { createLogger } from '@medidoc/shared';
import { COMPLETION_CLIENT } from '../tokens';
import { SERVICE_NAME } from '../config/service.config';
import { CompletionClient } from '../groq/completion.types';
import { isRecord } from '../guards';
import {
  DOCUMENT_CATEGORIES,
  EMPTY_DOCUMENT_FIELDS,
  ExtractedFields,
  FALLBACK_FIELDS,
  NOT_AVAILABLE,
  StoredCategory,
} from './document-fields';

/** Text past this offset is never shown to the model. */
export const MAX_CLASSIFY_CHARS = 2000;

export const CLASSIFY_TEMPERATURE = 0.1;
export const CLASSIFY_MAX_TOKENS = 300;

export const CLASSIFY_SYSTEM_PROMPT = `You are an expert medical data extraction assistant. Analyze the provided text from a medical document and extract key information.
Respond ONLY with a valid JSON object containing exactly these keys:
- "category": Choose from ${DOCUMENT_CATEGORIES.map((c) => `"${c}"`).join(', ')}
- "document_date": Date in YYYY-MM-DD format. If not found, use "${NOT_AVAILABLE}"
- "doctor_name": Full name of the doctor. If not found, use "${NOT_AVAILABLE}"
- "hospital_name": Name of hospital/clinic. If not found, use "${NOT_AVAILABLE}"
- "summary": A brief, clear summary in 1-2 sentences describing what this document is about

Return only the JSON object, no other text.`;

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Classifies OCR text into {@link ExtractedFields} with one completion call.
 * Always resolves: model and parse failures yield {@link FALLBACK_FIELDS}.
 */
@Injectable()
export class FieldExtractor {
  private readonly logger = createLogger({ serviceName: SERVICE_NAME }).child({ component: 'FieldExtractor' });

  constructor(@Inject(COMPLETION_CLIENT) private readonly completion: CompletionClient) {}

  async classify(text: string): Promise<ExtractedFields> {
    if (!text.trim()) {
      return { ...EMPTY_DOCUMENT_FIELDS };
    }

    let raw: string;
    try {
      raw = await this.completion.complete({
        messages: [
          { role: 'system', content: CLASSIFY_SYSTEM_PROMPT },
          { role: 'user', content: `Medical document text:\n\n${text.slice(0, MAX_CLASSIFY_CHARS)}` },
        ],
        temperature: CLASSIFY_TEMPERATURE,
        maxTokens: CLASSIFY_MAX_TOKENS,
      });
    } catch (error) {
      this.logger.error('Field extraction call failed - using fallback record', error);
      return { ...FALLBACK_FIELDS };
    }

    const fields = parseFieldsResponse(raw);
    if (!fields) {
      this.logger.warn('Model response was not a JSON object - using fallback record', {
        rawResponse: raw.slice(0, 500),
      });
      return { ...FALLBACK_FIELDS };
    }

    return fields;
  }
}

/** Removes a ```/```json opening fence and a closing ``` fence, if present. */
export function stripCodeFence(raw: string): string {
  return raw
    .trim()
    .replace(/^```[A-Za-z]*/, '')
    .replace(/```$/, '')
    .trim();
}

/** Parses a (possibly fenced) model reply; null when it is not a JSON object. */
export function parseFieldsResponse(raw: string): ExtractedFields | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFence(raw));
  } catch {
    return null;
  }

  return isRecord(parsed) ? normalizeFields(parsed) : null;
}

export function normalizeFields(obj: Record<string, unknown>): ExtractedFields {
  return {
    category: normalizeCategory(obj.category),
    document_date: normalizeDate(obj.document_date),
    doctor_name: normalizeText(obj.doctor_name),
    hospital_name: normalizeText(obj.hospital_name),
    summary: normalizeText(obj.summary),
  };
}

function normalizeText(value: unknown): string {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed ? trimmed : NOT_AVAILABLE;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return NOT_AVAILABLE;
}

function normalizeCategory(value: unknown): StoredCategory {
  const text = normalizeText(value);
  if (text === NOT_AVAILABLE) return NOT_AVAILABLE;

  const wanted = text.toLowerCase();
  return DOCUMENT_CATEGORIES.find((c) => c.toLowerCase() === wanted) ?? 'Other';
}

function normalizeDate(value: unknown): string {
  const text = normalizeText(value);
  return ISO_DATE.test(text) ? text : NOT_AVAILABLE;
}
