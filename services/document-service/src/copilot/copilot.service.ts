import { Inject, Injectable } from '@nestjs/common';
import { createLogger } from '@medidoc/shared';
import { COMPLETION_CLIENT } from '../tokens';
import { SERVICE_NAME } from '../config/service.config';
import { CompletionClient } from '../groq/completion.types';
import { DocumentStore, SearchableDocument } from '../document-store';
import { EmptyQueryError, SearchUnavailableError } from '../errors';
import { attributeSources, SearchSource } from './source-attribution';

export const CONTEXT_CHARS_PER_DOCUMENT = 1500;
export const CONTEXT_SEPARATOR = '\n\n---\n\n';
export const SEARCH_TEMPERATURE = 0.2;
export const SEARCH_MAX_TOKENS = 800;

export const NO_DOCUMENTS_ANSWER =
  'No documents have been uploaded yet. Please upload some medical documents first.';

export interface SearchResult {
  answer: string;
  sources: SearchSource[];
}

/** Every stored document, truncated, in store order. There is no ranking. */
export function buildContext(documents: SearchableDocument[]): string {
  return documents
    .map(
      (doc, i) =>
        `Document ${i + 1}: ${doc.filename}\nCategory: ${doc.category}\nSummary: ${doc.summary}\nContent: ${doc.content.slice(0, CONTEXT_CHARS_PER_DOCUMENT)}`
    )
    .join(CONTEXT_SEPARATOR);
}

export function buildSearchSystemPrompt(context: string): string {
  return `You are a medical assistant helping a patient understand their medical history.
Answer the user's question based ONLY on the provided medical documents.

Guidelines:
- Provide a clear, helpful answer
- Mention specific document names when referencing information
- If information is not available in the documents, say so clearly
- Be concise but informative
- Use medical terminology appropriately but explain complex terms

Available Documents:
${context}`;
}

@Injectable()
export class CopilotService {
  private readonly logger = createLogger({ serviceName: SERVICE_NAME }).child({ component: 'CopilotService' });

  constructor(
    private readonly store: DocumentStore,
    @Inject(COMPLETION_CLIENT) private readonly completion: CompletionClient
  ) {}

  async answer(query: string, correlationId?: string): Promise<SearchResult> {
    if (!query.trim()) {
      throw new EmptyQueryError();
    }

    try {
      const documents = await this.store.readAllForSearch();
      if (documents.length === 0) {
        return { answer: NO_DOCUMENTS_ANSWER, sources: [] };
      }

      const answer = await this.completion.complete({
        messages: [
          { role: 'system', content: buildSearchSystemPrompt(buildContext(documents)) },
          { role: 'user', content: query },
        ],
        temperature: SEARCH_TEMPERATURE,
        maxTokens: SEARCH_MAX_TOKENS,
      });

      const sources = attributeSources(answer, documents);
      this.logger.info('Search answered', { documents: documents.length, sources: sources.length, correlationId });
      return { answer, sources };
    } catch (error) {
      this.logger.error('Error during search', error, { correlationId });
      throw new SearchUnavailableError(error);
    }
  }
}
