export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface CompletionRequest {
  messages: ChatMessage[];
  temperature: number;
  maxTokens: number;
}

/** A chat-style language model: system/user messages in, generated text out. */
export interface CompletionClient {
  complete(request: CompletionRequest): Promise<string>;
}

export class CompletionError extends Error {
  constructor(message: string, readonly statusCode?: number) {
    super(message);
    this.name = 'CompletionError';
  }
}
