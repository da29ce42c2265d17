export type LLMProvider = 'ollama';

export interface LLMMessage {
  role: 'user' | 'assistant' | 'system';
  content: string;
}

export interface GenerateRequest {
  model: string;
  messages: LLMMessage[];
  temperature: number;
  maxTokens?: number;
}

export interface GenerateResponse {
  content: string;
  finishReason: 'stop' | 'max_tokens' | 'error';
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

/** The slice of a provider the recursion loop needs. */
export interface CompletionClient {
  generate(request: GenerateRequest): Promise<GenerateResponse>;
}

export interface LLMProviderAdapter extends CompletionClient {
  readonly name: LLMProvider;
  readonly isConfigured: boolean;
  ping(): Promise<void>;
  listModels(): Promise<string[]>;
}
