import OpenAI from 'openai';
import type { LLMProviderAdapter, GenerateRequest, GenerateResponse, LLMMessage } from '../types.js';

// Ollama ignores the key but the SDK refuses to build a client without one.
const OLLAMA_PLACEHOLDER_KEY = 'ollama';

export interface OllamaProviderOptions {
  baseURL: string;
}

export class OllamaProvider implements LLMProviderAdapter {
  readonly name = 'ollama' as const;
  private client: OpenAI | null = null;

  constructor(private options: OllamaProviderOptions) {}

  get isConfigured(): boolean {
    return !!this.options.baseURL;
  }

  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.options.baseURL) {
        throw new Error('OLLAMA_BASE_URL is not configured');
      }
      this.client = new OpenAI({
        apiKey: OLLAMA_PLACEHOLDER_KEY,
        baseURL: this.options.baseURL,
        maxRetries: 0,
      });
    }
    return this.client;
  }

  async generate(request: GenerateRequest): Promise<GenerateResponse> {
    const client = this.getClient();

    const response = await client.chat.completions.create({
      model: request.model,
      messages: request.messages.map((m) => this.convertMessage(m)),
      temperature: request.temperature,
      max_tokens: request.maxTokens,
      stream: false,
    });

    const choice = response.choices[0];
    if (!choice) {
      return { content: '', finishReason: 'error' };
    }

    return {
      content: choice.message.content || '',
      finishReason: choice.finish_reason === 'length' ? 'max_tokens' : 'stop',
      usage: response.usage ? {
        inputTokens: response.usage.prompt_tokens,
        outputTokens: response.usage.completion_tokens,
      } : undefined,
    };
  }

  async ping(): Promise<void> {
    await this.listModels();
  }

  async listModels(): Promise<string[]> {
    const client = this.getClient();
    const models: string[] = [];
    for await (const model of client.models.list()) {
      models.push(model.id);
    }
    return models;
  }

  private convertMessage(message: LLMMessage): OpenAI.ChatCompletionMessageParam {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content };
      case 'assistant':
        return { role: 'assistant', content: message.content };
      default:
        return { role: 'user', content: message.content };
    }
  }
}
