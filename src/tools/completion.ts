import { GoogleGenerativeAI } from '@google/generative-ai';
import Anthropic from '@anthropic-ai/sdk';
import type { Config } from '../types.js';
import { DEFAULT_RETRY_CONFIG, retryWithBackoff, withTimeout, type RetryConfig } from '../utils/retry.js';

/** Which pipeline step is asking; providers may use it for routing or logging. */
export type CompletionTask = 'generate' | 'critique' | 'clarify' | 'answer';

export interface CompletionRequest {
  task: CompletionTask;
  systemPrompt: string;
  userPrompt: string;
  /** Grounding text placed ahead of the user prompt (schema, history) */
  context?: string;
}

/**
 * The text-completion capability. Responses are opaque text; callers do their
 * own code-fence stripping and classification.
 */
export interface TextCompletion {
  complete(request: CompletionRequest, signal?: AbortSignal): Promise<string>;
}

export function composeUserPrompt(request: CompletionRequest): string {
  return request.context ? `${request.context}\n\n${request.userPrompt}` : request.userPrompt;
}

export class GeminiCompletion implements TextCompletion {
  private genAI: GoogleGenerativeAI;

  constructor(apiKey: string, private readonly modelName: string) {
    this.genAI = new GoogleGenerativeAI(apiKey);
  }

  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<string> {
    const model = this.genAI.getGenerativeModel({
      model: this.modelName,
      systemInstruction: request.systemPrompt,
    });
    const result = await model.generateContent(composeUserPrompt(request), { signal });
    return result.response.text().trim();
  }
}

export class AnthropicCompletion implements TextCompletion {
  private client: Anthropic;

  constructor(apiKey: string, private readonly modelName: string, private readonly maxTokens: number) {
    this.client = new Anthropic({ apiKey });
  }

  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<string> {
    const response = await this.client.messages.create(
      {
        model: this.modelName,
        max_tokens: this.maxTokens,
        system: request.systemPrompt,
        messages: [{ role: 'user', content: composeUserPrompt(request) }],
      },
      { signal }
    );

    return response.content
      .filter((b): b is Anthropic.Messages.TextBlock => b.type === 'text')
      .map(b => b.text)
      .join('')
      .trim();
  }
}

export interface GuardOptions {
  timeoutMs: number;
  retry?: RetryConfig;
  /** Name used in timeout errors and log lines */
  name?: string;
}

/**
 * Wraps a provider with retry on transient failures and one wall-clock budget
 * covering every attempt.
 */
export class GuardedCompletion implements TextCompletion {
  constructor(private readonly inner: TextCompletion, private readonly options: GuardOptions) {}

  complete(request: CompletionRequest): Promise<string> {
    const { timeoutMs, retry = DEFAULT_RETRY_CONFIG, name = 'text completion' } = this.options;
    return withTimeout(`${name} (${request.task})`, timeoutMs, signal =>
      retryWithBackoff(() => this.inner.complete(request, signal), retry, signal)
    );
  }
}

/**
 * Picks the configured provider and wraps it in a GuardedCompletion.
 */
export function createCompletion(config: Config): TextCompletion {
  let provider: TextCompletion;
  if (config.llmProvider === 'anthropic') {
    if (!config.anthropicApiKey) {
      throw new Error('Missing required environment variable: ANTHROPIC_API_KEY');
    }
    provider = new AnthropicCompletion(config.anthropicApiKey, config.anthropicModel, config.llmMaxTokens);
  } else {
    if (!config.geminiApiKey) {
      throw new Error('Missing required environment variable: GEMINI_API_KEY');
    }
    provider = new GeminiCompletion(config.geminiApiKey, config.geminiModel);
  }

  return new GuardedCompletion(provider, {
    timeoutMs: config.llmTimeoutMs,
    retry: config.retry,
    name: config.llmProvider,
  });
}
