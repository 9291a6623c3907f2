// Perplexity Chat API Adapter
import { ChatApiAdapter, type ChatClientOptions, type ProviderRequest } from './base.js';
import { ApiError } from '../services/errors.js';
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_SECONDS } from '../services/config.js';
import { decodeSSEStream, extractDeltaContent } from '../services/streaming.js';
import type {
  ChatChoice,
  ChatCompletionChunk,
  ChatCompletionOptions,
  ChatCompletionRequest,
  ChatCompletionResponse,
  ChatMessage,
  ChatRole,
  ChatUsage,
} from '../types/chat.js';

/**
 * Known Perplexity models
 */
export const PerplexityModel = {
  SONAR: 'sonar',
  SONAR_PRO: 'sonar-pro',
  SONAR_REASONING: 'sonar-reasoning',
  SONAR_REASONING_PRO: 'sonar-reasoning-pro',
  SONAR_DEEP_RESEARCH: 'sonar-deep-research',
  SONAR_SMALL_CHAT: 'sonar-small-chat',
  SONAR_SMALL_ONLINE: 'sonar-small-online',
  SONAR_MEDIUM_CHAT: 'sonar-medium-chat',
  SONAR_MEDIUM_ONLINE: 'sonar-medium-online',
  LLAMA_3_1_8B: 'llama-3.1-8b-instruct',
  LLAMA_3_1_70B: 'llama-3.1-70b-instruct',
  MIXTRAL_8X7B: 'mixtral-8x7b-instruct',
  CODELLAMA_34B: 'codellama-34b-instruct',
} as const;

export type PerplexityModelId = (typeof PerplexityModel)[keyof typeof PerplexityModel];

export const CHAT_COMPLETIONS_PATH = 'chat/completions';
export const DEFAULT_ASK_MODEL: string = PerplexityModel.SONAR_PRO;
export const DEFAULT_ONLINE_MODEL: string = PerplexityModel.SONAR_MEDIUM_ONLINE;

const OPTIONAL_FIELDS = [
  'max_tokens',
  'temperature',
  'top_p',
  'top_k',
  'presence_penalty',
  'frequency_penalty',
] as const satisfies ReadonlyArray<keyof ChatCompletionOptions>;

const ROLES: readonly ChatRole[] = ['system', 'user', 'assistant'];

export interface PerplexityClientOptions extends ChatClientOptions {
  /** Model used by `ask`, `askStream` and `search` when none is given */
  defaultModel?: string;
  /** Model `search` falls back to when given a non-online model */
  onlineModel?: string;
}

/**
 * Result of `search`: the model actually used is reported back,
 * since it may differ from the one asked for.
 */
export interface SearchResult {
  answer: string;
  model: string;
  substituted: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOnlineModel(model: string): boolean {
  return model.includes('online');
}

/**
 * Build the conversation for a single question
 */
export function buildMessages(question: string, systemMessage?: string): ChatMessage[] {
  const messages: ChatMessage[] = [];
  if (systemMessage) {
    messages.push({ role: 'system', content: systemMessage });
  }
  messages.push({ role: 'user', content: question });
  return messages;
}

/**
 * Perplexity chat completion client
 * OpenAI-compatible wire format on `{baseUrl}/chat/completions`
 */
export class PerplexityClient extends ChatApiAdapter {
  readonly defaultModel: string;
  private readonly onlineModel: string;

  constructor(options: PerplexityClientOptions = {}) {
    super(
      {
        providerId: 'perplexity',
        baseUrl: DEFAULT_BASE_URL,
        apiKeyEnvVar: 'PERPLEXITY_API_KEY',
        timeoutMs: DEFAULT_TIMEOUT_SECONDS * 1000,
      },
      options
    );
    this.defaultModel = options.defaultModel?.trim() || DEFAULT_ASK_MODEL;
    this.onlineModel = options.onlineModel ?? DEFAULT_ONLINE_MODEL;
  }

  /**
   * Transform request into the wire payload.
   * Unset optional fields are left out, never sent as null.
   */
  transformRequest(request: ChatCompletionRequest): ProviderRequest {
    if (typeof request.model !== 'string' || request.model.trim() === '') {
      throw new ApiError('invalid_request', 'Request model must be a non-empty string');
    }
    if (!Array.isArray(request.messages) || request.messages.length === 0) {
      throw new ApiError('invalid_request', 'Request must contain at least one message');
    }

    const payload: ProviderRequest = {
      model: request.model,
      messages: request.messages.map((message) => ({ role: message.role, content: message.content })),
      stream: request.stream ?? false,
    };

    for (const field of OPTIONAL_FIELDS) {
      const value = request[field];
      if (value !== undefined) {
        payload[field] = value;
      }
    }

    return payload;
  }

  /**
   * Decode a non-streaming response body.
   * Missing `choices`, `usage`, or a choice without message content is a decode error.
   * Metadata is tolerated when absent: `finish_reason` reads as null, `id` and
   * `model` as '', `created` as 0 and `object` as 'chat.completion'.
   */
  transformResponse(data: unknown, statusCode?: number): ChatCompletionResponse {
    const fail = (reason: string): never => {
      throw new ApiError('decode', `Malformed chat completion response: ${reason}`, {
        statusCode,
        response: data,
      });
    };

    if (!isRecord(data)) {
      return fail('body is not an object');
    }
    const { choices: rawChoices, usage } = data;
    if (!Array.isArray(rawChoices)) {
      return fail('missing "choices"');
    }
    if (!isRecord(usage)) {
      return fail('missing "usage"');
    }

    const choices = rawChoices.map((rawChoice: unknown, position: number): ChatChoice => {
      if (!isRecord(rawChoice)) {
        return fail(`choice ${position} is not an object`);
      }
      const message = rawChoice.message;
      if (!isRecord(message) || typeof message.content !== 'string') {
        return fail(`choice ${position} has no message content`);
      }
      const role = ROLES.find((candidate) => candidate === message.role) ?? 'assistant';
      return {
        index: typeof rawChoice.index === 'number' ? rawChoice.index : position,
        message: { role, content: message.content },
        finish_reason: typeof rawChoice.finish_reason === 'string' ? rawChoice.finish_reason : null,
      };
    });

    const readCount = (field: keyof ChatUsage): number => {
      const value = usage[field];
      return typeof value === 'number' ? value : fail(`usage.${field} is not a number`);
    };

    return {
      id: typeof data.id === 'string' ? data.id : '',
      object: typeof data.object === 'string' ? data.object : 'chat.completion',
      created: typeof data.created === 'number' ? data.created : 0,
      model: typeof data.model === 'string' ? data.model : '',
      choices,
      usage: {
        prompt_tokens: readCount('prompt_tokens'),
        completion_tokens: readCount('completion_tokens'),
        total_tokens: readCount('total_tokens'),
      },
    };
  }

  /**
   * Execute a chat completion. With `stream: true` the result is a lazy
   * sequence of chunks; the request is sent on the first pull.
   */
  chatCompletion(request: ChatCompletionRequest & { stream: true }): AsyncGenerator<ChatCompletionChunk>;
  chatCompletion(request: ChatCompletionRequest & { stream?: false }): Promise<ChatCompletionResponse>;
  chatCompletion(
    request: ChatCompletionRequest
  ): Promise<ChatCompletionResponse> | AsyncGenerator<ChatCompletionChunk>;
  chatCompletion(
    request: ChatCompletionRequest
  ): Promise<ChatCompletionResponse> | AsyncGenerator<ChatCompletionChunk> {
    if (request.stream) {
      return this.chatCompletionStream(request);
    }
    return this.createCompletion(request);
  }

  /**
   * Execute chat completion (synchronous response)
   */
  async createCompletion(request: ChatCompletionRequest): Promise<ChatCompletionResponse> {
    const payload = this.transformRequest({ ...request, stream: false });
    return this.httpPost(CHAT_COMPLETIONS_PATH, payload, (data, statusCode) =>
      this.transformResponse(data, statusCode)
    );
  }

  /**
   * Execute streaming chat completion.
   * Frames that fail to parse are skipped.
   */
  async *chatCompletionStream(request: ChatCompletionRequest): AsyncGenerator<ChatCompletionChunk> {
    const payload = this.transformRequest({ ...request, stream: true });
    const text = this.httpPostStream(CHAT_COMPLETIONS_PATH, payload);

    yield* decodeSSEStream(text, {
      onSkippedFrame: (data) => this.logger.debug('Skipping malformed stream frame', { length: data.length }),
    });
  }

  /**
   * Ask a question, get the text of the first choice
   */
  async ask(
    question: string,
    model: string = this.defaultModel,
    systemMessage?: string,
    options: ChatCompletionOptions = {}
  ): Promise<string> {
    const response = await this.createCompletion({
      ...options,
      model,
      messages: buildMessages(question, systemMessage),
    });

    const choice = response.choices[0];
    if (!choice) {
      throw new ApiError('decode', 'Response contained no choices', { response });
    }
    return choice.message.content;
  }

  /**
   * Ask a question, yield text fragments as they arrive
   */
  async *askStream(
    question: string,
    model: string = this.defaultModel,
    systemMessage?: string,
    options: ChatCompletionOptions = {}
  ): AsyncGenerator<string> {
    const chunks = this.chatCompletionStream({
      ...options,
      model,
      messages: buildMessages(question, systemMessage),
    });

    for await (const chunk of chunks) {
      const content = extractDeltaContent(chunk);
      if (content !== undefined) {
        yield content;
      }
    }
  }

  /**
   * Search with an online (retrieval-augmented) model.
   * A non-online model is replaced by the configured online model; the
   * substitution is logged and reported in the result.
   */
  async search(query: string, model: string = this.defaultModel): Promise<SearchResult> {
    const substituted = !isOnlineModel(model);
    const effectiveModel = substituted ? this.onlineModel : model;

    if (substituted) {
      this.logger.warn('Substituting online model for search', {
        requestedModel: model,
        model: effectiveModel,
      });
    }

    const answer = await this.ask(query, effectiveModel);
    return { answer, model: effectiveModel, substituted };
  }

  /**
   * Models this client knows about
   */
  getAvailableModels(): PerplexityModelId[] {
    return Object.values(PerplexityModel);
  }
}
