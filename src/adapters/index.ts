/**
 * Chat API Adapters Index
 *
 * Factory helpers around the Perplexity client. `withClient` is the
 * scoped way to use one: the client is closed whether `fn` resolves or throws.
 */

import { PerplexityClient, type PerplexityClientOptions } from './perplexity.js';
import type { PerplexityConfig } from '../services/config.js';

/**
 * Client options from the loaded configuration
 */
export function clientOptionsFromConfig(
  config: PerplexityConfig,
  overrides: PerplexityClientOptions = {}
): PerplexityClientOptions {
  return {
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    defaultModel: config.defaultModel,
    timeoutMs: config.timeoutMs,
    ...overrides,
  };
}

/**
 * Create a client from the loaded configuration
 */
export function createClient(
  config: PerplexityConfig,
  overrides: PerplexityClientOptions = {}
): PerplexityClient {
  return new PerplexityClient(clientOptionsFromConfig(config, overrides));
}

/**
 * Run `fn` with a fresh client and close it afterwards
 */
export async function withClient<T>(
  options: PerplexityClientOptions,
  fn: (client: PerplexityClient) => Promise<T>
): Promise<T> {
  const client = new PerplexityClient(options);
  try {
    return await fn(client);
  } finally {
    client.close();
  }
}

/**
 * One-shot question with a scoped client
 */
export async function askPerplexity(
  question: string,
  options: PerplexityClientOptions & { model?: string } = {}
): Promise<string> {
  const { model, ...clientOptions } = options;
  return withClient(clientOptions, (client) => client.ask(question, model));
}

export { ChatApiAdapter, extractErrorMessage } from './base.js';
export type { ChatClientOptions, FetchLike } from './base.js';
export {
  PerplexityClient,
  PerplexityModel,
  DEFAULT_ASK_MODEL,
  DEFAULT_ONLINE_MODEL,
  buildMessages,
} from './perplexity.js';
export type { PerplexityClientOptions, PerplexityModelId, SearchResult } from './perplexity.js';
