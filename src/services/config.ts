/**
 * Configuration Service
 *
 * Reads API, email and file-location settings from environment variables.
 * `main` builds these once at startup and passes them down; nothing here
 * keeps module-level state.
 */

import path from 'path';
import { fileURLToPath } from 'url';
import dotenv from 'dotenv';
import { ConfigurationError } from './errors.js';

export const DEFAULT_BASE_URL = 'https://api.perplexity.ai';
export const DEFAULT_MODEL = 'sonar';
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_TIMEOUT_SECONDS = 30;
/** Non-streaming report answers run to 20k tokens */
export const DEFAULT_REPORT_TIMEOUT_SECONDS = 300;
export const PLACEHOLDER_API_KEY = 'your_perplexity_api_key_here';

export interface PerplexityConfig {
  apiKey?: string;
  /** API root, without trailing slash */
  baseUrl: string;
  defaultModel: string;
  maxRetries: number;
  timeoutMs: number;
  /** Timeout of the report call made by the CLI */
  reportTimeoutMs: number;
}

export interface EmailConfig {
  email: string;
  password: string;
  smtpServer: string;
  smtpPort: number;
  fromName?: string;
}

export interface AppPaths {
  root: string;
  prompts: string;
  template: string;
  recipients: string;
  envFile: string;
}

/**
 * Project root: two levels above this file, both from src/services and dist/services.
 */
export function resolveProjectRoot(): string {
  return fileURLToPath(new URL('../../', import.meta.url));
}

export function resolveAppPaths(root: string = resolveProjectRoot()): AppPaths {
  return {
    root,
    prompts: path.join(root, 'prompts', 'prompt.yaml'),
    template: path.join(root, 'templates', 'email_template.html'),
    recipients: path.join(root, 'recipients.json'),
    envFile: path.join(root, '.env'),
  };
}

/**
 * Load a .env file into process.env. Variables already set win.
 *
 * @returns true when the file was found and parsed
 */
export function loadEnvFile(envFile: string): boolean {
  const result = dotenv.config({ path: envFile });
  return result.error === undefined;
}

function parseInteger(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value.trim());
  return Number.isInteger(parsed) ? parsed : fallback;
}

/**
 * Normalize and validate an http(s) base URL
 */
export function parseBaseUrl(baseUrl: string): string {
  const normalizedUrl = baseUrl.trim().replace(/\/+$/, '');

  let url: URL;
  try {
    url = new URL(normalizedUrl);
  } catch {
    throw new ConfigurationError(`Invalid base URL: "${baseUrl}" is not a valid URL`);
  }

  if (!['http:', 'https:'].includes(url.protocol)) {
    throw new ConfigurationError(`Invalid base URL protocol: "${url.protocol}". Must be http or https`);
  }

  return normalizedUrl;
}

/**
 * Build the API configuration from environment variables.
 * Numeric values that do not parse keep their defaults.
 */
export function loadPerplexityConfig(env: NodeJS.ProcessEnv = process.env): PerplexityConfig {
  const apiKey = env.PERPLEXITY_API_KEY?.trim();
  const timeoutSeconds = parseInteger(env.PERPLEXITY_TIMEOUT, DEFAULT_TIMEOUT_SECONDS);
  const reportTimeoutSeconds = parseInteger(env.PERPLEXITY_REPORT_TIMEOUT, DEFAULT_REPORT_TIMEOUT_SECONDS);

  return {
    apiKey: apiKey ? apiKey : undefined,
    baseUrl: (env.PERPLEXITY_BASE_URL || DEFAULT_BASE_URL).replace(/\/+$/, ''),
    defaultModel: env.PERPLEXITY_DEFAULT_MODEL || DEFAULT_MODEL,
    maxRetries: Math.max(0, parseInteger(env.PERPLEXITY_MAX_RETRIES, DEFAULT_MAX_RETRIES)),
    timeoutMs: Math.max(1, timeoutSeconds) * 1000,
    reportTimeoutMs: Math.max(1, reportTimeoutSeconds) * 1000,
  };
}

/**
 * Fail loudly on a configuration that cannot reach the API.
 *
 * @returns the config with its API key known to be present
 */
export function validatePerplexityConfig(
  config: PerplexityConfig
): PerplexityConfig & { apiKey: string } {
  const { apiKey } = config;
  if (!apiKey || apiKey === PLACEHOLDER_API_KEY) {
    throw new ConfigurationError('API key is required. Set PERPLEXITY_API_KEY environment variable.');
  }
  return { ...config, apiKey, baseUrl: parseBaseUrl(config.baseUrl) };
}

/**
 * SMTP settings: EMAIL, PASSWORD, SMTP_SERVER, SMTP_PORT, EMAIL_FROM_NAME
 */
export function loadEmailConfig(env: NodeJS.ProcessEnv = process.env): EmailConfig {
  const email = env.EMAIL?.trim();
  const password = env.PASSWORD;

  if (!email || !password) {
    throw new ConfigurationError('Email configuration not found: set EMAIL and PASSWORD');
  }

  const smtpPort = parseInteger(env.SMTP_PORT, 587);
  if (smtpPort < 1 || smtpPort > 65535) {
    throw new ConfigurationError(`Invalid SMTP_PORT: "${env.SMTP_PORT}"`);
  }

  return {
    email,
    password,
    smtpServer: env.SMTP_SERVER?.trim() || 'smtp.gmail.com',
    smtpPort,
    fromName: env.EMAIL_FROM_NAME?.trim() || undefined,
  };
}
