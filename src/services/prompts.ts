/**
 * Prompt Catalog Service
 *
 * Loads prompts/prompt.yaml: one `{prompt, model}` entry per monitoring
 * type. Placeholders such as `{start_date}` are filled in before use.
 */

import fs from 'fs/promises';
import yaml from 'js-yaml';
import { calculateDateRange } from './dates.js';
import { FileLoadError, ConfigurationError, errorMessage } from './errors.js';
import { VEILLE_TYPES, type PromptCatalog, type PromptEntry, type VeilleType } from '../types/index.js';

export interface PromptData {
  prompt: string;
  model: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readEntry(document: Record<string, unknown>, type: VeilleType): PromptEntry {
  const entry = document[type];
  if (!isRecord(entry)) {
    throw new ConfigurationError(`Missing required key '${type}' in prompt configuration`);
  }
  if (typeof entry.prompt !== 'string' || entry.prompt.trim() === '') {
    throw new ConfigurationError(`Missing required key '${type}.prompt' in prompt configuration`);
  }
  if (typeof entry.model !== 'string' || entry.model.trim() === '') {
    throw new ConfigurationError(`Missing required key '${type}.model' in prompt configuration`);
  }
  return { prompt: entry.prompt, model: entry.model.trim() };
}

/**
 * Validate a parsed YAML document as a prompt catalog
 */
export function parsePromptCatalog(document: unknown): PromptCatalog {
  if (!isRecord(document)) {
    throw new ConfigurationError('Prompt configuration must be a mapping of monitoring types');
  }
  return {
    veille_juridique: readEntry(document, 'veille_juridique'),
    veille_pedagogique_technologique: readEntry(document, 'veille_pedagogique_technologique'),
  };
}

/**
 * Read and parse the prompt YAML file
 */
export async function loadPromptCatalog(promptFile: string): Promise<PromptCatalog> {
  let source: string;
  try {
    source = await fs.readFile(promptFile, 'utf-8');
  } catch (error) {
    throw new FileLoadError(`Prompt file not found: ${promptFile}`, promptFile, { cause: error });
  }

  let document: unknown;
  try {
    document = yaml.load(source, { filename: promptFile });
  } catch (error) {
    throw new FileLoadError(`Error parsing YAML file: ${errorMessage(error)}`, promptFile, { cause: error });
  }

  return parsePromptCatalog(document);
}

/**
 * Values substituted into prompt placeholders
 */
export function buildPromptVariables(days: number, now: Date = new Date()): Record<string, string> {
  const range = calculateDateRange(days, now);
  const currentYear = now.getFullYear();

  return {
    start_date: range.startDateStr,
    end_date: range.endDateStr,
    report_date: range.startDateStr,
    current_year: String(currentYear),
    start_year: String(currentYear),
    end_year: String(currentYear + 1),
  };
}

/**
 * Replace every `{name}` whose name is a known variable; others are left as they are
 */
export function fillPlaceholders(template: string, variables: Record<string, string>): string {
  return template.replace(/\{([a-z_]+)\}/g, (placeholder, name: string) =>
    Object.prototype.hasOwnProperty.call(variables, name) ? variables[name] : placeholder
  );
}

/**
 * Prompt text and model for one monitoring type, placeholders filled in
 */
export function extractPromptData(
  catalog: PromptCatalog,
  type: VeilleType,
  days: number,
  now: Date = new Date()
): PromptData {
  if (!VEILLE_TYPES.some((candidate) => candidate === type)) {
    throw new ConfigurationError(`Invalid prompt type: ${type}. Must be one of: ${VEILLE_TYPES.join(', ')}`);
  }
  const entry = catalog[type];
  return {
    prompt: fillPlaceholders(entry.prompt.trim(), buildPromptVariables(days, now)),
    model: entry.model,
  };
}
