// Recipients file loader (recipients.json: { "to": [...], "cc": [...] })
import fs from 'fs/promises';
import { ConfigurationError, FileLoadError, errorMessage } from './errors.js';
import type { Recipients } from '../types/index.js';

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export function isValidEmail(address: string): boolean {
  return EMAIL_PATTERN.test(address);
}

function readList(document: Record<string, unknown>, key: 'to' | 'cc'): string[] {
  const value = document[key];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ConfigurationError(`Recipients "${key}" must be a list of addresses`);
  }

  return value.map((entry: unknown) => {
    if (typeof entry !== 'string' || !isValidEmail(entry.trim())) {
      throw new ConfigurationError(`Invalid email address in "${key}": ${String(entry)}`);
    }
    return entry.trim();
  });
}

/**
 * Validate a parsed recipients document. Missing lists are empty.
 */
export function parseRecipients(document: unknown): Recipients {
  if (typeof document !== 'object' || document === null || Array.isArray(document)) {
    throw new ConfigurationError('Recipients configuration must be an object with "to" and "cc" lists');
  }
  const record: Record<string, unknown> = { ...document };
  return {
    to: readList(record, 'to'),
    cc: readList(record, 'cc'),
  };
}

export async function loadRecipients(recipientsFile: string): Promise<Recipients> {
  let source: string;
  try {
    source = await fs.readFile(recipientsFile, 'utf-8');
  } catch (error) {
    throw new FileLoadError(`Recipients file not found: ${recipientsFile}`, recipientsFile, { cause: error });
  }

  let document: unknown;
  try {
    document = JSON.parse(source);
  } catch (error) {
    throw new FileLoadError(`Error parsing JSON file: ${errorMessage(error)}`, recipientsFile, { cause: error });
  }

  return parseRecipients(document);
}

export function hasRecipients(recipients: Recipients): boolean {
  return recipients.to.length > 0 || recipients.cc.length > 0;
}
