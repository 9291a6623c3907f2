/**
 * Report Rendering Service
 *
 * Cleans the model's answer and places it in the HTML email template.
 */

import fs from 'fs/promises';
import { calculateDateRange } from './dates.js';
import { FileLoadError } from './errors.js';
import { fillPlaceholders } from './prompts.js';
import type { Logger } from './logger.js';
import type { VeilleType } from '../types/index.js';

const TYPE_LABELS: Record<VeilleType, string> = {
  veille_juridique: 'juridique',
  veille_pedagogique_technologique: 'pédagogique et technologique',
};

const SUBJECTS: Record<VeilleType, string> = {
  veille_juridique: 'Veille juridique',
  veille_pedagogique_technologique: 'Veille pédagogique et technologique',
};

export interface RenderedReport {
  subject: string;
  html: string;
  /** False when the template was missing and the cleaned answer is sent as is */
  usedTemplate: boolean;
}

export function getTypeLabel(type: VeilleType): string {
  return TYPE_LABELS[type];
}

export function getSubject(type: VeilleType): string {
  return SUBJECTS[type];
}

/**
 * Strip markdown code fencing (```html ... ```) around an answer
 */
export function cleanResponseText(responseText: string): string {
  if (!responseText) {
    return responseText;
  }

  let text = responseText.trim();
  if (text.startsWith('```html')) {
    text = text.slice('```html'.length).trim();
  }
  if (text.endsWith('```')) {
    text = text.slice(0, -3).trim();
  }
  if (text.startsWith('```')) {
    text = text.slice(3).trim();
  }
  return text;
}

export async function loadEmailTemplate(templateFile: string): Promise<string> {
  try {
    return await fs.readFile(templateFile, 'utf-8');
  } catch (error) {
    throw new FileLoadError(`Email template file not found: ${templateFile}`, templateFile, { cause: error });
  }
}

/**
 * Fill `{type}`, `{start_date}`, `{end_date}` and `{response_text}`.
 * The answer is inserted last so placeholders inside it stay untouched.
 */
export function renderEmail(
  template: string,
  type: VeilleType,
  days: number,
  cleanedText: string,
  now: Date = new Date()
): string {
  const range = calculateDateRange(days, now);
  const withHeader = fillPlaceholders(template, {
    type: TYPE_LABELS[type],
    start_date: range.startDateStr,
    end_date: range.endDateStr,
  });
  return withHeader.split('{response_text}').join(cleanedText);
}

/**
 * Clean the answer and render it; a missing template falls back to the cleaned answer
 */
export async function buildReport(
  responseText: string,
  type: VeilleType,
  days: number,
  templateFile: string,
  logger: Logger,
  now: Date = new Date()
): Promise<RenderedReport> {
  const cleaned = cleanResponseText(responseText);
  const subject = SUBJECTS[type];

  let template: string;
  try {
    template = await loadEmailTemplate(templateFile);
  } catch (error) {
    if (!(error instanceof FileLoadError)) {
      throw error;
    }
    logger.warn('Email template missing, sending the answer without template', { path: error.path });
    return { subject, html: cleaned, usedTemplate: false };
  }

  return { subject, html: renderEmail(template, type, days, cleaned, now), usedTemplate: true };
}
