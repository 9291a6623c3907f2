/**
 * Veille Run Service
 *
 * One scheduled run: prompt → chat completion → HTML report → email.
 * Every collaborator is passed in so the run can be exercised without
 * network or SMTP.
 */

import fs from 'fs/promises';
import { loadPromptCatalog, extractPromptData } from './prompts.js';
import { buildReport } from './report.js';
import { loadRecipients, hasRecipients } from './recipients.js';
import { withRetry, type RetryConfig } from './retry.js';
import { errorMessage } from './errors.js';
import type { EmailSender } from './emailer.js';
import type { AppPaths } from './config.js';
import type { Logger } from './logger.js';
import type { ChatCompletionOptions } from '../types/chat.js';
import type { VeilleType } from '../types/index.js';

/**
 * Sampling used for reports: deterministic, long answers
 */
export const REPORT_COMPLETION_OPTIONS: ChatCompletionOptions = {
  temperature: 0,
  max_tokens: 20000,
};

export interface VeilleOptions {
  type: VeilleType;
  days: number;
  /** Render the report without sending it */
  dryRun?: boolean;
  /** Where a dry run writes the HTML; stdout when unset */
  output?: string;
}

/**
 * What the run needs from the chat client
 */
export interface AskClient {
  ask(
    question: string,
    model?: string,
    systemMessage?: string,
    options?: ChatCompletionOptions
  ): Promise<string>;
}

export interface VeilleDependencies {
  client: AskClient;
  /** Called only when an email is about to be sent */
  createSender: () => EmailSender;
  paths: Pick<AppPaths, 'prompts' | 'template' | 'recipients'>;
  logger: Logger;
  retry?: Partial<RetryConfig>;
  now?: () => Date;
  writeStdout?: (text: string) => void;
}

export type VeilleStatus = 'sent' | 'dry_run' | 'no_content' | 'email_failed';

export interface VeilleResult {
  status: VeilleStatus;
  model: string;
  subject?: string;
  html?: string;
}

/**
 * Load recipients and send. Any failure here is reported, not thrown.
 */
async function sendReport(
  deps: VeilleDependencies,
  subject: string,
  html: string
): Promise<boolean> {
  const logger = deps.logger;
  try {
    const recipients = await loadRecipients(deps.paths.recipients);
    if (!hasRecipients(recipients)) {
      logger.error('No recipients found', { path: deps.paths.recipients });
      return false;
    }
    logger.info('Recipients loaded', { to: recipients.to.length, cc: recipients.cc.length });

    const sender = deps.createSender();
    return await sender.send({
      to: recipients.to,
      cc: recipients.cc.length > 0 ? recipients.cc : undefined,
      subject,
      html,
    });
  } catch (error) {
    logger.error('Error sending email', { error: errorMessage(error) });
    return false;
  }
}

export async function runVeille(options: VeilleOptions, deps: VeilleDependencies): Promise<VeilleResult> {
  const now = deps.now ? deps.now() : new Date();
  const logger = deps.logger.withContext({ type: options.type });

  logger.info('Starting veille run', { days: options.days, dryRun: options.dryRun ?? false });

  const catalog = await loadPromptCatalog(deps.paths.prompts);
  const { prompt, model } = extractPromptData(catalog, options.type, options.days, now);
  logger.info('Prompt loaded', { model, promptWords: prompt.split(/\s+/).filter(Boolean).length });

  const responseText = await withRetry(
    () => deps.client.ask(prompt, model, undefined, REPORT_COMPLETION_OPTIONS),
    { logger, ...deps.retry }
  );

  if (!responseText) {
    logger.warn('No content found in response, nothing to send');
    return { status: 'no_content', model };
  }
  logger.info('Response received', { characters: responseText.length });

  const report = await buildReport(responseText, options.type, options.days, deps.paths.template, logger, now);

  if (options.dryRun) {
    if (options.output) {
      await fs.writeFile(options.output, report.html, 'utf-8');
      logger.info('Report written', { path: options.output });
    } else {
      (deps.writeStdout ?? ((text: string) => process.stdout.write(text)))(`${report.html}\n`);
    }
    return { status: 'dry_run', model, subject: report.subject, html: report.html };
  }

  const sent = await sendReport(deps, report.subject, report.html);
  if (!sent) {
    logger.error('Failed to send email report');
    return { status: 'email_failed', model, subject: report.subject, html: report.html };
  }

  logger.info('Email report sent', { subject: report.subject });
  return { status: 'sent', model, subject: report.subject, html: report.html };
}
