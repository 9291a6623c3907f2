/**
 * Email Sender Service
 *
 * Sends the rendered report over SMTP with nodemailer. Sending never
 * throws: failures are logged and reported as `false`.
 */

import nodemailer from 'nodemailer';
import type { SendMailOptions } from 'nodemailer';
import { errorMessage } from './errors.js';
import { defaultLogger, Logger } from './logger.js';
import type { EmailConfig } from './config.js';
import type { EmailMessage } from '../types/index.js';

export interface EmailSender {
  send(message: EmailMessage): Promise<boolean>;
}

/**
 * The part of a nodemailer transporter this sender uses
 */
export interface MailTransport {
  sendMail(mail: SendMailOptions): Promise<unknown>;
  close(): void;
}

export interface SmtpEmailSenderOptions {
  transport?: MailTransport;
  logger?: Logger;
}

/**
 * STARTTLS on 587, implicit TLS on 465
 */
export function createSmtpTransport(config: EmailConfig): MailTransport {
  return nodemailer.createTransport({
    host: config.smtpServer,
    port: config.smtpPort,
    secure: config.smtpPort === 465,
    auth: {
      user: config.email,
      pass: config.password,
    },
  });
}

export function formatSender(config: Pick<EmailConfig, 'email' | 'fromName'>): string {
  return config.fromName ? `"${config.fromName.replace(/"/g, '')}" <${config.email}>` : config.email;
}

export class SmtpEmailSender implements EmailSender {
  private readonly config: EmailConfig;
  private readonly transport: MailTransport;
  private readonly logger: Logger;

  constructor(config: EmailConfig, options: SmtpEmailSenderOptions = {}) {
    this.config = config;
    this.transport = options.transport ?? createSmtpTransport(config);
    this.logger = (options.logger ?? defaultLogger).child({ component: 'emailer' });
  }

  buildMail(message: EmailMessage): SendMailOptions {
    const mail: SendMailOptions = {
      from: formatSender(this.config),
      subject: message.subject,
      html: message.html,
    };
    if (message.to.length > 0) {
      mail.to = message.to.join(', ');
    }
    if (message.cc && message.cc.length > 0) {
      mail.cc = message.cc.join(', ');
    }
    return mail;
  }

  async send(message: EmailMessage): Promise<boolean> {
    const ccCount = message.cc?.length ?? 0;
    if (message.to.length === 0 && ccCount === 0) {
      this.logger.error('No recipients for email', { subject: message.subject });
      return false;
    }

    try {
      await this.transport.sendMail(this.buildMail(message));
      this.logger.info('Email sent', {
        subject: message.subject,
        to: message.to.length,
        cc: ccCount,
      });
      return true;
    } catch (error) {
      this.logger.error('Failed to send email', {
        subject: message.subject,
        error: errorMessage(error),
      });
      return false;
    } finally {
      this.transport.close();
    }
  }
}
