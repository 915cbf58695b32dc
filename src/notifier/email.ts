/**
 * Email notifier
 *
 * Sends one summary message per run that produced keyword matches.
 */

import nodemailer, { type SendMailOptions } from 'nodemailer';
import { NotificationError, errorMessage } from '../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import type { MonitorConfig } from '../config/index.js';
import type { MatchResult } from '../types/index.js';

/**
 * Anything that can deliver a message (a nodemailer transporter)
 */
export interface MailTransport {
  sendMail(options: SendMailOptions): Promise<unknown>;
}

export interface Notifier {
  /**
   * Resolve null when there is nothing to send
   */
  notify(matches: readonly MatchResult[]): Promise<SentSummary | null>;
}

export interface SentSummary {
  recipient: string;
  subject: string;
  matchCount: number;
}

export interface EmailNotifierOptions {
  sender: string;
  recipient: string;
  subject: string;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function renderText(matches: readonly MatchResult[]): string {
  let body = 'Se encontraron actualizaciones en los boletines técnicos del SAT:\n\n';
  for (const match of matches) {
    body += `- ${match.document}: ${match.keywords.join(', ')}\n`;
    body += `  URL: ${match.url}\n`;
    body += `  Procesado: ${match.processedAt}\n\n`;
  }
  return body;
}

export function renderHtml(matches: readonly MatchResult[]): string {
  const items = matches
    .map(
      (match) =>
        '<li>' +
        `<strong>${escapeHtml(match.document)}</strong><br>` +
        `Palabras clave: ${escapeHtml(match.keywords.join(', '))}<br>` +
        `<a href="${escapeHtml(match.url)}">Ver documento</a><br>` +
        `Procesado: ${escapeHtml(match.processedAt)}` +
        '</li>'
    )
    .join('\n');

  return [
    '<html>',
    '<body>',
    '<h2>Actualizaciones en Boletines Técnicos del SAT</h2>',
    '<p>Se encontraron las siguientes actualizaciones:</p>',
    '<ul>',
    items,
    '</ul>',
    '</body>',
    '</html>',
  ].join('\n');
}

export class EmailNotifier implements Notifier {
  private readonly logger: Logger;

  constructor(
    private readonly transport: MailTransport,
    private readonly options: EmailNotifierOptions,
    logger: Logger = defaultLogger
  ) {
    this.logger = logger;
  }

  async notify(matches: readonly MatchResult[]): Promise<SentSummary | null> {
    if (matches.length === 0) {
      this.logger.info('No updates to send');
      return null;
    }

    try {
      await this.transport.sendMail({
        from: this.options.sender,
        to: this.options.recipient,
        subject: this.options.subject,
        text: renderText(matches),
        html: renderHtml(matches),
      });
    } catch (error) {
      throw new NotificationError(`Failed to send email: ${errorMessage(error)}`, error);
    }

    this.logger.info({ matches: matches.length, recipient: this.options.recipient }, 'Email sent');
    return {
      recipient: this.options.recipient,
      subject: this.options.subject,
      matchCount: matches.length,
    };
  }
}

/**
 * SMTP submission with STARTTLS (port 587), authenticated as the sender
 */
export function createSmtpTransport(email: MonitorConfig['email']): MailTransport {
  return nodemailer.createTransport({
    host: email.smtpHost,
    port: email.smtpPort,
    secure: email.smtpPort === 465,
    requireTLS: email.smtpPort !== 465,
    auth: {
      user: email.sender,
      pass: email.password,
    },
    connectionTimeout: 10000,
    greetingTimeout: 10000,
    socketTimeout: 30000,
  });
}

export function createEmailNotifier(email: MonitorConfig['email'], logger?: Logger): EmailNotifier {
  return new EmailNotifier(
    createSmtpTransport(email),
    { sender: email.sender, recipient: email.recipient, subject: email.subject },
    logger
  );
}
