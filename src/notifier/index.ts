/**
 * Notifier Module
 */

export {
  EmailNotifier,
  createEmailNotifier,
  createSmtpTransport,
  escapeHtml,
  renderHtml,
  renderText,
  type EmailNotifierOptions,
  type MailTransport,
  type Notifier,
  type SentSummary,
} from './email.js';
