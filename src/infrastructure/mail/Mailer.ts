// Infrastructure: Mail transports
// `console` logs who would receive what (development); `smtp` delivers through nodemailer

import nodemailer, { type Transporter } from 'nodemailer';
import type { IMailer, MailMessage } from '@/domain/mail/types.js';
import type { MailConfig } from '@/utils/config.js';
import { Logger, mailLogger } from '@/utils/logger.js';
import { renderMail } from './templates.js';

export class ConsoleMailer implements IMailer {
  constructor(private logger: Logger = mailLogger) {}

  async send(message: MailMessage): Promise<void> {
    const rendered = renderMail(message);
    // Body omitted: it carries a live token link
    this.logger.info('Mail (console driver)', {
      to: message.to,
      template: message.template,
      subject: rendered.subject,
    });
  }
}

export class NodemailerMailer implements IMailer {
  constructor(
    private transporter: Pick<Transporter, 'sendMail'>,
    private from: string,
    private logger: Logger = mailLogger
  ) {}

  async send(message: MailMessage): Promise<void> {
    const rendered = renderMail(message);
    await this.transporter.sendMail({
      from: this.from,
      to: message.to,
      subject: rendered.subject,
      text: rendered.text,
      html: rendered.html,
    });
    this.logger.info('Mail sent', { to: message.to, template: message.template });
  }
}

/**
 * Pick the mail driver from configuration
 */
export function createMailer(config: MailConfig, logger: Logger = mailLogger): IMailer {
  if (config.driver === 'smtp') {
    if (!config.smtpUrl) {
      throw new Error('SMTP_URL must be configured when MAILER_DRIVER is set to smtp');
    }
    const from = config.fromName ? `${config.fromName} <${config.from}>` : config.from;
    return new NodemailerMailer(nodemailer.createTransport(config.smtpUrl), from, logger);
  }

  return new ConsoleMailer(logger);
}
