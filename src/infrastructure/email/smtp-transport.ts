import nodemailer from 'nodemailer';
import { ok, err, type Result } from 'neverthrow';
import type { Logger } from 'pino';
import { describeError } from '../../application/index.js';
import type { EmailTransport, OutgoingEmail, TransportError, TransportReceipt } from '../../application/index.js';

export interface SmtpConfig {
  host: string;
  port: number;
  username?: string;
  password?: string;
  from: string;
}

/** The part of a nodemailer transporter this adapter uses. */
export interface MailSender {
  sendMail(mail: { from: string; to: string; subject: string; html: string }): Promise<{ messageId: string }>;
  close(): void;
}

export function createSmtpSender(config: SmtpConfig): MailSender {
  return nodemailer.createTransport({
    host: config.host,
    port: config.port,
    secure: config.port === 465,
    ...(config.username !== undefined
      ? { auth: { user: config.username, pass: config.password ?? '' } }
      : {}),
  });
}

/**
 * SMTP email transport backed by nodemailer.
 */
export class SmtpEmailTransport implements EmailTransport {
  private closed = false;

  constructor(
    private readonly sender: MailSender,
    private readonly from: string,
    private readonly log: Logger,
  ) {}

  static fromConfig(config: SmtpConfig, log: Logger): SmtpEmailTransport {
    return new SmtpEmailTransport(createSmtpSender(config), config.from, log);
  }

  async send(email: OutgoingEmail): Promise<Result<TransportReceipt, TransportError>> {
    if (email.to.trim() === '') {
      return err({ type: 'INVALID_RECIPIENT', message: 'Recipient email address is empty' });
    }

    try {
      const info = await this.sender.sendMail({ from: this.from, to: email.to, subject: email.subject, html: email.html });
      this.log.info({ to: email.to, subject: email.subject, messageId: info.messageId }, 'Email sent');
      return ok({ messageId: info.messageId });
    } catch (error: unknown) {
      this.log.warn({ err: error, to: email.to, subject: email.subject }, 'SMTP send failed');
      return err({ type: 'SEND_FAILED', message: describeError(error) });
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.sender.close();
  }
}
