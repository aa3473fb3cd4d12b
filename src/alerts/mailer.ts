import nodemailer from 'nodemailer';
import { logger } from '../logging/index.js';
import { Result, ok, err, toError } from '../shared/result.js';

const log = logger.child('Mailer');

export interface MailMessage {
  from: string;
  to: string;
  subject: string;
  text: string;
}

/**
 * Anything that can deliver a message: a nodemailer transporter, or a fake
 */
export interface MailSender {
  sendMail(message: MailMessage): Promise<unknown>;
}

/**
 * Best-effort delivery. `send` resolves with a Result and never rejects.
 */
export interface MailTransport {
  send(subject: string, body: string): Promise<Result<void>>;
}

export interface SmtpConfig {
  host: string;
  port: number;
  user?: string;
  password?: string;
  recipient?: string;
}

export function isMailConfigured(config: SmtpConfig): boolean {
  return Boolean(config.user && config.password && config.recipient);
}

/**
 * SMTP delivery through nodemailer. Port 465 uses implicit TLS; any other
 * port is upgraded with STARTTLS, which the server must offer.
 */
export function createSmtpSender(config: SmtpConfig): MailSender {
  const secure = config.port === 465;
  return nodemailer.createTransport({
    host: config.host,
    port: config.port,
    secure,
    requireTLS: !secure,
    auth: { user: config.user ?? '', pass: config.password ?? '' },
    connectionTimeout: 10_000,
    greetingTimeout: 10_000,
    socketTimeout: 10_000,
  });
}

export class SmtpMailer implements MailTransport {
  private sender: MailSender | null = null;

  constructor(
    private readonly config: SmtpConfig,
    private readonly createSender: (config: SmtpConfig) => MailSender = createSmtpSender
  ) {
    if (!isMailConfigured(config)) {
      log.info('Mail not configured, rework alerts will only be logged');
    }
  }

  /**
   * Unset user, password or recipient turns sending into a no-op
   */
  async send(subject: string, body: string): Promise<Result<void>> {
    const { user, password, recipient } = this.config;
    if (!user || !password || !recipient) {
      log.debug('Mail not configured, skipping', { subject });
      return ok(undefined);
    }

    try {
      this.sender ??= this.createSender(this.config);
      await this.sender.sendMail({ from: user, to: recipient, subject, text: body });
      log.info('Mail sent', { subject });
      return ok(undefined);
    } catch (cause) {
      const error = toError(cause);
      log.warn('Mail delivery failed', { subject, error: error.message });
      return err(error);
    }
  }
}
