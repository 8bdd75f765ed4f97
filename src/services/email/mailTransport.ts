/**
 * Mail Transport
 *
 * Delivers one rendered email to one recipient over SMTP (nodemailer):
 * - Provider mode (live/mock/disabled)
 * - STARTTLS upgrade, authenticated relay
 * - Exactly one attempt per call, no retry
 * - Errors are logged and reported as `false` by `deliver`
 *
 * @module services/email/mailTransport
 */

import nodemailer, { type SendMailOptions } from 'nodemailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport';
import logger, { redactEmail } from '../../utils/logger';
import { TransportError, getErrorMessage } from '../../utils/errors';

const transportLogger = logger.child({ component: 'mail-transport' });

// ========================================
// TYPES
// ========================================

export type EmailProviderMode = 'live' | 'mock' | 'disabled';

export interface MailTransportConfig {
  host: string;
  port: number;
  username?: string;
  password?: string;
  from: string;
  mode: EmailProviderMode;
}

/**
 * The slice of a nodemailer transporter this module relies on.
 */
export interface SmtpClient {
  sendMail(message: SendMailOptions): Promise<unknown>;
  verify(): Promise<unknown>;
}

export type SmtpClientFactory = (options: SMTPTransport.Options) => SmtpClient;

/**
 * What the campaign dispatcher needs from a transport.
 */
export interface CampaignMailer {
  deliver(to: string, subject: string, html: string, text?: string): Promise<boolean>;
}

const defaultClientFactory: SmtpClientFactory = (options) => nodemailer.createTransport(options);

// ========================================
// TRANSPORT
// ========================================

export class MailTransport implements CampaignMailer {
  private client: SmtpClient | null = null;

  constructor(
    private readonly settings: MailTransportConfig,
    private readonly createClient: SmtpClientFactory = defaultClientFactory
  ) {}

  get mode(): EmailProviderMode {
    return this.settings.mode;
  }

  hasCredentials(): boolean {
    return Boolean(this.settings.username && this.settings.password);
  }

  /**
   * Send one message. Resolves to false on any failure; never throws.
   */
  async deliver(to: string, subject: string, html: string, text?: string): Promise<boolean> {
    if (this.settings.mode === 'disabled') {
      transportLogger.debug('Email provider disabled - delivery skipped', { to: redactEmail(to) });
      return false;
    }

    if (this.settings.mode === 'live' && !this.hasCredentials()) {
      transportLogger.warn('SMTP credentials not configured');
      return false;
    }

    try {
      await this.send(to, subject, html, text);
      return true;
    } catch (error) {
      transportLogger.error('Error sending email', {
        to: redactEmail(to),
        error: getErrorMessage(error),
      });
      return false;
    }
  }

  /**
   * Send one message, surfacing the failure as a TransportError.
   */
  async send(to: string, subject: string, html: string, text?: string): Promise<void> {
    if (this.settings.mode === 'disabled') {
      throw new TransportError('Email provider disabled', to);
    }

    if (this.settings.mode === 'mock') {
      transportLogger.info('MOCK MODE - Email send skipped', {
        to: redactEmail(to),
        subject,
        hasText: Boolean(text),
      });
      return;
    }

    if (!this.hasCredentials()) {
      throw new TransportError('SMTP credentials not configured', to);
    }

    const message: SendMailOptions = {
      from: this.settings.from,
      to,
      subject,
      html,
      ...(text ? { text } : {}),
    };

    try {
      await this.getClient().sendMail(message);
    } catch (error) {
      throw new TransportError(getErrorMessage(error), to);
    }

    transportLogger.debug('Email delivered', { to: redactEmail(to), subject });
  }

  /**
   * Check that the relay accepts a connection and the credentials.
   */
  async verify(): Promise<boolean> {
    if (this.settings.mode !== 'live') {
      return this.settings.mode === 'mock';
    }
    if (!this.hasCredentials()) {
      transportLogger.warn('SMTP credentials not configured');
      return false;
    }

    try {
      await this.getClient().verify();
      transportLogger.info('SMTP relay verified', { host: this.settings.host, port: this.settings.port });
      return true;
    } catch (error) {
      transportLogger.error('SMTP relay verification failed', {
        host: this.settings.host,
        port: this.settings.port,
        error: getErrorMessage(error),
      });
      return false;
    }
  }

  // Not pooled: every sendMail opens its own connection, upgrades it and closes it.
  private getClient(): SmtpClient {
    if (!this.client) {
      const implicitTls = this.settings.port === 465;
      this.client = this.createClient({
        host: this.settings.host,
        port: this.settings.port,
        secure: implicitTls,
        requireTLS: !implicitTls,
        auth: {
          user: this.settings.username ?? '',
          pass: this.settings.password ?? '',
        },
        connectionTimeout: 10_000,
        greetingTimeout: 10_000,
        socketTimeout: 30_000,
      });
    }
    return this.client;
  }
}
