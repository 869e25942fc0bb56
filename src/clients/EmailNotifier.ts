import nodemailer from 'nodemailer';
import { EmailConfig } from '../interfaces/BackupConfig';
import { Notifier, NotificationPayload } from '../interfaces/Notifier';
import { BackupStage } from '../interfaces/BackupManager';
import { Logger } from '../interfaces/Logger';

/**
 * Raised when the SMTP server cannot be reached or rejects the message
 */
export class NotifyError extends Error {
  constructor(message: string, public readonly cause?: Error) {
    super(message);
    this.name = 'NotifyError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export interface EmailMessage {
  subject: string;
  text: string;
}

const STAGE_LABELS: Record<BackupStage, string> = {
  [BackupStage.IDLE]: 'idle',
  [BackupStage.DUMPING]: 'database dump',
  [BackupStage.UPLOADING]: 'upload to storage',
  [BackupStage.NOTIFYING]: 'notification',
  [BackupStage.CLEANING_UP]: 'cleanup',
};

export function formatEmail(payload: NotificationPayload): EmailMessage {
  const target = `database '${payload.databaseName}' (${payload.engine})`;
  const when = `${payload.localTimestamp} (${payload.timezone})`;

  if (payload.outcome === 'success') {
    return {
      subject: 'Database Backup - SUCCESS',
      text: `Backup of ${target} completed successfully at ${when}.\n\nStored as: ${payload.remoteKey}`,
    };
  }

  const step = payload.failedStage ? STAGE_LABELS[payload.failedStage] : 'unknown step';
  return {
    subject: 'Database Backup - FAILURE',
    text: `Backup of ${target} failed during ${step} at ${when}.\n\nError: ${payload.errorMessage}`,
  };
}

/**
 * Delivers notifications over SMTP. A transport is opened per message and
 * closed once it has been sent.
 */
export class EmailNotifier implements Notifier {
  constructor(
    private readonly config: EmailConfig,
    private readonly logger: Logger
  ) {}

  async notify(payload: NotificationPayload): Promise<void> {
    const message = formatEmail(payload);
    const transporter = nodemailer.createTransport({
      host: this.config.smtpHost,
      port: this.config.smtpPort,
      // 465 speaks TLS from the start; every other port must upgrade with STARTTLS
      secure: this.config.smtpPort === 465,
      requireTLS: this.config.smtpPort !== 465,
      auth: {
        user: this.config.user,
        pass: this.config.password,
      },
    });

    try {
      await transporter.sendMail({
        from: this.config.from,
        to: this.config.to,
        subject: message.subject,
        text: message.text,
      });
      this.logger.info('Notification email sent', { to: this.config.to, subject: message.subject });
    } catch (error) {
      throw new NotifyError(
        `Failed to send notification email via ${this.config.smtpHost}:${this.config.smtpPort}: ${
          error instanceof Error ? error.message : String(error)
        }`,
        error instanceof Error ? error : undefined
      );
    } finally {
      transporter.close();
    }
  }
}
