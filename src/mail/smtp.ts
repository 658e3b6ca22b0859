/**
 * SMTP transport: one nodemailer transport per send, never pooled.
 */

import nodemailer from 'nodemailer';
import type Mail from 'nodemailer/lib/mailer';
import type { SmtpConfig } from '../core/config';

export interface MailTransport {
  sendMail(mail: Mail.Options): Promise<unknown>;
  verify(): Promise<boolean>;
  close(): void;
}

export type TransportFactory = (config: SmtpConfig) => MailTransport;

export const createSmtpTransport: TransportFactory = (config) => {
  return nodemailer.createTransport({
    host: config.host,
    port: config.port,
    secure: !config.starttls,
    requireTLS: config.starttls,
    auth: {
      user: config.user,
      pass: config.password,
    },
  });
};
