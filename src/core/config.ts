/**
 * Default Configuration for the email channel gateway
 *
 * Values come from the environment (loaded by dotenv in index.ts).
 * Anything unset or unparseable falls back to DEFAULT_EMAIL_CONFIG.
 */

export interface ImapConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  /** true = plain connect then STARTTLS, false = implicit TLS */
  starttls: boolean;
  folder: string;
}

export interface SmtpConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  /** true = STARTTLS required, false = implicit TLS */
  starttls: boolean;
}

export interface EmailConfig {
  imap: ImapConfig;
  smtp: SmtpConfig;
  fromAddress: string;
  /** Floored to MIN_POLL_INTERVAL_SECS by the listener */
  pollIntervalSecs: number;
  /** Exact addresses, or '*' for anyone. Empty denies everyone. */
  allowedSenders: string[];
  /** Unset keeps every dedup key for the life of the process */
  seenIdCapacity?: number;
}

export interface ServerConfig {
  port: number;
}

export const MIN_POLL_INTERVAL_SECS = 5;

export const DEFAULT_EMAIL_CONFIG: EmailConfig = {
  imap: {
    host: '',
    port: 993,
    user: '',
    password: '',
    starttls: false,
    folder: 'INBOX',
  },
  smtp: {
    host: '',
    port: 587,
    user: '',
    password: '',
    starttls: true,
  },
  fromAddress: '',
  pollIntervalSecs: 60,
  allowedSenders: [],
};

type Env = Record<string, string | undefined>;

export function loadEmailConfig(env: Env = process.env): EmailConfig {
  const defaults = DEFAULT_EMAIL_CONFIG;
  const imapUser = env.EMAIL_IMAP_USER ?? defaults.imap.user;
  const imapPassword = env.EMAIL_IMAP_PASSWORD ?? defaults.imap.password;

  return {
    imap: {
      host: env.EMAIL_IMAP_HOST ?? defaults.imap.host,
      port: parseNumber(env.EMAIL_IMAP_PORT, defaults.imap.port),
      user: imapUser,
      password: imapPassword,
      starttls: parseBool(env.EMAIL_IMAP_STARTTLS, defaults.imap.starttls),
      folder: env.EMAIL_IMAP_FOLDER || defaults.imap.folder,
    },
    smtp: {
      host: env.EMAIL_SMTP_HOST ?? defaults.smtp.host,
      port: parseNumber(env.EMAIL_SMTP_PORT, defaults.smtp.port),
      user: env.EMAIL_SMTP_USER ?? imapUser,
      password: env.EMAIL_SMTP_PASSWORD ?? imapPassword,
      starttls: parseBool(env.EMAIL_SMTP_STARTTLS, defaults.smtp.starttls),
    },
    fromAddress: env.EMAIL_FROM ?? defaults.fromAddress,
    pollIntervalSecs: parseNumber(env.EMAIL_POLL_INTERVAL_SECS, defaults.pollIntervalSecs),
    allowedSenders: parseList(env.EMAIL_ALLOWED_SENDERS),
    seenIdCapacity: env.EMAIL_SEEN_CAPACITY ? parseNumber(env.EMAIL_SEEN_CAPACITY, 0) || undefined : undefined,
  };
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  return { port: parseNumber(env.PORT, 3000) };
}

function parseNumber(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const n = parseInt(raw, 10);
  return Number.isFinite(n) && n >= 0 ? n : fallback;
}

function parseBool(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined) return fallback;
  switch (raw.trim().toLowerCase()) {
    case 'true': case '1': case 'yes': return true;
    case 'false': case '0': case 'no': return false;
    default: return fallback;
  }
}

// Comma list; whitespace around entries is dropped (env files often add it)
function parseList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map(s => s.trim())
    .filter(s => s.length > 0);
}
