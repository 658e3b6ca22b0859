import { describe, it, expect } from 'vitest';
import { DEFAULT_EMAIL_CONFIG, loadEmailConfig, loadServerConfig } from './config';

describe('loadEmailConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadEmailConfig({})).toEqual({ ...DEFAULT_EMAIL_CONFIG, seenIdCapacity: undefined });
  });

  it('reads every recognised key', () => {
    const config = loadEmailConfig({
      EMAIL_IMAP_HOST: 'imap.example.com',
      EMAIL_IMAP_PORT: '143',
      EMAIL_IMAP_USER: 'bot@example.com',
      EMAIL_IMAP_PASSWORD: 'test-secret',
      EMAIL_IMAP_STARTTLS: 'yes',
      EMAIL_IMAP_FOLDER: 'Support',
      EMAIL_SMTP_HOST: 'smtp.example.com',
      EMAIL_SMTP_PORT: '465',
      EMAIL_SMTP_USER: 'sender@example.com',
      EMAIL_SMTP_PASSWORD: 'other-secret',
      EMAIL_SMTP_STARTTLS: 'false',
      EMAIL_FROM: 'bot@example.com',
      EMAIL_POLL_INTERVAL_SECS: '30',
      EMAIL_ALLOWED_SENDERS: ' alice@example.com , bob@example.com ,, ',
      EMAIL_SEEN_CAPACITY: '1000',
    });

    expect(config).toEqual({
      imap: {
        host: 'imap.example.com',
        port: 143,
        user: 'bot@example.com',
        password: 'test-secret',
        starttls: true,
        folder: 'Support',
      },
      smtp: {
        host: 'smtp.example.com',
        port: 465,
        user: 'sender@example.com',
        password: 'other-secret',
        starttls: false,
      },
      fromAddress: 'bot@example.com',
      pollIntervalSecs: 30,
      allowedSenders: ['alice@example.com', 'bob@example.com'],
      seenIdCapacity: 1000,
    });
  });

  it('reuses the IMAP login for SMTP when none is given', () => {
    const config = loadEmailConfig({ EMAIL_IMAP_USER: 'bot@example.com', EMAIL_IMAP_PASSWORD: 'test-secret' });
    expect(config.smtp.user).toBe('bot@example.com');
    expect(config.smtp.password).toBe('test-secret');
  });

  it('ignores values it cannot parse', () => {
    const config = loadEmailConfig({
      EMAIL_IMAP_PORT: 'imap',
      EMAIL_SMTP_STARTTLS: 'maybe',
      EMAIL_POLL_INTERVAL_SECS: '-4',
      EMAIL_SEEN_CAPACITY: 'lots',
    });
    expect(config.imap.port).toBe(993);
    expect(config.smtp.starttls).toBe(true);
    expect(config.pollIntervalSecs).toBe(60);
    expect(config.seenIdCapacity).toBeUndefined();
  });

  it('keeps the wildcard sender', () => {
    expect(loadEmailConfig({ EMAIL_ALLOWED_SENDERS: '*' }).allowedSenders).toEqual(['*']);
  });
});

describe('loadServerConfig', () => {
  it('defaults the port to 3000', () => {
    expect(loadServerConfig({}).port).toBe(3000);
    expect(loadServerConfig({ PORT: '8080' }).port).toBe(8080);
  });
});
