/**
 * Reply composer: markdown body + thread context → threaded multipart mail
 *
 * The plain-text alternative is the markdown exactly as written; the HTML
 * alternative is its GFM rendering. In-Reply-To and References both point
 * at the original Message-ID so mail clients file the reply in-thread.
 */

import { Marked } from 'marked';
import type Mail from 'nodemailer/lib/mailer';
import { ConfigurationError } from '../core/errors';
import type { ThreadMetadata } from './thread-meta';

export const DEFAULT_REPLY_SUBJECT = 'Gateway reply';

// GFM covers tables, strikethrough and task lists
const markdown = new Marked({ gfm: true });

export function validateEmailIdentity(value: string): boolean {
  const trimmed = value.trim();
  return trimmed.length > 0
    && trimmed.includes('@')
    && !trimmed.includes('\n')
    && !trimmed.includes('\r');
}

export function replySubject(subject: string | undefined): string {
  const trimmed = subject?.trim();
  if (!trimmed) return DEFAULT_REPLY_SUBJECT;

  return trimmed.toLowerCase().startsWith('re:') ? trimmed : `Re: ${trimmed}`;
}

export function markdownToHtml(source: string): string {
  return markdown.parse(source, { async: false });
}

export interface ReplyInput {
  from: string;
  to: string;
  body: string;
  thread?: ThreadMetadata;
}

export function buildReplyMail({ from, to, body, thread }: ReplyInput): Mail.Options {
  if (!validateEmailIdentity(from)) {
    throw new ConfigurationError('Invalid from address for email channel');
  }
  if (!validateEmailIdentity(to)) {
    throw new ConfigurationError('Invalid email recipient');
  }

  const mail: Mail.Options = {
    from: from.trim(),
    to: to.trim(),
    subject: replySubject(thread?.subject),
    text: body,
    html: markdownToHtml(body),
  };

  const messageId = thread?.message_id?.trim();
  if (messageId) {
    mail.inReplyTo = messageId;
    mail.references = messageId;
  }

  return mail;
}
