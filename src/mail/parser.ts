/**
 * Inbound mail parser: raw RFC 822 source → InboundEmail
 *
 * Anything that can't yield a sender and a non-empty body throws
 * ParseError; the listener skips that one message and carries on.
 */

import { simpleParser, type AddressObject, type EmailAddress, type HeaderLines, type ParsedMail } from 'mailparser';
import { ParseError } from '../core/errors';
import { extractTextBody } from './mime-body';
import type { ThreadMetadata } from './thread-meta';

export interface InboundEmail {
  /** IMAP UID in the selected folder; only stable while UIDVALIDITY is */
  uid: string;
  sender: string;
  content: string;
  thread: ThreadMetadata;
}

export async function parseInboundEmail(uid: string, source: Buffer | string): Promise<InboundEmail> {
  let parsed: ParsedMail;
  try {
    parsed = await simpleParser(source, { skipHtmlToText: true, skipTextToHtml: true });
  } catch (err) {
    throw new ParseError(`Malformed MIME in message ${uid}`, { cause: err });
  }

  const sender = senderFromAddresses(parsed.from);
  if (!sender) throw new ParseError(`No sender address in message ${uid}`);

  let content: string | undefined;
  try {
    content = await extractTextBody(source);
  } catch (err) {
    throw new ParseError(`Unreadable body in message ${uid}`, { cause: err });
  }
  if (!content) throw new ParseError(`No text content in message ${uid}`);

  const thread: { message_id?: string; subject?: string } = {};
  const messageId = rawHeaderValue(parsed.headerLines, 'message-id') ?? parsed.messageId;
  if (messageId !== undefined) thread.message_id = messageId;
  const subject = rawHeaderValue(parsed.headerLines, 'subject') ?? parsed.subject;
  if (subject !== undefined) thread.subject = subject;

  return { uid, sender, content, thread: Object.freeze(thread) };
}

/**
 * First resolvable address of the From list. A group contributes its
 * first member; entries with no address are passed over.
 */
export function senderFromAddresses(from: AddressObject | undefined): string | undefined {
  if (!from) return undefined;

  for (const entry of from.value) {
    const address = entry.address || firstGroupAddress(entry);
    if (address) return address;
  }
  return undefined;
}

/**
 * First occurrence of a header as written: folding removed and the space
 * after the colon dropped, nothing else touched. Returns undefined for
 * values that need decoding (encoded words, 8-bit bytes) so the caller can
 * fall back to the parser's decoded form.
 */
export function rawHeaderValue(lines: HeaderLines, key: string): string | undefined {
  const header = lines.find(entry => entry.key === key);
  if (!header) return undefined;

  const colon = header.line.indexOf(':');
  const value = header.line
    .slice(colon + 1)
    .replace(/\r?\n(?=[ \t])/g, '')
    .replace(/^[ \t]+/, '');

  if (value.includes('=?') || !/^[\x20-\x7e\t]*$/.test(value)) return undefined;
  return value;
}

function firstGroupAddress(entry: EmailAddress): string | undefined {
  return entry.group?.[0]?.address || undefined;
}
