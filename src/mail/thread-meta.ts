/**
 * Thread metadata codec
 *
 * The bus only carries opaque strings, so the context needed to reply
 * in-thread (original Message-ID + Subject) rides along in the recipient:
 *
 *   address
 *   address<SEP>{"message_id":...,"subject":...}
 *   address<SEP>uid<SEP>{...}        (legacy, uid segment is ignored)
 *
 * SEP is U+001F, which cannot appear in a valid address, and JSON.stringify
 * always escapes it inside strings.
 */

export const REPLY_META_SEP = '\u001f';

export interface ThreadMetadata {
  readonly message_id?: string;
  readonly subject?: string;
}

export interface RecipientParts {
  address: string;
  thread: ThreadMetadata | undefined;
}

export function encodeThreadMeta(meta: ThreadMetadata): string | undefined {
  if (meta.message_id === undefined && meta.subject === undefined) return undefined;

  return JSON.stringify({
    message_id: meta.message_id ?? null,
    subject: meta.subject ?? null,
  });
}

export function decodeThreadMeta(raw: string): ThreadMetadata | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return undefined;

  const messageId = readOptionalString(parsed, 'message_id');
  const subject = readOptionalString(parsed, 'subject');
  if (messageId === null || subject === null) return undefined;

  const meta: { message_id?: string; subject?: string } = {};
  if (messageId !== undefined) meta.message_id = messageId;
  if (subject !== undefined) meta.subject = subject;
  return Object.freeze(meta);
}

export function splitRecipient(recipient: string): RecipientParts {
  const sepAt = recipient.indexOf(REPLY_META_SEP);
  if (sepAt === -1) return { address: recipient, thread: undefined };

  const address = recipient.slice(0, sepAt);
  const rest = recipient.slice(sepAt + REPLY_META_SEP.length);

  const thread = decodeThreadMeta(rest);
  if (thread) return { address, thread };

  const legacySepAt = rest.indexOf(REPLY_META_SEP);
  if (legacySepAt !== -1) {
    return { address, thread: decodeThreadMeta(rest.slice(legacySepAt + REPLY_META_SEP.length)) };
  }

  return { address, thread: undefined };
}

export function buildRecipient(address: string, meta?: ThreadMetadata): string {
  const encoded = meta ? encodeThreadMeta(meta) : undefined;
  return encoded === undefined ? address : `${address}${REPLY_META_SEP}${encoded}`;
}

/**
 * undefined = key missing or JSON null, null = present with the wrong type.
 */
function readOptionalString(obj: object, key: string): string | undefined | null {
  const value: unknown = Reflect.get(obj, key);
  if (value === undefined || value === null) return undefined;
  return typeof value === 'string' ? value : null;
}
