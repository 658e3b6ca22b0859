/**
 * Body selection over the MIME part tree.
 *
 * The first direct sub-part of type text/plain whose decoded content is
 * non-empty after trimming wins. Failing that, the whole message body is
 * used: the decoded body of a single-part message, or the raw text after
 * the header block of a multipart one. HTML-only mail therefore comes
 * through with its markup intact.
 */

import { Splitter, type MimeNode, type SplitterChunk } from 'mailsplit';

interface PartBody {
  node: MimeNode;
  chunks: Buffer[];
}

export async function extractTextBody(source: Buffer | string): Promise<string | undefined> {
  const raw = typeof source === 'string' ? Buffer.from(source) : source;
  const parts = await splitParts(raw);
  const root = parts[0];
  if (!root) return undefined;

  for (const part of parts.slice(1)) {
    if (part.node.parentNode !== root.node || !isPlainText(part.node)) continue;

    const text = (await decodePart(part)).trim();
    if (text) return text;
  }

  const whole = root.node.multipart ? bodyAfterHeaders(raw) : await decodePart(root);
  return whole.trim() || undefined;
}

async function splitParts(raw: Buffer): Promise<PartBody[]> {
  const splitter = new Splitter();
  const parts: PartBody[] = [];
  const byNode = new Map<MimeNode, PartBody>();

  splitter.end(raw);
  for await (const chunk of splitter) {
    const data: SplitterChunk = chunk;
    if (data.type === 'node') {
      const part: PartBody = { node: data, chunks: [] };
      parts.push(part);
      byNode.set(data, part);
    } else if (data.type === 'body') {
      byNode.get(data.node)?.chunks.push(data.value);
    }
  }

  return parts;
}

// A part without a Content-Type header defaults to text/plain
function isPlainText(node: MimeNode): boolean {
  return !node.multipart && (!node.contentType || node.contentType === 'text/plain');
}

async function decodePart(part: PartBody): Promise<string> {
  const decoder = part.node.getDecoder();
  decoder.end(Buffer.concat(part.chunks));

  const out: Buffer[] = [];
  for await (const chunk of decoder) {
    out.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return decodeCharset(Buffer.concat(out), part.node.charset);
}

function decodeCharset(bytes: Buffer, charset: string | false | undefined): string {
  try {
    return new TextDecoder(charset || 'utf-8').decode(bytes);
  } catch {
    // Unknown label
    return new TextDecoder('utf-8').decode(bytes);
  }
}

function bodyAfterHeaders(raw: Buffer): string {
  const text = raw.toString('utf8');
  const match = /\r?\n\r?\n/.exec(text);
  return match ? text.slice(match.index + match[0].length) : '';
}
