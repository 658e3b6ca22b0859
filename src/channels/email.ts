/**
 * Email Channel: Bidirectional email over IMAP + SMTP
 *
 * Inbound (Mailbox → Bus):
 *   - Poll the folder for unseen mail every pollIntervalSecs (min 5s)
 *   - Dedup by uid + encoded thread metadata
 *   - Drop senders not on the allow-list
 *
 * Outbound (Caller → Human):
 *   - Recipient carries the thread context (see thread-meta.ts)
 *   - Threaded subject + In-Reply-To/References
 *   - Markdown rendered to an HTML alternative
 *
 * Health: IMAP login/select + SMTP verify, collapsed to one boolean.
 */

import type { Channel, ChannelMessage, MessageSink } from '../core/types';
import { type EmailConfig, MIN_POLL_INTERVAL_SECS } from '../core/config';
import { ConfigurationError, ParseError, ProtocolError, describeError } from '../core/errors';
import { ImapMailbox, type MailboxClient } from '../mail/imap';
import { type InboundEmail, parseInboundEmail } from '../mail/parser';
import { REPLY_META_SEP, encodeThreadMeta, splitRecipient } from '../mail/thread-meta';
import { buildReplyMail, validateEmailIdentity } from '../mail/compose';
import { type MailTransport, type TransportFactory, createSmtpTransport } from '../mail/smtp';
import { isSenderAllowed } from '../rbac/senders';
import { SeenIdSet } from './seen-ids';

export interface EmailChannelOptions {
  mailbox?: MailboxClient;
  transportFactory?: TransportFactory;
  /** Inter-cycle wait; swapped out in tests */
  sleep?: (ms: number) => Promise<void>;
}

export class EmailChannel implements Channel {
  private config: EmailConfig;
  private mailbox: MailboxClient;
  private transportFactory: TransportFactory;
  private sleep: (ms: number) => Promise<void>;

  constructor(config: EmailConfig, options?: EmailChannelOptions) {
    this.config = config;
    this.mailbox = options?.mailbox ?? new ImapMailbox(config.imap);
    this.transportFactory = options?.transportFactory ?? createSmtpTransport;
    this.sleep = options?.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));
  }

  name(): string {
    return 'email';
  }

  // ─── Outbound: Caller → Human ─────────────────────────────────

  async send(message: string, recipient: string): Promise<void> {
    const { address, thread } = splitRecipient(recipient);
    const mail = buildReplyMail({
      from: this.config.fromAddress,
      to: address,
      body: message,
      thread,
    });

    let transport: MailTransport;
    try {
      transport = this.transportFactory(this.config.smtp);
    } catch (err) {
      throw new ProtocolError('smtp', 'Could not create SMTP transport', { cause: err });
    }

    try {
      await transport.sendMail(mail);
    } catch (err) {
      throw new ProtocolError('smtp', `SMTP send to ${address} failed`, { cause: err });
    } finally {
      transport.close();
    }
  }

  // ─── Inbound: Mailbox → Bus ───────────────────────────────────

  async listen(sink: MessageSink): Promise<void> {
    if (!this.config.imap.host || !this.config.imap.user) {
      throw new ConfigurationError('Email channel needs an IMAP host and login to listen');
    }

    const pollEveryMs = Math.max(this.config.pollIntervalSecs, MIN_POLL_INTERVAL_SECS) * 1000;
    const seen = new SeenIdSet(this.config.seenIdCapacity);

    console.log(`  [email] Listening on folder ${this.config.imap.folder} (every ${pollEveryMs / 1000}s)`);

    for (;;) {
      if (sink.isClosed()) break;

      let batch: InboundEmail[] | null = null;
      try {
        batch = await this.pollUnseen();
      } catch (err) {
        console.warn(`  [email] Poll error: ${describeError(err)}`);
      }

      for (const inbound of batch ?? []) {
        const id = dedupKey(inbound);
        if (!seen.add(id)) continue;

        if (!isSenderAllowed(inbound.sender, this.config.allowedSenders)) {
          console.warn(`  [email] Ignoring message from unauthorized sender: ${inbound.sender}`);
          continue;
        }

        const channelMessage: ChannelMessage = {
          id,
          sender: inbound.sender,
          content: inbound.content,
          channel: 'email',
          timestamp: Math.floor(Date.now() / 1000),
        };

        if (!(await sink.send(channelMessage))) {
          console.log('  [email] Bus closed, listener stopping');
          return;
        }
      }

      await this.sleep(pollEveryMs);
    }

    console.log('  [email] Bus closed, listener stopping');
  }

  /**
   * One cycle: fetch the whole unseen batch, then parse. A fetch failure
   * rejects the cycle; a message that fails to parse is just skipped.
   */
  private async pollUnseen(): Promise<InboundEmail[]> {
    const raw = await this.mailbox.fetchUnseen();
    const out: InboundEmail[] = [];

    for (const message of raw) {
      try {
        out.push(await parseInboundEmail(message.uid, message.source));
      } catch (err) {
        if (!(err instanceof ParseError)) throw err;
        console.debug(`  [email] Skipping message ${message.uid}: ${err.message}`);
      }
    }

    return out;
  }

  // ─── Health ───────────────────────────────────────────────────

  async healthCheck(): Promise<boolean> {
    if (!validateEmailIdentity(this.config.fromAddress)) {
      console.warn('  [email] Health: invalid from address');
      return false;
    }

    try {
      await this.mailbox.probe();
    } catch (err) {
      console.warn(`  [email] Health: IMAP unreachable: ${describeError(err)}`);
      return false;
    }

    try {
      const transport = this.transportFactory(this.config.smtp);
      try {
        return await transport.verify();
      } finally {
        transport.close();
      }
    } catch (err) {
      console.warn(`  [email] Health: SMTP unreachable: ${describeError(err)}`);
      return false;
    }
  }
}

export function dedupKey(inbound: InboundEmail): string {
  const meta = encodeThreadMeta(inbound.thread);
  return meta === undefined ? inbound.uid : `${inbound.uid}${REPLY_META_SEP}${meta}`;
}
