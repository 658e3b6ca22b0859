/**
 * IMAP mailbox access
 *
 * Every call opens its own session and logs out before returning, so a
 * session never outlives one poll cycle or one health probe. All socket
 * I/O is promise-based (imapflow), which keeps the polling cadence from
 * holding up anything else running in the process.
 */

import { ImapFlow } from 'imapflow';
import type { ImapConfig } from '../core/config';
import { ProtocolError, describeError } from '../core/errors';

export interface RawMessage {
  uid: string;
  source: Buffer;
}

export interface MailboxClient {
  /**
   * Fetch every unseen message in the folder, in search order, marking
   * each one seen. Rejects if anything up to and including a fetch fails;
   * no partial batch is ever returned.
   */
  fetchUnseen(): Promise<RawMessage[]>;
  /** Login + select, then logout. */
  probe(): Promise<void>;
}

export class ImapMailbox implements MailboxClient {
  constructor(private readonly config: ImapConfig) {}

  async fetchUnseen(): Promise<RawMessage[]> {
    return this.withSession(async (client) => {
      const lock = await this.step('select folder', () => client.getMailboxLock(this.config.folder));
      try {
        const uids = await this.step('search', () => client.search({ seen: false }, { uid: true }));
        const out: RawMessage[] = [];

        for (const uid of uids || []) {
          const range = String(uid);
          const message = await this.step(`fetch ${range}`, () =>
            client.fetchOne(range, { uid: true, source: true }, { uid: true })
          );
          if (message && message.source) {
            out.push({ uid: range, source: message.source });
          }

          try {
            await client.messageFlagsAdd(range, ['\\Seen'], { uid: true });
          } catch (err) {
            console.warn(`  [email] Could not mark message ${range} seen: ${describeError(err)}`);
          }
        }

        return out;
      } finally {
        lock.release();
      }
    });
  }

  async probe(): Promise<void> {
    await this.withSession(async (client) => {
      const lock = await this.step('select folder', () => client.getMailboxLock(this.config.folder));
      lock.release();
    });
  }

  private createClient(): ImapFlow {
    return new ImapFlow({
      host: this.config.host,
      port: this.config.port,
      secure: !this.config.starttls,
      auth: {
        user: this.config.user,
        pass: this.config.password,
      },
      logger: false,
    });
  }

  private async withSession<T>(work: (client: ImapFlow) => Promise<T>): Promise<T> {
    const client = this.createClient();
    // Socket errors surface here as well as on the pending command
    client.on('error', (err: unknown) => {
      console.warn(`  [email] IMAP connection error: ${describeError(err)}`);
    });

    await this.step('connect/login', () => client.connect());
    try {
      return await work(client);
    } finally {
      try {
        await client.logout();
      } catch (err) {
        console.warn(`  [email] IMAP logout failed: ${describeError(err)}`);
      }
    }
  }

  private async step<T>(what: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (err) {
      if (err instanceof ProtocolError) throw err;
      throw new ProtocolError('imap', `IMAP ${what} failed`, { cause: err });
    }
  }
}
