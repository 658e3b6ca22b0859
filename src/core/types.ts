/**
 * Core Types: Shared vocabulary for the channel gateway
 *
 * - ChannelMessage = one normalized inbound message on the bus
 * - Channel        = a pluggable transport (email today, others later)
 * - MessageSink    = the receiving end a listener pushes into
 */

// ─── Messages ───────────────────────────────────────────────────────

export type ChannelType = 'email';

export interface ChannelMessage {
  /** Dedup key, stable for the same physical message within one process */
  id: string;
  sender: string;
  content: string;
  channel: ChannelType;
  /** Unix seconds */
  timestamp: number;
}

// ─── Channels ───────────────────────────────────────────────────────

export interface MessageSink<T = ChannelMessage> {
  /** Resolves false once the receiving side has gone away. */
  send(item: T): Promise<boolean>;
  isClosed(): boolean;
}

export interface Channel {
  name(): string;
  send(message: string, recipient: string): Promise<void>;
  /**
   * Runs until the sink closes. Rejects only on a setup error the
   * channel cannot recover from by retrying.
   */
  listen(sink: MessageSink): Promise<void>;
  healthCheck(): Promise<boolean>;
}

// ─── Gateway ────────────────────────────────────────────────────────

export interface DeliveryReceipt {
  id: string;
  channel: string;
  recipient: string;
  timestamp: number;
}

export interface GatewayHealth {
  status: 'operational' | 'degraded' | 'down';
  uptime: number;
  channels: Array<{ name: string; healthy: boolean }>;
}
