/**
 * Channel Gateway: hosts the channels and the bus between them and the
 * orchestrator.
 *
 *   channel.listen(bus) → bus → recent inbox (+ any consumer)
 *   POST /v1/send → gateway.send(channel, message, recipient) → channel.send
 *
 * Channels are looked up by name(); the gateway doesn't know what kind of
 * transport sits behind each one.
 */

import { v4 as uuid } from 'uuid';
import type { Channel, ChannelMessage, DeliveryReceipt, GatewayHealth } from './types';
import { MessageBus } from './bus';
import { ConfigurationError, describeError } from './errors';

export interface GatewayOptions {
  busCapacity?: number;
  /** How many inbound messages getRecentMessages() can return */
  recentLimit?: number;
}

export class ChannelGateway {
  private channels = new Map<string, Channel>();
  private bus: MessageBus<ChannelMessage>;
  private recent: ChannelMessage[] = [];
  private recentLimit: number;
  private consuming: Promise<void> | null = null;

  constructor(options?: GatewayOptions) {
    this.bus = new MessageBus<ChannelMessage>(options?.busCapacity ?? 100);
    this.recentLimit = options?.recentLimit ?? 100;
  }

  register(channel: Channel): void {
    const name = channel.name();
    if (this.channels.has(name)) {
      throw new ConfigurationError(`Channel "${name}" is already registered`);
    }
    this.channels.set(name, channel);
  }

  getChannelNames(): string[] {
    return [...this.channels.keys()];
  }

  /**
   * Start the inbox consumer and every channel's listener. Listeners run
   * in the background; their exit or failure is only logged.
   */
  start(onMessage?: (message: ChannelMessage) => void): void {
    if (this.consuming) return;

    this.consuming = this.consume(onMessage);

    for (const [name, channel] of this.channels) {
      console.log(`  [gateway] Starting ${name} listener`);
      void channel.listen(this.bus).then(
        () => console.log(`  [gateway] ${name} listener stopped`),
        (err: unknown) => console.error(`  [gateway] ${name} listener failed: ${describeError(err)}`),
      );
    }
  }

  async send(channelName: string, message: string, recipient: string): Promise<DeliveryReceipt> {
    const channel = this.channels.get(channelName);
    if (!channel) {
      throw new ConfigurationError(`Unknown channel "${channelName}"`);
    }

    await channel.send(message, recipient);

    return {
      id: uuid(),
      channel: channelName,
      recipient,
      timestamp: Math.floor(Date.now() / 1000),
    };
  }

  async getHealth(): Promise<GatewayHealth> {
    const channels = await Promise.all(
      [...this.channels.entries()].map(async ([name, channel]) => ({
        name,
        healthy: await channel.healthCheck().catch(() => false),
      })),
    );

    const healthy = channels.filter(c => c.healthy).length;
    const status: GatewayHealth['status'] =
      channels.length > 0 && healthy === channels.length ? 'operational'
        : healthy > 0 ? 'degraded'
          : 'down';

    return { status, uptime: process.uptime(), channels };
  }

  /** Newest first. A limit below 1 counts as no limit. */
  getRecentMessages(limit?: number): ChannelMessage[] {
    const newestFirst = [...this.recent].reverse();
    return limit !== undefined && limit >= 1 ? newestFirst.slice(0, Math.floor(limit)) : newestFirst;
  }

  /**
   * Close the bus and wait for the consumer to drain it. Listeners notice
   * the closed bus at their next handoff or poll cycle.
   */
  async shutdown(): Promise<void> {
    this.bus.close();
    if (this.consuming) await this.consuming;
  }

  private async consume(onMessage?: (message: ChannelMessage) => void): Promise<void> {
    for await (const message of this.bus) {
      this.recent.push(message);
      if (this.recent.length > this.recentLimit) {
        this.recent = this.recent.slice(-this.recentLimit);
      }
      console.log(`  [gateway] ${message.channel} message from ${message.sender}`);
      onMessage?.(message);
    }
  }
}
