/**
 * HTTP surface over a ChannelGateway
 *
 *   GET  /v1/health    gateway health, 503 when down
 *   POST /v1/send      { message, recipient, channel? } → delivery receipt
 *   GET  /v1/messages  recent inbound messages, newest first (?limit=N)
 */

import express from 'express';
import type { ChannelGateway } from './core/gateway';
import { ConfigurationError, ProtocolError, describeError } from './core/errors';

export function createApp(gateway: ChannelGateway): express.Express {
  const app = express();
  app.use(express.json());

  app.get('/v1/health', async (_req, res) => {
    const health = await gateway.getHealth();
    res.status(health.status === 'down' ? 503 : 200).json(health);
  });

  /**
   * POST /v1/send: Send a reply through a channel
   * Body: { message: string, recipient: string, channel?: string (default "email") }
   */
  app.post('/v1/send', async (req, res) => {
    const { message, recipient, channel } = req.body ?? {};
    if (typeof message !== 'string' || message.length === 0) {
      res.status(400).json({ error: 'Missing "message" field' });
      return;
    }
    if (typeof recipient !== 'string' || recipient.length === 0) {
      res.status(400).json({ error: 'Missing "recipient" field' });
      return;
    }

    try {
      const receipt = await gateway.send(typeof channel === 'string' ? channel : 'email', message, recipient);
      res.json(receipt);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        res.status(400).json({ error: error.message });
        return;
      }
      if (error instanceof ProtocolError) {
        console.error(`  [gateway] Send failed: ${describeError(error)}`);
        res.status(502).json({ error: error.message });
        return;
      }
      console.error('Send error:', error);
      res.status(500).json({ error: 'Internal gateway error' });
    }
  });

  app.get('/v1/messages', (req, res) => {
    res.json({ messages: gateway.getRecentMessages(parseLimit(req.query.limit)) });
  });

  return app;
}

/** Positive integer or nothing; anything else means "no limit". */
export function parseLimit(raw: unknown): number | undefined {
  if (typeof raw !== 'string') return undefined;
  const limit = parseInt(raw, 10);
  return Number.isFinite(limit) && limit > 0 ? limit : undefined;
}
