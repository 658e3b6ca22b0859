import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ChannelGateway } from './gateway';
import { ConfigurationError } from './errors';
import type { Channel, ChannelMessage, MessageSink } from './types';

function message(id: string): ChannelMessage {
  return { id, sender: 'alice@example.com', content: `body ${id}`, channel: 'email', timestamp: 1_700_000_000 };
}

function fakeChannel(name: string, overrides: Partial<Channel> = {}): Channel {
  return {
    name: () => name,
    send: vi.fn(async () => {}),
    listen: vi.fn(async () => {}),
    healthCheck: vi.fn(async () => true),
    ...overrides,
  };
}

describe('ChannelGateway', () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('refuses two channels with the same name', () => {
    const gateway = new ChannelGateway();
    gateway.register(fakeChannel('email'));

    expect(() => gateway.register(fakeChannel('email'))).toThrow(ConfigurationError);
    expect(gateway.getChannelNames()).toEqual(['email']);
  });

  it('dispatches sends by channel name and returns a receipt', async () => {
    const email = fakeChannel('email');
    const gateway = new ChannelGateway();
    gateway.register(email);

    const receipt = await gateway.send('email', 'hello', 'alice@example.com');

    expect(email.send).toHaveBeenCalledWith('hello', 'alice@example.com');
    expect(receipt.channel).toBe('email');
    expect(receipt.recipient).toBe('alice@example.com');
    expect(receipt.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('rejects sends to an unknown channel', async () => {
    const gateway = new ChannelGateway();
    await expect(gateway.send('fax', 'hello', 'x')).rejects.toThrow('Unknown channel "fax"');
  });

  it('lets channel send errors reach the caller', async () => {
    const gateway = new ChannelGateway();
    gateway.register(fakeChannel('email', {
      send: async () => {
        throw new ConfigurationError('Invalid email recipient');
      },
    }));

    await expect(gateway.send('email', 'hello', 'nope')).rejects.toThrow('Invalid email recipient');
  });

  it('collects inbound messages from listeners, newest first', async () => {
    const onMessage = vi.fn();
    const gateway = new ChannelGateway({ recentLimit: 2 });
    let listening: Promise<void> = Promise.resolve();
    gateway.register(fakeChannel('email', {
      listen: (sink: MessageSink) => {
        listening = (async () => {
          await sink.send(message('1'));
          await sink.send(message('2'));
          await sink.send(message('3'));
        })();
        return listening;
      },
    }));

    gateway.start(onMessage);
    await listening;
    await gateway.shutdown();

    expect(onMessage).toHaveBeenCalledTimes(3);
    expect(gateway.getRecentMessages().map(m => m.id)).toEqual(['3', '2']);
    expect(gateway.getRecentMessages(1).map(m => m.id)).toEqual(['3']);
    expect(gateway.getRecentMessages(0).map(m => m.id)).toEqual(['3', '2']);
    expect(gateway.getRecentMessages(-3).map(m => m.id)).toEqual(['3', '2']);
  });

  it('logs a listener that fails to start', async () => {
    const gateway = new ChannelGateway();
    gateway.register(fakeChannel('email', {
      listen: async () => {
        throw new ConfigurationError('Email channel needs an IMAP host and login to listen');
      },
    }));

    gateway.start();

    await vi.waitFor(() => {
      expect(console.error).toHaveBeenCalledWith(
        '  [gateway] email listener failed: Email channel needs an IMAP host and login to listen',
      );
    });
    await gateway.shutdown();
  });

  describe('getHealth', () => {
    it('is operational when every channel is healthy', async () => {
      const gateway = new ChannelGateway();
      gateway.register(fakeChannel('email'));
      gateway.register(fakeChannel('api'));

      const health = await gateway.getHealth();
      expect(health.status).toBe('operational');
      expect(health.channels).toEqual([
        { name: 'email', healthy: true },
        { name: 'api', healthy: true },
      ]);
    });

    it('is degraded when some channels are down', async () => {
      const gateway = new ChannelGateway();
      gateway.register(fakeChannel('email', { healthCheck: async () => false }));
      gateway.register(fakeChannel('api'));

      expect((await gateway.getHealth()).status).toBe('degraded');
    });

    it('is down when nothing is healthy, including a check that throws', async () => {
      const gateway = new ChannelGateway();
      gateway.register(fakeChannel('email', {
        healthCheck: async () => {
          throw new Error('boom');
        },
      }));

      const health = await gateway.getHealth();
      expect(health.status).toBe('down');
      expect(health.channels).toEqual([{ name: 'email', healthy: false }]);
    });

    it('is down with no channels registered', async () => {
      expect((await new ChannelGateway().getHealth()).status).toBe('down');
    });
  });
});
