/**
 * Email Channel Gateway: Server Entry Point
 *
 * Express server exposing:
 * - Health (IMAP + SMTP reachability per channel)
 * - Outbound send (threaded email replies)
 * - Recent inbound messages picked up by the mailbox poller
 *
 * The email listener starts with the server and polls until shutdown.
 */

import dotenv from 'dotenv';
dotenv.config();

import { ChannelGateway } from './core/gateway';
import { loadEmailConfig, loadServerConfig, MIN_POLL_INTERVAL_SECS } from './core/config';
import { EmailChannel } from './channels/email';
import { createApp } from './server';

// ─── Initialize Gateway ─────────────────────────────────────────────

const emailConfig = loadEmailConfig();
const serverConfig = loadServerConfig();

const gateway = new ChannelGateway();
gateway.register(new EmailChannel(emailConfig));

const app = createApp(gateway);

console.log('');
console.log('  ====================================================');
console.log('  EMAIL CHANNEL GATEWAY v0.1.0');
console.log('  IMAP polling in, threaded SMTP replies out');
console.log('  ====================================================');
console.log('');
console.log(`  IMAP:     ${emailConfig.imap.host || '(not set)'}:${emailConfig.imap.port} folder=${emailConfig.imap.folder}`);
console.log(`  SMTP:     ${emailConfig.smtp.host || '(not set)'}:${emailConfig.smtp.port} ${emailConfig.smtp.starttls ? 'STARTTLS' : 'TLS'}`);
console.log(`  From:     ${emailConfig.fromAddress || '(not set)'}`);
console.log(`  Poll:     every ${Math.max(emailConfig.pollIntervalSecs, MIN_POLL_INTERVAL_SECS)}s`);
console.log(`  Senders:  ${emailConfig.allowedSenders.length > 0 ? emailConfig.allowedSenders.join(', ') : '(none — all mail dropped)'}`);
console.log('');

// ─── Graceful Shutdown ──────────────────────────────────────────────

async function shutdown() {
  console.log('\n  Shutting down gracefully...');
  await gateway.shutdown();
  process.exit(0);
}

process.on('SIGINT', () => { void shutdown(); });
process.on('SIGTERM', () => { void shutdown(); });

// ─── Start Server + Listeners ───────────────────────────────────────

app.listen(serverConfig.port, () => {
  console.log(`  Server:   http://localhost:${serverConfig.port}`);
  console.log('');
  console.log('  Endpoints:');
  console.log('    GET  /v1/health      — Channel health');
  console.log('    POST /v1/send        — Send a threaded reply');
  console.log('    GET  /v1/messages    — Recent inbound messages');
  console.log('');

  gateway.start();

  console.log('  Ready.');
  console.log('');
});

export { app, gateway };
