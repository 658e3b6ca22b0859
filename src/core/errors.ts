/**
 * Error taxonomy shared by channels and the gateway.
 *
 *   ConfigurationError  bad addresses or setup; never retried
 *   ProtocolError       IMAP/SMTP connect, auth or command failure
 *   ParseError          one inbound message could not be understood
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ProtocolError extends Error {
  readonly protocol: 'imap' | 'smtp';

  constructor(protocol: 'imap' | 'smtp', message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProtocolError';
    this.protocol = protocol;
  }
}

export class ParseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ParseError';
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    const cause = err.cause instanceof Error ? ` (${err.cause.message})` : '';
    return `${err.message}${cause}`;
  }
  return String(err);
}
