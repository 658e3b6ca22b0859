/**
 * Sender allow-list: who may have their email forwarded to the bus.
 *
 * Only two forms are recognised: the wildcard '*', or an exact address
 * compared with ASCII case folding. No domain or pattern matching.
 */

export const SENDER_WILDCARD = '*';

export function isSenderAllowed(sender: string, allowlist: readonly string[]): boolean {
  if (allowlist.includes(SENDER_WILDCARD)) return true;

  const folded = asciiLower(sender);
  return allowlist.some(entry => asciiLower(entry) === folded);
}

// toLowerCase() also folds non-ASCII letters, which address matching must not do
function asciiLower(value: string): string {
  return value.replace(/[A-Z]/g, c => String.fromCharCode(c.charCodeAt(0) + 32));
}
