import { randomUUID } from 'node:crypto';

/**
 * ID generation utility
 *
 * Session ids and lock tokens. `shortId` gives the first 8 hex digits, used
 * in log lines and activity events.
 */
export function createId(): string {
  return randomUUID();
}

export function shortId(id: string): string {
  return id.replace(/-/g, '').slice(0, 8);
}
