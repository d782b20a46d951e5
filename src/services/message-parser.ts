import type { ParsedMessage } from '../types/messaging.js';

/** tmux-compatible session-name charset; never contains `:`. */
export const SESSION_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Split a chat reply of the form `session-name: payload`.
 *
 * The first colon is the separator, so colons inside the payload are kept.
 * One space after the colon is dropped; everything else, newlines included,
 * belongs to the payload. Returns null for anything that is not a reply.
 */
export function parseReply(text: string): ParsedMessage | null {
  const separator = text.indexOf(':');
  if (separator <= 0) return null;

  const destination = text.slice(0, separator);
  if (!SESSION_NAME_PATTERN.test(destination)) return null;

  let payload = text.slice(separator + 1);
  if (payload.startsWith(' ')) {
    payload = payload.slice(1);
  }
  if (payload.length === 0) return null;

  return { destination, payload };
}

export function isValidSessionName(name: string): boolean {
  return SESSION_NAME_PATTERN.test(name);
}
