/**
 * Text helpers used when preparing chat replies.
 */
import { TRUNCATION_MARKER } from '../constants.js';

/**
 * Returns `text` unchanged when it fits in `limit` characters, otherwise its
 * first `limit` characters followed by `marker`. A surrogate pair straddling
 * the cut is dropped whole rather than split.
 */
export function truncateText(text: string, limit: number, marker = TRUNCATION_MARKER): string {
  if (text.length <= limit) {
    return text;
  }

  let end = Math.max(0, limit);
  const lastCode = text.charCodeAt(end - 1);
  if (end > 0 && lastCode >= 0xd800 && lastCode <= 0xdbff) {
    end -= 1;
  }

  return `${text.slice(0, end)}${marker}`;
}

/**
 * Masks a secret for log output, keeping a short recognisable prefix.
 */
export function maskSecret(secret: string, visible = 10): string {
  if (!secret) {
    return '';
  }
  return `${secret.slice(0, Math.min(visible, secret.length))}...`;
}
