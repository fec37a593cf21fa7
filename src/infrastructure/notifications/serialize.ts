/**
 * JSON-safe form of an event: bigint amounts become decimal strings.
 */
import type { AmmEvent } from '../../domain/ports/INotificationSink.js';

export function serializeEvent(event: AmmEvent): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(event)) {
    out[key] = typeof value === 'bigint' ? value.toString() : String(value);
  }
  return out;
}
