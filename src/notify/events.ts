/**
 * Notification Event Types
 *
 * Alert events emitted by the check commands. A hook subscribes to one or
 * more of these, or to `*` for all of them.
 */

export const NOTIFY_EVENTS = [
  'disk.critical',
  'disk.warning',
  'ssl.expiring',
  'http.failed',
  'integrity.changed',
  'logins.threshold',
  'bandwidth.threshold',
  'blacklist.listed',
] as const;

export type NotifyEvent = (typeof NOTIFY_EVENTS)[number];

export const WILDCARD_EVENT = '*';

const EVENT_NAMES: readonly string[] = NOTIFY_EVENTS;

export function isNotifyEvent(event: string): event is NotifyEvent {
  return EVENT_NAMES.includes(event);
}

/**
 * Whether a subscription list covers `event` (no list means every event)
 */
export function subscribes(events: string[] | undefined, event: NotifyEvent): boolean {
  if (!events || events.length === 0) {
    return true;
  }
  return events.includes(WILDCARD_EVENT) || events.includes(event);
}
