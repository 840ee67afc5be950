/**
 * Notification payload sent to every hook
 */

import { hostname } from 'node:os';
import type { NotifyEvent } from './events.js';

export interface NotificationPayload {
  event: NotifyEvent;
  /** ISO timestamp */
  timestamp: string;
  host: string;
  /** opskit command that raised the alert (e.g. "disk") */
  command: string;
  /** One-line human summary */
  summary: string;
  details: Record<string, unknown>;
}

export function createPayload(
  event: NotifyEvent,
  command: string,
  summary: string,
  details: Record<string, unknown> = {},
  now: Date = new Date()
): NotificationPayload {
  return {
    event,
    timestamp: now.toISOString(),
    host: hostname(),
    command,
    summary,
    details,
  };
}
