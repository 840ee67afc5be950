/**
 * Hook configuration
 *
 * Hooks come from the `notifications` list of the merged config. The
 * schema validator has already checked field types; this narrows each
 * entry to its webhook or script shape.
 */

import type { NotificationHookConfig } from '../config/loader.js';
import { parseDuration } from '../cli/flags.js';
import { errorMessage } from '../cli/errors.js';
import { isNotifyEvent, subscribes, WILDCARD_EVENT, type NotifyEvent } from './events.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

interface BaseHook {
  name: string;
  events?: string[];
  enabled?: boolean;
  /** Seconds, or a duration such as "30s" */
  timeout?: number | string;
}

export interface WebhookHook extends BaseHook {
  type: 'webhook';
  url: string;
  method?: HttpMethod;
  headers?: Record<string, string>;
  body?: Record<string, unknown> | string;
  retry?: number;
}

export interface ScriptHook extends BaseHook {
  type: 'script';
  command: string;
  args?: string[];
  cwd?: string;
}

export type Hook = WebhookHook | ScriptHook;

export interface HookValidation {
  hook: Hook | null;
  errors: string[];
}

/**
 * Check the fields a hook of its type needs
 */
export function toHook(config: NotificationHookConfig): HookValidation {
  const errors: string[] = [];

  for (const event of config.events ?? []) {
    if (event !== WILDCARD_EVENT && !isNotifyEvent(event)) {
      errors.push(`Unknown event "${event}"`);
    }
  }
  if (config.timeout !== undefined) {
    try {
      hookTimeoutMs(config.timeout, 0);
    } catch (error) {
      errors.push(errorMessage(error));
    }
  }

  const base: BaseHook = {
    name: config.name,
    events: config.events,
    enabled: config.enabled,
    timeout: config.timeout,
  };

  if (config.type === 'webhook') {
    if (!config.url) errors.push('Missing required field: url');
    if (errors.length > 0 || !config.url) return { hook: null, errors };
    return {
      hook: {
        ...base,
        type: 'webhook',
        url: config.url,
        method: config.method,
        headers: config.headers,
        body: config.body,
        retry: config.retry,
      },
      errors,
    };
  }

  if (!config.command) errors.push('Missing required field: command');
  if (errors.length > 0 || !config.command) return { hook: null, errors };
  return {
    hook: { ...base, type: 'script', command: config.command, args: config.args, cwd: config.cwd },
    errors,
  };
}

/**
 * Enabled hooks subscribed to `event`
 */
export function hooksForEvent(hooks: Hook[], event: NotifyEvent): Hook[] {
  return hooks.filter((hook) => hook.enabled !== false && subscribes(hook.events, event));
}

/**
 * Hook timeout in milliseconds: numbers and bare digits are seconds
 */
export function hookTimeoutMs(timeout: number | string | undefined, fallbackMs: number): number {
  if (timeout === undefined) return fallbackMs;
  if (typeof timeout === 'number') return timeout * 1000;
  if (/^\d+$/.test(timeout.trim())) return parseInt(timeout, 10) * 1000;
  return parseDuration(timeout);
}
