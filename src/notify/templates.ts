/**
 * Template Variable Parser
 *
 * Resolves {{variable}} placeholders from the notification payload and
 * ${VAR} placeholders from the environment. Unknown placeholders are left
 * untouched.
 */

import type { NotificationPayload } from './payload.js';

/**
 * Template variable pattern: {{variable.name}}
 */
const TEMPLATE_VAR_PATTERN = /\{\{([^}]+)\}\}/g;

/**
 * Environment variable pattern: ${VAR_NAME}
 */
const ENV_VAR_PATTERN = /\$\{([^}]+)\}/g;

export function resolveEnvVars(text: string, env: NodeJS.ProcessEnv = process.env): string {
  return text.replace(ENV_VAR_PATTERN, (match, name: string) => env[name.trim()] ?? match);
}

function stringify(value: unknown): string | undefined {
  if (value === undefined) return undefined;
  if (value === null) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Resolve `event`, `timestamp`, `host`, `command`, `summary` or
 * `details.<key>[.<key>...]`
 */
export function resolveVariable(path: string, payload: NotificationPayload): string | undefined {
  const [head, ...rest] = path.split('.');

  if (rest.length === 0) {
    switch (head) {
      case 'event':
        return payload.event;
      case 'timestamp':
        return payload.timestamp;
      case 'host':
        return payload.host;
      case 'command':
        return payload.command;
      case 'summary':
        return payload.summary;
      case 'details':
        return JSON.stringify(payload.details);
      default:
        return undefined;
    }
  }

  if (head !== 'details') {
    return undefined;
  }

  let current: unknown = payload.details;
  for (const key of rest) {
    if (current === null || typeof current !== 'object' || Array.isArray(current)) {
      return undefined;
    }
    current = new Map(Object.entries(current)).get(key);
  }
  return stringify(current);
}

export function parseTemplate(
  template: string,
  payload: NotificationPayload,
  env: NodeJS.ProcessEnv = process.env
): string {
  return resolveEnvVars(template, env).replace(TEMPLATE_VAR_PATTERN, (match, path: string) => {
    return resolveVariable(path.trim(), payload) ?? match;
  });
}

/**
 * Parse templates in every string of a JSON-like value
 */
export function parseTemplateValue(
  value: unknown,
  payload: NotificationPayload,
  env: NodeJS.ProcessEnv = process.env
): unknown {
  if (typeof value === 'string') {
    return parseTemplate(value, payload, env);
  }
  if (Array.isArray(value)) {
    return value.map((item) => parseTemplateValue(item, payload, env));
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, parseTemplateValue(item, payload, env)])
    );
  }
  return value;
}

export function parseTemplateRecord(
  record: Record<string, string>,
  payload: NotificationPayload,
  env: NodeJS.ProcessEnv = process.env
): Record<string, string> {
  return Object.fromEntries(
    Object.entries(record).map(([key, value]) => [key, parseTemplate(value, payload, env)])
  );
}
