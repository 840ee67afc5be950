/**
 * Webhook Hook Runner
 *
 * Sends the notification as an HTTP request, retrying with exponential
 * backoff. Client errors (4xx) are not retried.
 */

import type { NotificationPayload } from './payload.js';
import { parseTemplate, parseTemplateRecord, parseTemplateValue } from './templates.js';
import { hookTimeoutMs, type WebhookHook } from './hooks.js';
import { errorMessage } from '../cli/errors.js';

const DEFAULT_TIMEOUT_MS = 30_000;
const MAX_BACKOFF_MS = 10_000;

export interface WebhookResult {
  success: boolean;
  statusCode: number | null;
  responseBody: string;
  /** Execution time in milliseconds */
  duration: number;
  /** Number of retry attempts made */
  retries: number;
  error?: string;
  timedOut?: boolean;
}

export interface WebhookOptions {
  env?: NodeJS.ProcessEnv;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  /** Base delay of the exponential backoff */
  backoffMs?: number;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface WebhookRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  body?: string;
}

/**
 * Resolve templates into the request that will be sent
 */
export function buildWebhookRequest(
  hook: WebhookHook,
  payload: NotificationPayload,
  env: NodeJS.ProcessEnv = process.env
): WebhookRequest {
  const method = hook.method ?? 'POST';
  const headers = hook.headers ? parseTemplateRecord(hook.headers, payload, env) : {};
  const hasContentType = Object.keys(headers).some((h) => h.toLowerCase() === 'content-type');

  let body: string | undefined;
  if (typeof hook.body === 'string') {
    body = parseTemplate(hook.body, payload, env);
  } else if (hook.body !== undefined) {
    body = JSON.stringify(parseTemplateValue(hook.body, payload, env));
  } else if (method !== 'GET') {
    body = JSON.stringify(payload);
  }

  if (body !== undefined && typeof hook.body !== 'string' && !hasContentType) {
    headers['Content-Type'] = 'application/json';
  }

  return { url: parseTemplate(hook.url, payload, env), method, headers, body };
}

async function sendOnce(
  request: WebhookRequest,
  timeoutMs: number,
  fetchImpl: typeof fetch
): Promise<Omit<WebhookResult, 'duration' | 'retries'>> {
  const controller = new AbortController();
  const timeoutHandle = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetchImpl(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      signal: controller.signal,
    });
    const responseBody = await response.text();
    return {
      success: response.ok,
      statusCode: response.status,
      responseBody,
      error: response.ok ? undefined : `HTTP ${response.status}: ${response.statusText}`,
    };
  } catch (error) {
    const timedOut = error instanceof Error && error.name === 'AbortError';
    return {
      success: false,
      statusCode: null,
      responseBody: '',
      timedOut,
      error: timedOut ? `Request timed out after ${timeoutMs}ms` : errorMessage(error),
    };
  } finally {
    clearTimeout(timeoutHandle);
  }
}

export async function executeWebhook(
  hook: WebhookHook,
  payload: NotificationPayload,
  options: WebhookOptions = {}
): Promise<WebhookResult> {
  const startTime = Date.now();
  const maxRetries = hook.retry ?? 0;
  const sleep = options.sleep ?? defaultSleep;
  const backoff = options.backoffMs ?? 1000;
  const request = buildWebhookRequest(hook, payload, options.env);
  const timeoutMs = hookTimeoutMs(hook.timeout, DEFAULT_TIMEOUT_MS);

  let attempt = 0;
  for (;;) {
    const result = await sendOnce(request, timeoutMs, options.fetch ?? fetch);
    const clientError = result.statusCode !== null && result.statusCode >= 400 && result.statusCode < 500;

    if (result.success || clientError || attempt >= maxRetries) {
      return { ...result, duration: Date.now() - startTime, retries: attempt };
    }

    await sleep(Math.min(backoff * Math.pow(2, attempt), MAX_BACKOFF_MS));
    attempt++;
  }
}
