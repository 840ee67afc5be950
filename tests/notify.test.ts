/**
 * Tests for notification hooks: templates, webhook and script delivery,
 * and the dispatcher
 */

import { describe, it, expect } from '@jest/globals';
import { Logger } from '../src/cli/logger.js';
import { isNotifyEvent, subscribes } from '../src/notify/events.js';
import { hookTimeoutMs, hooksForEvent, toHook, type Hook, type WebhookHook } from '../src/notify/hooks.js';
import type { NotificationPayload } from '../src/notify/payload.js';
import { parseTemplate, parseTemplateValue, resolveVariable } from '../src/notify/templates.js';
import { buildWebhookRequest, executeWebhook } from '../src/notify/webhook.js';
import { executeScript } from '../src/notify/script.js';
import { Notifier } from '../src/notify/dispatcher.js';
import { stubRunner } from './helpers/capture.js';

const payload: NotificationPayload = {
  event: 'disk.critical',
  timestamp: '2025-04-15T10:00:00.000Z',
  host: 'web-1',
  command: 'disk',
  summary: '/ is 95% full',
  details: { mount: '/', usage: 95, thresholds: { critical: 90 }, note: null },
};

interface SentRequest {
  url: string;
  method: string;
  body: string | null;
}

function recordingFetch(statuses: number[], sent: SentRequest[] = []): typeof fetch {
  let call = 0;
  return async (input, init) => {
    sent.push({
      url: String(input),
      method: init?.method ?? 'GET',
      body: typeof init?.body === 'string' ? init.body : null,
    });
    const status = statuses[Math.min(call++, statuses.length - 1)];
    return new Response('ok', { status, statusText: status === 404 ? 'Not Found' : status >= 500 ? 'Internal Server Error' : 'OK' });
  };
}

function quietLogger(logs: string[]): Logger {
  return new Logger({ color: false, timestamps: false, stdout: (line) => logs.push(line), stderr: (line) => logs.push(line) });
}

describe('events', () => {
  it('should know the alert events', () => {
    expect(isNotifyEvent('disk.critical')).toBe(true);
    expect(isNotifyEvent('disk.full')).toBe(false);
  });

  it('should match subscriptions', () => {
    expect(subscribes(undefined, 'ssl.expiring')).toBe(true);
    expect(subscribes(['*'], 'ssl.expiring')).toBe(true);
    expect(subscribes(['disk.critical'], 'ssl.expiring')).toBe(false);
  });
});

describe('hooks', () => {
  it('should narrow valid configs', () => {
    expect(toHook({ name: 'ops', type: 'script', command: 'notify-send', events: ['*'] })).toEqual({
      hook: { name: 'ops', type: 'script', command: 'notify-send', events: ['*'], enabled: undefined, timeout: undefined, args: undefined, cwd: undefined },
      errors: [],
    });
  });

  it('should report what is wrong with a config', () => {
    expect(toHook({ name: 'a', type: 'webhook' }).errors).toEqual(['Missing required field: url']);
    expect(toHook({ name: 'b', type: 'script', command: 'x', events: ['disk.full'] }).errors).toEqual(['Unknown event "disk.full"']);
    expect(toHook({ name: 'c', type: 'script', command: 'x', timeout: 'soon' }).errors[0]).toMatch(/^Invalid duration format: soon/);
  });

  it('should select enabled subscribers', () => {
    const hooks: Hook[] = [
      { name: 'all', type: 'script', command: 'a' },
      { name: 'off', type: 'script', command: 'b', enabled: false },
      { name: 'ssl', type: 'script', command: 'c', events: ['ssl.expiring'] },
    ];
    expect(hooksForEvent(hooks, 'disk.critical').map((h) => h.name)).toEqual(['all']);
    expect(hooksForEvent(hooks, 'ssl.expiring').map((h) => h.name)).toEqual(['all', 'ssl']);
  });

  it('should read timeouts as seconds or durations', () => {
    expect(hookTimeoutMs(undefined, 500)).toBe(500);
    expect(hookTimeoutMs(3, 0)).toBe(3000);
    expect(hookTimeoutMs('45', 0)).toBe(45000);
    expect(hookTimeoutMs('2m', 0)).toBe(120000);
  });
});

describe('templates', () => {
  it('should resolve payload fields and nested details', () => {
    expect(parseTemplate('{{event}} on {{host}}: {{summary}}', payload, {})).toBe('disk.critical on web-1: / is 95% full');
    expect(parseTemplate('limit {{ details.thresholds.critical }}%', payload, {})).toBe('limit 90%');
    expect(resolveVariable('details.thresholds', payload)).toBe('{"critical":90}');
    expect(resolveVariable('details.note', payload)).toBe('');
  });

  it('should leave unknown placeholders alone', () => {
    expect(parseTemplate('{{details.missing}} {{nope}} ${NOPE}', payload, {})).toBe('{{details.missing}} {{nope}} ${NOPE}');
  });

  it('should substitute environment variables', () => {
    expect(parseTemplate('Bearer ${OPS_TOKEN}', payload, { OPS_TOKEN: 'test-secret' })).toBe('Bearer test-secret');
  });

  it('should walk objects and arrays', () => {
    expect(parseTemplateValue({ text: '{{summary}}', tags: ['{{command}}', 1] }, payload, {})).toEqual({
      text: '/ is 95% full',
      tags: ['disk', 1],
    });
  });
});

describe('webhook', () => {
  const hook: WebhookHook = { name: 'chat', type: 'webhook', url: 'https://hooks.example/{{event}}' };

  it('should post the payload as JSON by default', () => {
    expect(buildWebhookRequest(hook, payload, {})).toEqual({
      url: 'https://hooks.example/disk.critical',
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
    });
  });

  it('should send GET without a body and string bodies as given', () => {
    expect(buildWebhookRequest({ ...hook, method: 'GET' }, payload, {})).toEqual({
      url: 'https://hooks.example/disk.critical',
      method: 'GET',
      headers: {},
      body: undefined,
    });
    const request = buildWebhookRequest({ ...hook, body: 'alert={{summary}}', headers: { 'Content-Type': 'text/plain' } }, payload, {});
    expect(request.body).toBe('alert=/ is 95% full');
    expect(request.headers).toEqual({ 'Content-Type': 'text/plain' });
  });

  it('should retry server errors with backoff', async () => {
    const waits: number[] = [];
    const sent: SentRequest[] = [];
    const result = await executeWebhook({ ...hook, retry: 2 }, payload, {
      env: {},
      fetch: recordingFetch([503, 503, 200], sent),
      sleep: async (ms) => {
        waits.push(ms);
      },
    });
    expect(result).toMatchObject({ success: true, statusCode: 200, retries: 2 });
    expect(waits).toEqual([1000, 2000]);
    expect(sent).toHaveLength(3);
  });

  it('should not retry client errors', async () => {
    const result = await executeWebhook({ ...hook, retry: 3 }, payload, { env: {}, fetch: recordingFetch([404]) });
    expect(result).toMatchObject({ success: false, statusCode: 404, retries: 0, error: 'HTTP 404: Not Found' });
  });

  it('should time out', async () => {
    const slow: typeof fetch = (_input, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => {
          const error = new Error('This operation was aborted');
          error.name = 'AbortError';
          reject(error);
        });
      });
    const result = await executeWebhook({ ...hook, timeout: 0.02 }, payload, { env: {}, fetch: slow });
    expect(result).toMatchObject({ success: false, statusCode: null, timedOut: true, error: 'Request timed out after 20ms' });
  });
});

describe('executeScript', () => {
  it('should pass the payload on stdin and in the environment', async () => {
    const { runner, calls } = stubRunner();
    await executeScript(
      { name: 'mail', type: 'script', command: 'mail', args: ['-s', '[{{host}}] {{event}}', '${OPS_TO}'], timeout: '5s' },
      payload,
      { env: { OPS_TO: 'ops@example.com' }, runner }
    );
    expect(calls[0].command).toBe('mail');
    expect(calls[0].args).toEqual(['-s', '[web-1] disk.critical', 'ops@example.com']);
    expect(calls[0].options?.input).toBe(JSON.stringify(payload));
    expect(calls[0].options?.timeoutMs).toBe(5000);
    expect(calls[0].options?.env).toMatchObject({ OPS_TO: 'ops@example.com', OPSKIT_EVENT: 'disk.critical', OPSKIT_SUMMARY: '/ is 95% full' });
  });
});

describe('Notifier', () => {
  const configs = [
    { name: 'chat', type: 'webhook' as const, url: 'https://hooks.example/{{event}}', events: ['disk.critical'] },
    { name: 'log', type: 'script' as const, command: 'logger', args: ['{{summary}}'] },
    { name: 'broken', type: 'webhook' as const },
  ];

  it('should skip invalid hooks and deliver to subscribers', async () => {
    const logs: string[] = [];
    const sent: SentRequest[] = [];
    const { runner, calls } = stubRunner();
    const notifier = new Notifier(configs, { logger: quietLogger(logs), env: {}, runner, fetch: recordingFetch([200], sent) });
    expect(logs).toEqual(['[WARNING] Ignoring notification hook "broken": Missing required field: url']);
    expect(notifier.getHooks().map((h) => h.name)).toEqual(['chat', 'log']);

    const results = await notifier.notify('disk.critical', 'disk', '/ is 95% full', { mount: '/' });
    expect(results.map((r) => [r.hook, r.success])).toEqual([
      ['chat', true],
      ['log', true],
    ]);
    expect(sent.map((r) => [r.method, r.url])).toEqual([['POST', 'https://hooks.example/disk.critical']]);
    expect(calls[0].args).toEqual(['/ is 95% full']);

    const ssl = await notifier.notify('ssl.expiring', 'ssl', 'expires soon');
    expect(ssl.map((r) => r.hook)).toEqual(['log']);
  });

  it('should warn when a delivery fails', async () => {
    const logs: string[] = [];
    const notifier = new Notifier([configs[0]], { logger: quietLogger(logs), env: {}, fetch: recordingFetch([500]) });
    const [result] = await notifier.notify('disk.critical', 'disk', 'full');
    expect(result.success).toBe(false);
    expect(logs).toEqual(['[WARNING] Notification hook chat failed: HTTP 500: Internal Server Error']);
  });

  it('should only describe deliveries under --dry-run', async () => {
    const logs: string[] = [];
    const { runner, calls } = stubRunner();
    const notifier = new Notifier(configs.slice(0, 2), { logger: quietLogger(logs), env: {}, runner, dryRun: true });
    const results = await notifier.notify('disk.critical', 'disk', 'full');
    expect(results.every((r) => r.skipped)).toBe(true);
    expect(calls).toHaveLength(0);
    expect(logs).toEqual([
      '[INFO] [dry-run] Would notify chat: POST https://hooks.example/disk.critical',
      '[INFO] [dry-run] Would notify log: logger full',
    ]);
  });

  it('should send nothing when disabled', async () => {
    const { runner, calls } = stubRunner();
    const notifier = new Notifier(configs.slice(1, 2), { logger: quietLogger([]), runner, disabled: true });
    const results = await notifier.notify('http.failed', 'http', 'down');
    expect(results).toEqual([{ hook: 'log', type: 'script', success: true, duration: 0, skipped: true }]);
    expect(calls).toHaveLength(0);
  });
});
