/**
 * Notification dispatcher
 *
 * Matches an alert event to the configured hooks and runs them one after
 * another. Delivery failures are logged as warnings and never change the
 * command's exit code.
 */

import type { NotificationHookConfig } from '../config/loader.js';
import type { Logger } from '../cli/logger.js';
import type { CommandRunner } from '../exec/runner.js';
import type { NotifyEvent } from './events.js';
import { createPayload, type NotificationPayload } from './payload.js';
import { hooksForEvent, toHook, type Hook } from './hooks.js';
import { buildWebhookRequest, executeWebhook } from './webhook.js';
import { executeScript } from './script.js';
import { parseTemplate } from './templates.js';
import { errorMessage } from '../cli/errors.js';

export interface DeliveryResult {
  hook: string;
  type: Hook['type'];
  success: boolean;
  /** Milliseconds */
  duration: number;
  error?: string;
  skipped?: boolean;
}

export interface NotifierOptions {
  logger: Logger;
  /** --no-notify */
  disabled?: boolean;
  /** --dry-run: log what would be sent */
  dryRun?: boolean;
  env?: NodeJS.ProcessEnv;
  runner?: CommandRunner;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

export class Notifier {
  private readonly hooks: Hook[] = [];
  private readonly options: NotifierOptions;

  constructor(configs: NotificationHookConfig[] = [], options: NotifierOptions) {
    this.options = options;
    for (const config of configs) {
      const { hook, errors } = toHook(config);
      if (hook) {
        this.hooks.push(hook);
      } else {
        options.logger.warning(`Ignoring notification hook "${config.name}": ${errors.join(', ')}`);
      }
    }
  }

  getHooks(): Hook[] {
    return [...this.hooks];
  }

  /**
   * Deliver `event` to every subscribed hook
   */
  async notify(
    event: NotifyEvent,
    command: string,
    summary: string,
    details: Record<string, unknown> = {}
  ): Promise<DeliveryResult[]> {
    const matching = hooksForEvent(this.hooks, event);
    if (matching.length === 0) {
      return [];
    }

    const { logger } = this.options;
    if (this.options.disabled) {
      logger.debug(`Notifications disabled, skipping ${matching.length} hook(s) for ${event}`);
      return matching.map((hook) => ({ hook: hook.name, type: hook.type, success: true, duration: 0, skipped: true }));
    }

    const payload = createPayload(event, command, summary, details);
    const results: DeliveryResult[] = [];

    for (const hook of matching) {
      if (this.options.dryRun) {
        logger.info(`[dry-run] Would notify ${hook.name}: ${this.describe(hook, payload)}`);
        results.push({ hook: hook.name, type: hook.type, success: true, duration: 0, skipped: true });
        continue;
      }

      const result = await this.deliver(hook, payload);
      if (result.success) {
        logger.debug(`Notified ${hook.name} (${event}, ${result.duration}ms)`);
      } else {
        logger.warning(`Notification hook ${hook.name} failed: ${result.error ?? 'unknown error'}`);
      }
      results.push(result);
    }

    return results;
  }

  private describe(hook: Hook, payload: NotificationPayload): string {
    const env = this.options.env;
    if (hook.type === 'webhook') {
      const request = buildWebhookRequest(hook, payload, env);
      return `${request.method} ${request.url}`;
    }
    const args = (hook.args ?? []).map((arg) => parseTemplate(arg, payload, env));
    return [parseTemplate(hook.command, payload, env), ...args].join(' ');
  }

  private async deliver(hook: Hook, payload: NotificationPayload): Promise<DeliveryResult> {
    try {
      if (hook.type === 'webhook') {
        const result = await executeWebhook(hook, payload, {
          env: this.options.env,
          fetch: this.options.fetch,
          sleep: this.options.sleep,
        });
        return { hook: hook.name, type: 'webhook', success: result.success, duration: result.duration, error: result.error };
      }

      const result = await executeScript(hook, payload, { env: this.options.env, runner: this.options.runner });
      return {
        hook: hook.name,
        type: 'script',
        success: result.success,
        duration: result.duration,
        error: result.error,
      };
    } catch (error) {
      return { hook: hook.name, type: hook.type, success: false, duration: 0, error: errorMessage(error) };
    }
  }
}
