import { setTimeout as delay } from 'node:timers/promises';
import type { DeliveryOutcome, Logger, Webhook, WebhookStore } from '@product-importer/core';
import { WebhookNotFoundError, createLogger } from '@product-importer/core';
import type { WebhookEvent } from '../domain/WebhookEvent.js';
import { buildPayload } from '../domain/WebhookEvent.js';
import { signPayload } from '../domain/signature.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface WebhookDispatcherOptions {
  readonly store: WebhookStore;
  /** HTTP client. Default: global `fetch`. */
  readonly fetch?: FetchLike;
  /** Per-request timeout. Default: `10000`. */
  readonly timeoutMs?: number;
  /** Extra attempts after a transport failure or a 5xx response. Default: `0`. */
  readonly maxRetries?: number;
  /** Base delay of the exponential backoff. Default: `1000`. */
  readonly retryDelayMs?: number;
  /** Default: a silent logger. */
  readonly logger?: Logger;
  readonly now?: () => number;
}

/** Result of one request/response round trip. */
export interface WebhookTestResult {
  readonly success: boolean;
  readonly statusCode: number | null;
  readonly responseTimeMs: number;
  readonly error: string | null;
}

export interface DeliveryResult extends WebhookTestResult {
  readonly webhookId: number;
  readonly attempts: number;
}

interface Attempt extends WebhookTestResult {
  readonly triggeredAt: number;
}

const TEST_MESSAGE = 'This is a test webhook from Product Importer';

/**
 * Posts lifecycle events to every enabled webhook subscribed to them.
 *
 * Each delivery owns its timeout and its retries, and records its outcome on
 * the webhook. Deliveries never fail the caller: problems end up in the
 * result and in the log.
 */
export class WebhookDispatcher {
  private readonly store: WebhookStore;
  private readonly fetch: FetchLike;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(options: WebhookDispatcherOptions) {
    this.store = options.store;
    this.fetch = options.fetch ?? ((url, init) => fetch(url, init));
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.maxRetries = options.maxRetries ?? 0;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.logger = options.logger ?? createLogger({ level: 'silent' });
    this.now = options.now ?? Date.now;
  }

  /** Deliver `event` to its subscribers concurrently and wait for every delivery. */
  async dispatch(event: WebhookEvent): Promise<readonly DeliveryResult[]> {
    const webhooks = await this.store.findEnabledByEvent(event.type);
    if (webhooks.length === 0) return [];

    const body = JSON.stringify(buildPayload(event, this.now()));
    return Promise.all(webhooks.map((webhook) => this.deliver(webhook, event.type, body)));
  }

  /** Fire-and-forget `dispatch`. */
  trigger(event: WebhookEvent): void {
    const delivery = this.dispatch(event).then(
      () => undefined,
      (error: unknown) => {
        this.logger.error({ err: error, event: event.type }, 'Webhook dispatch failed');
      },
    );
    this.inFlight.add(delivery);
    void delivery.finally(() => this.inFlight.delete(delivery));
  }

  /** Resolves once every triggered delivery has finished. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  /** Send a `test` payload to one webhook, enabled or not. */
  async test(webhookId: number): Promise<WebhookTestResult> {
    const webhook = await this.store.get(webhookId);
    if (!webhook) throw new WebhookNotFoundError(webhookId);

    const body = JSON.stringify({
      event: 'test',
      data: { webhook_id: webhook.id, webhook_name: webhook.name, message: TEST_MESSAGE },
      timestamp: new Date(this.now()).toISOString(),
    });
    const attempt = await this.send(webhook, 'test', body);
    await this.record(webhook.id, attempt);

    return {
      success: attempt.success,
      statusCode: attempt.statusCode,
      responseTimeMs: attempt.responseTimeMs,
      error: attempt.error,
    };
  }

  private async deliver(webhook: Webhook, eventName: string, body: string): Promise<DeliveryResult> {
    const log = this.logger.child({ webhookId: webhook.id, event: eventName });

    for (let attempts = 1; ; attempts++) {
      const attempt = await this.send(webhook, eventName, body);
      await this.record(webhook.id, attempt);

      const retryable = !attempt.success && (attempt.statusCode === null || attempt.statusCode >= 500);
      if (attempt.success || !retryable || attempts > this.maxRetries) {
        if (attempt.success) {
          log.debug({ statusCode: attempt.statusCode, attempts }, 'Webhook delivered');
        } else {
          log.warn({ statusCode: attempt.statusCode, error: attempt.error, attempts }, 'Webhook delivery failed');
        }
        return {
          webhookId: webhook.id,
          attempts,
          success: attempt.success,
          statusCode: attempt.statusCode,
          responseTimeMs: attempt.responseTimeMs,
          error: attempt.error,
        };
      }

      await delay(this.retryDelayMs * 2 ** (attempts - 1));
    }
  }

  private async send(webhook: Webhook, eventName: string, body: string): Promise<Attempt> {
    const triggeredAt = this.now();
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'X-Webhook-Event': eventName,
      'X-Webhook-Timestamp': new Date(triggeredAt).toISOString(),
    };
    if (webhook.secret) {
      headers['X-Webhook-Signature'] = signPayload(body, webhook.secret);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, this.timeoutMs);

    try {
      const response = await this.fetch(webhook.url, { method: 'POST', headers, body, signal: controller.signal });
      // Only the status is used.
      await response.body?.cancel();
      const success = response.status < 400;
      return {
        triggeredAt,
        success,
        statusCode: response.status,
        responseTimeMs: this.now() - triggeredAt,
        error: success ? null : `HTTP ${String(response.status)}`,
      };
    } catch (error) {
      let reason = error instanceof Error ? error.message : String(error);
      if (controller.signal.aborted) reason = 'Request timed out';
      return { triggeredAt, success: false, statusCode: null, responseTimeMs: this.now() - triggeredAt, error: reason };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async record(webhookId: number, attempt: Attempt): Promise<void> {
    const outcome: DeliveryOutcome = {
      triggeredAt: attempt.triggeredAt,
      responseCode: attempt.statusCode,
      responseTimeMs: attempt.responseTimeMs,
      success: attempt.success,
    };
    try {
      await this.store.recordDelivery(webhookId, outcome);
    } catch (error) {
      this.logger.error({ err: error, webhookId }, 'Failed to record webhook delivery');
    }
  }
}
