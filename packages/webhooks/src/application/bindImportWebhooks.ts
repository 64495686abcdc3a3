import type { EventPayload, ImportEngine } from '@product-importer/core';
import { importCompleted, importFailed, importStarted } from '../domain/WebhookEvent.js';
import type { WebhookDispatcher } from './WebhookDispatcher.js';

/**
 * Forward job lifecycle events of `engine` to webhooks. Only the three
 * job-level events are sent; batches and rows never are.
 *
 * @returns a function that removes the bindings.
 */
export function bindImportWebhooks(engine: ImportEngine, dispatcher: WebhookDispatcher): () => void {
  const onCreated = (event: EventPayload<'job:created'>): void => {
    dispatcher.trigger(importStarted(event.job));
  };
  const onCompleted = (event: EventPayload<'job:completed'>): void => {
    dispatcher.trigger(importCompleted(event.job));
  };
  const onFailed = (event: EventPayload<'job:failed'>): void => {
    dispatcher.trigger(importFailed(event.job));
  };

  engine.on('job:created', onCreated).on('job:completed', onCompleted).on('job:failed', onFailed);

  return () => {
    engine.off('job:created', onCreated).off('job:completed', onCompleted).off('job:failed', onFailed);
  };
}
