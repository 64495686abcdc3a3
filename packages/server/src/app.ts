import Fastify from 'fastify';
import type { FastifyError } from 'fastify';
import multipart from '@fastify/multipart';
import type { ImportEngine, Logger } from '@product-importer/core';
import {
  InvalidStatusTransitionError,
  JobConflictError,
  JobNotFoundError,
  WebhookNotFoundError,
} from '@product-importer/core';
import { MissingColumnsError } from '@product-importer/csv';
import type { WebhookDispatcher } from '@product-importer/webhooks';
import { ConfigError, InvalidRequestError } from './errors.js';
import { healthRoutes } from './routes/health.js';
import { importRoutes } from './routes/imports.js';
import { webhookRoutes } from './routes/webhooks.js';

export interface AppOptions {
  readonly engine: ImportEngine;
  readonly dispatcher: WebhookDispatcher;
  readonly logger: Logger;
  readonly version: string;
  readonly uploadDir: string;
  readonly maxUploadSize: number;
  readonly streamMaxDurationMs: number;
  readonly streamKeepAliveMs: number;
}

function statusFor(error: FastifyError): number {
  if (error instanceof JobNotFoundError || error instanceof WebhookNotFoundError) return 404;
  if (error instanceof JobConflictError || error instanceof InvalidStatusTransitionError) return 409;
  if (error instanceof InvalidRequestError || error instanceof MissingColumnsError || error instanceof ConfigError) {
    return 400;
  }
  // Fastify's own client errors (bad content type, body too large) carry their status.
  if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) return error.statusCode;
  return 500;
}

/**
 * Assemble the HTTP API around an engine and a dispatcher.
 *
 * Closing the app ends open progress streams first, then drains running
 * imports and pending webhook deliveries.
 */
export async function buildApp(options: AppOptions) {
  const { engine, dispatcher } = options;
  const app = Fastify({ logger: options.logger });

  await app.register(multipart);
  app.setErrorHandler(async (error, request, reply) => {
    const status = statusFor(error);
    if (status === 500) {
      request.log.error({ err: error }, 'Unhandled error');
      return reply.code(500).send({ detail: 'Internal server error' });
    }
    return reply.code(status).send({ detail: error.message });
  });

  app.addHook('preClose', async () => {
    engine.closeStreams();
  });
  app.addHook('onClose', async () => {
    await engine.shutdown();
    await dispatcher.drain();
  });

  await app.register(healthRoutes, { version: options.version });
  await app.register(importRoutes, {
    prefix: '/api/imports',
    engine,
    uploadDir: options.uploadDir,
    maxUploadSize: options.maxUploadSize,
    stream: { maxDurationMs: options.streamMaxDurationMs, keepAliveMs: options.streamKeepAliveMs },
  });
  await app.register(webhookRoutes, { prefix: '/api/webhooks', dispatcher });

  return app;
}
