import { randomUUID } from 'node:crypto';
import { createWriteStream } from 'node:fs';
import { mkdir, rm } from 'node:fs/promises';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { ImportEngine } from '@product-importer/core';
import { FilePathSource, toImportJobView } from '@product-importer/core';
import { InvalidUploadError } from '../errors.js';
import { streamProgress } from './progressStream.js';
import type { ProgressStreamOptions } from './progressStream.js';
import { parseRequest } from './validation.js';

export interface ImportRoutesOptions {
  readonly engine: ImportEngine;
  readonly uploadDir: string;
  /** Bytes. */
  readonly maxUploadSize: number;
  readonly stream: ProgressStreamOptions;
}

const JobParams = z.object({ id: z.string().min(1) });
const ListQuery = z.object({ limit: z.coerce.number().int().min(1).max(100).default(10) });

export const importRoutes: FastifyPluginAsync<ImportRoutesOptions> = async (app, options) => {
  const { engine, uploadDir, maxUploadSize } = options;
  const tooLarge = () => new InvalidUploadError(`File exceeds the ${String(maxUploadSize)} byte upload limit`);

  app.post('/upload', async (request, reply) => {
    const upload = await request.file({ limits: { fileSize: maxUploadSize, files: 1 } });
    if (!upload) throw new InvalidUploadError('No file uploaded');
    if (!upload.filename.toLowerCase().endsWith('.csv')) {
      upload.file.resume();
      throw new InvalidUploadError('Only CSV files are allowed');
    }

    const jobId = randomUUID();
    const target = path.join(uploadDir, `${jobId}.csv`);
    await mkdir(uploadDir, { recursive: true });
    try {
      await pipeline(upload.file, createWriteStream(target));
    } catch (error) {
      await rm(target, { force: true });
      if (upload.file.truncated) throw tooLarge();
      throw error;
    }
    if (upload.file.truncated) {
      await rm(target, { force: true });
      throw tooLarge();
    }

    try {
      await engine.createJob(upload.filename, jobId);
    } catch (error) {
      await rm(target, { force: true });
      throw error;
    }
    await engine.submit(jobId, new FilePathSource(target, { fileName: upload.filename, deleteOnDispose: true }));
    request.log.info({ jobId, filename: upload.filename }, 'Import queued');

    return reply.code(202).send({
      job_id: jobId,
      status: 'pending',
      message: 'File uploaded successfully. Processing started.',
    });
  });

  app.get('/', async (request) => {
    const { limit } = parseRequest(ListQuery, request.query);
    const jobs = await engine.listJobs(limit);
    return { items: jobs.map(toImportJobView), total: jobs.length };
  });

  app.get('/:id/status', async (request) => {
    const { id } = parseRequest(JobParams, request.params);
    return toImportJobView(await engine.getStatus(id));
  });

  app.get('/:id/stream', async (request, reply) => {
    const { id } = parseRequest(JobParams, request.params);
    await engine.getStatus(id);
    reply.hijack();
    await streamProgress(engine, id, reply.raw, options.stream, request.log);
  });

  app.post('/:id/cancel', async (request) => {
    const { id } = parseRequest(JobParams, request.params);
    return toImportJobView(await engine.cancel(id));
  });

  app.delete('/:id', async (request) => {
    const { id } = parseRequest(JobParams, request.params);
    await engine.deleteJob(id);
    return { message: 'Import job deleted successfully' };
  });
};
