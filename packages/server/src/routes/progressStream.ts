import type { ServerResponse } from 'node:http';
import type { FastifyBaseLogger } from 'fastify';
import type { ChannelCloseReason, ImportEngine, ImportJob, ProgressSubscriber } from '@product-importer/core';
import { isTerminalStatus, toImportJobView } from '@product-importer/core';

export interface ProgressStreamOptions {
  /** The stream is closed with `stream_ended` after this long. */
  readonly maxDurationMs: number;
  /** Interval between keep-alive comments. */
  readonly keepAliveMs: number;
}

const STREAM_ENDED = JSON.stringify({ status: 'stream_ended' });

/** One open `text/event-stream` response fed by a job's progress channel. */
class ProgressStream implements ProgressSubscriber {
  private ended = false;
  private lastData: string | null = null;
  private unsubscribe: () => void = () => undefined;
  private readonly keepAlive: NodeJS.Timeout;
  private readonly deadline: NodeJS.Timeout;

  constructor(
    private readonly raw: ServerResponse,
    options: ProgressStreamOptions,
  ) {
    this.keepAlive = setInterval(() => {
      raw.write(': keep-alive\n\n');
    }, options.keepAliveMs);
    this.deadline = setTimeout(() => {
      this.end(true);
    }, options.maxDurationMs);
    raw.on('close', () => {
      this.end(false);
    });
  }

  get hasSent(): boolean {
    return this.lastData !== null;
  }

  attach(engine: ImportEngine, jobId: string): void {
    this.unsubscribe = engine.subscribe(jobId, this);
  }

  onSnapshot(job: ImportJob): void {
    const data = JSON.stringify(toImportJobView(job));
    if (this.ended || data === this.lastData) return;
    this.lastData = data;
    this.raw.write(`data: ${data}\n\n`);
  }

  onClose(reason: ChannelCloseReason): void {
    this.end(reason === 'shutdown');
  }

  /** Idempotent. `streamEnded` announces a close that is not the job's own end. */
  end(streamEnded: boolean): void {
    if (this.ended) return;
    if (streamEnded) this.raw.write(`data: ${STREAM_ENDED}\n\n`);
    this.ended = true;
    this.unsubscribe();
    clearInterval(this.keepAlive);
    clearTimeout(this.deadline);
    this.raw.end();
  }
}

/**
 * Serve a job's progress over server-sent events on an already hijacked reply.
 *
 * The subscription is opened before the current snapshot is read, so no update
 * falls between the two. A job that has already finished gets its final
 * snapshot once and the response ends.
 */
export async function streamProgress(
  engine: ImportEngine,
  jobId: string,
  raw: ServerResponse,
  options: ProgressStreamOptions,
  logger: FastifyBaseLogger,
): Promise<void> {
  raw.writeHead(200, {
    'Content-Type': 'text/event-stream',
    'Cache-Control': 'no-cache',
    Connection: 'keep-alive',
    'X-Accel-Buffering': 'no',
  });

  const stream = new ProgressStream(raw, options);
  stream.attach(engine, jobId);

  try {
    const current = await engine.getStatus(jobId);
    if (!stream.hasSent) stream.onSnapshot(current);
    if (isTerminalStatus(current.status)) stream.end(false);
  } catch (error) {
    logger.error({ err: error, jobId }, 'Progress stream failed');
    stream.end(true);
  }
}
