import type { Logger } from 'pino';
import type { ImportJob } from '../domain/model/ImportJob.js';
import { isTerminalStatus } from '../domain/model/ImportStatus.js';

/** Why a channel stopped delivering. */
export type ChannelCloseReason = 'terminal' | 'shutdown';

export interface ProgressSubscriber {
  onSnapshot(job: ImportJob): void;
  onClose(reason: ChannelCloseReason): void;
}

/**
 * Per-job fan-out of committed snapshots to live listeners.
 *
 * Delivery is push-only: a subscriber sees the snapshots published after it
 * subscribed and nothing earlier. The channel for a job is closed as soon as
 * a terminal snapshot has been delivered.
 */
export class ProgressPublisher {
  private readonly channels = new Map<string, Set<ProgressSubscriber>>();

  constructor(private readonly logger?: Logger) {}

  /** Returns the unsubscribe handle. */
  subscribe(jobId: string, subscriber: ProgressSubscriber): () => void {
    const channel = this.channels.get(jobId) ?? new Set<ProgressSubscriber>();
    channel.add(subscriber);
    this.channels.set(jobId, channel);

    return () => {
      const current = this.channels.get(jobId);
      if (!current) return;
      current.delete(subscriber);
      if (current.size === 0) this.channels.delete(jobId);
    };
  }

  publish(job: ImportJob): void {
    const channel = this.channels.get(job.id);
    if (!channel) return;

    for (const subscriber of [...channel]) {
      try {
        subscriber.onSnapshot(job);
      } catch (error) {
        channel.delete(subscriber);
        this.logger?.warn({ err: error, jobId: job.id }, 'Dropping progress subscriber that threw');
      }
    }

    if (isTerminalStatus(job.status)) {
      this.close(job.id, 'terminal');
    }
  }

  /** End every open channel. */
  closeAll(): void {
    for (const jobId of [...this.channels.keys()]) {
      this.close(jobId, 'shutdown');
    }
  }

  subscriberCount(jobId: string): number {
    return this.channels.get(jobId)?.size ?? 0;
  }

  /** End one job's channel, telling its subscribers why. */
  close(jobId: string, reason: ChannelCloseReason): void {
    const channel = this.channels.get(jobId);
    if (!channel) return;
    this.channels.delete(jobId);

    for (const subscriber of channel) {
      try {
        subscriber.onClose(reason);
      } catch (error) {
        this.logger?.warn({ err: error, jobId }, 'Progress subscriber threw on close');
      }
    }
  }
}
