import type { ReadableStream } from 'node:stream/web';
import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';
import { decodeChunks } from './decodeChunks.js';

type StreamInput = AsyncIterable<string | Uint8Array> | ReadableStream<string | Uint8Array>;

export interface StreamSourceOptions {
  /** File name for metadata. Default: 'stream-input'. */
  readonly fileName?: string;
  /** File size in bytes for metadata (if known). */
  readonly fileSize?: number;
}

/**
 * Data source that wraps an `AsyncIterable` or `ReadableStream`.
 * Streams can only be read once, so the engine does not know the row total up front.
 */
export class StreamSource implements DataSource {
  readonly replayable = false;
  private readonly stream: StreamInput;
  private readonly meta: SourceMetadata;
  private consumed = false;

  constructor(stream: StreamInput, options?: StreamSourceOptions) {
    this.stream = stream;
    this.meta = {
      fileName: options?.fileName ?? 'stream-input',
      fileSize: options?.fileSize,
    };
  }

  read(): AsyncIterable<string> {
    if (this.consumed) {
      throw new Error('StreamSource: stream has already been consumed. Streams can only be read once.');
    }
    this.consumed = true;

    return decodeChunks(isReadableStream(this.stream) ? fromReadableStream(this.stream) : this.stream);
  }

  metadata(): SourceMetadata {
    return this.meta;
  }
}

function isReadableStream(stream: StreamInput): stream is ReadableStream<string | Uint8Array> {
  return 'getReader' in stream && typeof stream.getReader === 'function';
}

async function* fromReadableStream(stream: ReadableStream<string | Uint8Array>): AsyncIterable<string | Uint8Array> {
  const reader = stream.getReader();
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      yield value;
    }
  } finally {
    reader.releaseLock();
  }
}
