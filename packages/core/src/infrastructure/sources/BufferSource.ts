import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';
import { decodeChunks } from './decodeChunks.js';

export interface BufferSourceOptions {
  /** File name for metadata. Default: 'buffer-input'. */
  readonly fileName?: string;
  /** Emit the content in slices of this many bytes. Default: everything at once. */
  readonly chunkSize?: number;
}

/** In-memory data source. Replayable. */
export class BufferSource implements DataSource {
  readonly replayable = true;
  private readonly bytes: Uint8Array;
  private readonly meta: SourceMetadata;
  private readonly chunkSize: number;

  constructor(data: string | Uint8Array, options?: BufferSourceOptions) {
    this.bytes = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;
    this.chunkSize = options?.chunkSize ?? Math.max(this.bytes.length, 1);
    this.meta = {
      fileName: options?.fileName ?? 'buffer-input',
      fileSize: this.bytes.length,
    };
  }

  read(): AsyncIterable<string> {
    return decodeChunks(this.slices());
  }

  metadata(): SourceMetadata {
    return this.meta;
  }

  private async *slices(): AsyncIterable<Uint8Array> {
    for (let offset = 0; offset < this.bytes.length; offset += this.chunkSize) {
      yield await Promise.resolve(this.bytes.subarray(offset, offset + this.chunkSize));
    }
  }
}
