import { createReadStream } from 'node:fs';
import { rm } from 'node:fs/promises';
import { basename } from 'node:path';
import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';
import { decodeChunks } from './decodeChunks.js';

export interface FilePathSourceOptions {
  /** File name reported in metadata. Default: the path's base name. */
  readonly fileName?: string;
  /** Chunk size in bytes for streaming reads. Default: 65536 (64KB). */
  readonly highWaterMark?: number;
  /** Remove the file when the source is disposed. Default: `false`. */
  readonly deleteOnDispose?: boolean;
}

/** Data source that streams from a local file path using `createReadStream`. Replayable. */
export class FilePathSource implements DataSource {
  readonly replayable = true;
  private readonly filePath: string;
  private readonly options: FilePathSourceOptions;

  constructor(filePath: string, options: FilePathSourceOptions = {}) {
    this.filePath = filePath;
    this.options = options;
  }

  read(): AsyncIterable<string> {
    return decodeChunks(this.bytes());
  }

  metadata(): SourceMetadata {
    return { fileName: this.options.fileName ?? basename(this.filePath) };
  }

  async dispose(): Promise<void> {
    if (this.options.deleteOnDispose) {
      await rm(this.filePath, { force: true });
    }
  }

  private async *bytes(): AsyncIterable<string | Uint8Array> {
    const stream = createReadStream(this.filePath, { highWaterMark: this.options.highWaterMark ?? 65536 });
    for await (const chunk of stream) {
      if (typeof chunk === 'string' || chunk instanceof Uint8Array) yield chunk;
    }
  }
}
