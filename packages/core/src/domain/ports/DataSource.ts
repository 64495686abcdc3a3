/** Metadata about the data source (for logging). */
export interface SourceMetadata {
  readonly fileName?: string;
  readonly fileSize?: number;
}

/**
 * Port for reading decoded text from any origin (file, buffer, stream).
 *
 * Chunk boundaries are arbitrary: a row, or even a quoted field, may span
 * several chunks. Bytes that are not valid UTF-8 come through as U+FFFD.
 */
export interface DataSource {
  /**
   * `true` when `read()` may be called more than once. The engine counts rows
   * with a first pass over replayable sources so progress has a total.
   */
  readonly replayable: boolean;
  read(): AsyncIterable<string>;
  metadata(): SourceMetadata;
  /** Release whatever backs the source. Called once the job ends, whatever the outcome. */
  dispose?(): Promise<void>;
}
