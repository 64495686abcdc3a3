/** The header lacks a column every row needs. Fatal for the whole file. */
export class MissingColumnsError extends Error {
  constructor(readonly missing: readonly string[]) {
    super(`Missing required column(s): ${missing.join(', ')}`);
    this.name = 'MissingColumnsError';
  }
}
