import Database from 'better-sqlite3';

type Reply = (context: unknown, error: Error | null, result?: unknown) => void;

interface RunContext {
  lastID: number;
  changes: number;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function toReply(value: unknown): Reply | undefined {
  if (typeof value !== 'function') return undefined;
  return (context, error, result) => {
    Reflect.apply(value, context, result === undefined ? [error] : [error, result]);
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Uint8Array) &&
    !(value instanceof Date)
  );
}

function sanitize(value: unknown): unknown {
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (value instanceof Date) return value.toISOString();
  return value;
}

/** Named bind keys lose their `$`, `:` or `@` prefix; values become SQLite-bindable. */
function bindArgs(params: readonly unknown[]): unknown[] {
  return params.map((param) => {
    if (!isRecord(param)) return sanitize(param);
    const named: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(param)) {
      named[/^[$:@]/.test(key) ? key.slice(1) : key] = sanitize(value);
    }
    return named;
  });
}

function splitCallback(params: readonly unknown[]): { args: unknown[]; reply: Reply | undefined } {
  const reply = toReply(params[params.length - 1]);
  return { args: bindArgs(reply ? params.slice(0, -1) : params), reply };
}

/**
 * The subset of the `sqlite3` Database API Sequelize calls, served by
 * better-sqlite3. Passed as `dialectModule: { Database: SQLite3Wrapper }`.
 */
export class SQLite3Wrapper {
  private readonly db: Database.Database;

  constructor(filename: string, mode?: unknown, callback?: unknown) {
    const reply = toReply(mode) ?? toReply(callback);
    this.db = new Database(filename);
    if (reply) {
      setImmediate(() => {
        reply(this, null);
      });
    }
  }

  run(sql: string, ...params: unknown[]): this {
    const { args, reply } = splitCallback(params);
    try {
      const stmt = this.db.prepare(sql);
      let context: RunContext;
      if (stmt.reader) {
        const rows = stmt.all(...args);
        context = { lastID: 0, changes: rows.length };
      } else {
        const info = stmt.run(...args);
        context = { lastID: Number(info.lastInsertRowid), changes: info.changes };
      }
      reply?.(context, null);
    } catch (err) {
      if (!reply) throw err;
      reply(this, toError(err));
    }
    return this;
  }

  all(sql: string, ...params: unknown[]): this {
    const { args, reply } = splitCallback(params);
    try {
      const stmt = this.db.prepare(sql);
      if (stmt.reader) {
        reply?.(this, null, stmt.all(...args));
      } else {
        // DDL reaches all() too
        stmt.run(...args);
        reply?.(this, null, []);
      }
    } catch (err) {
      if (!reply) throw err;
      reply(this, toError(err));
    }
    return this;
  }

  exec(sql: string, callback?: unknown): this {
    const reply = toReply(callback);
    try {
      this.db.exec(sql);
      reply?.(this, null);
    } catch (err) {
      if (!reply) throw err;
      reply(this, toError(err));
    }
    return this;
  }

  close(callback?: unknown): void {
    const reply = toReply(callback);
    try {
      if (this.db.open) this.db.close();
      reply?.(this, null);
    } catch (err) {
      if (!reply) throw err;
      reply(this, toError(err));
    }
  }

  serialize(callback?: unknown): void {
    if (typeof callback === 'function') Reflect.apply(callback, this, []);
  }

  parallelize(callback?: unknown): void {
    if (typeof callback === 'function') Reflect.apply(callback, this, []);
  }
}
