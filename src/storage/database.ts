/**
 * Command Store
 *
 * SQLite persistence for recorded commands. Every list this store returns
 * is in ascending chronological order except `search`, which is newest first.
 */

import Database from 'better-sqlite3';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { StorageError, errorMessage } from '../errors.js';
import { logDatabaseOperation } from '../logging.js';
import { ratio } from '../patterns/normalize.js';
import type { CommandStats, ShellCommand } from '../types.js';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS commands (
    id TEXT PRIMARY KEY,
    raw TEXT NOT NULL,
    parsed_command TEXT NOT NULL,
    arguments TEXT NOT NULL,
    working_directory TEXT NOT NULL,
    exit_code INTEGER NOT NULL,
    duration_ms INTEGER NOT NULL,
    timestamp INTEGER NOT NULL,
    session_id TEXT NOT NULL,
    shell TEXT NOT NULL,
    user TEXT NOT NULL,
    hostname TEXT NOT NULL,
    terminal TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_commands_timestamp ON commands(timestamp);
  CREATE INDEX IF NOT EXISTS idx_commands_session ON commands(session_id);
  CREATE INDEX IF NOT EXISTS idx_commands_directory ON commands(working_directory);
`;

const COLUMNS =
  'id, raw, parsed_command, arguments, working_directory, exit_code, duration_ms, timestamp, session_id, shell, user, hostname, terminal';

interface CommandRow {
  id: string;
  raw: string;
  parsed_command: string;
  arguments: string;
  working_directory: string;
  exit_code: number;
  duration_ms: number;
  timestamp: number;
  session_id: string;
  shell: string;
  user: string;
  hostname: string;
  terminal: string;
}

const ArgumentsSchema = z.array(z.string());

export interface SearchOptions {
  limit?: number;
  directory?: string;
  since?: Date;
  successOnly?: boolean;
}

export interface StatsOptions {
  since?: Date;
  top?: number;
}

export const DEFAULT_SEARCH_LIMIT = 50;
export const DEFAULT_TOP = 10;

export class CommandStore {
  private db: Database.Database;

  constructor(databasePath: string) {
    if (databasePath !== ':memory:') {
      fs.mkdirSync(path.dirname(databasePath), { recursive: true });
    }
    try {
      this.db = new Database(databasePath);
      this.db.pragma('journal_mode = WAL');
      this.db.exec(SCHEMA);
    } catch (err) {
      throw new StorageError(`Failed to open database ${databasePath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  save(command: ShellCommand): void {
    this.run('save', () => {
      this.insert().run(toRow(command));
    });
  }

  /**
   * Save many commands in one transaction; returns how many were written.
   */
  saveMany(commands: readonly ShellCommand[]): number {
    return this.run('save_many', () => {
      const insert = this.insert();
      const write = this.db.transaction((rows: CommandRow[]) => {
        for (const row of rows) insert.run(row);
        return rows.length;
      });
      return write(commands.map(toRow));
    });
  }

  findById(id: string): ShellCommand | undefined {
    return this.run('find_by_id', () => {
      const row = this.db
        .prepare<[string], CommandRow>(`SELECT ${COLUMNS} FROM commands WHERE id = ?`)
        .get(id);
      return row ? fromRow(row) : undefined;
    });
  }

  /**
   * The `limit` most recent commands, oldest first.
   */
  recent(limit: number): ShellCommand[] {
    return this.run('recent', () =>
      this.db
        .prepare<[number], CommandRow>(
          `SELECT ${COLUMNS} FROM commands ORDER BY timestamp DESC, rowid DESC LIMIT ?`
        )
        .all(limit)
        .map(fromRow)
        .reverse()
    );
  }

  findBySession(sessionId: string): ShellCommand[] {
    return this.run('find_by_session', () =>
      this.db
        .prepare<[string], CommandRow>(
          `SELECT ${COLUMNS} FROM commands WHERE session_id = ? ORDER BY timestamp ASC, rowid ASC`
        )
        .all(sessionId)
        .map(fromRow)
    );
  }

  findByTimeRange(start: Date, end: Date): ShellCommand[] {
    return this.run('find_by_time_range', () =>
      this.db
        .prepare<[number, number], CommandRow>(
          `SELECT ${COLUMNS} FROM commands
           WHERE timestamp >= ? AND timestamp <= ?
           ORDER BY timestamp ASC, rowid ASC`
        )
        .all(start.getTime(), end.getTime())
        .map(fromRow)
    );
  }

  /**
   * Substring search over the raw command text, newest first.
   */
  search(query: string, options: SearchOptions = {}): ShellCommand[] {
    const conditions = ["raw LIKE ? ESCAPE '\\'"];
    const params: Array<string | number> = [`%${escapeLike(query)}%`];

    if (options.directory !== undefined) {
      conditions.push('working_directory = ?');
      params.push(options.directory);
    }
    if (options.since) {
      conditions.push('timestamp >= ?');
      params.push(options.since.getTime());
    }
    if (options.successOnly) {
      conditions.push('exit_code = 0');
    }
    params.push(options.limit ?? DEFAULT_SEARCH_LIMIT);

    return this.run('search', () =>
      this.db
        .prepare<Array<string | number>, CommandRow>(
          `SELECT ${COLUMNS} FROM commands
           WHERE ${conditions.join(' AND ')}
           ORDER BY timestamp DESC, rowid DESC
           LIMIT ?`
        )
        .all(...params)
        .map(fromRow)
    );
  }

  count(): number {
    return this.run('count', () => {
      const row = this.db
        .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM commands')
        .get();
      return row?.count ?? 0;
    });
  }

  stats(options: StatsOptions = {}): CommandStats {
    const since = options.since?.getTime() ?? 0;
    const top = options.top ?? DEFAULT_TOP;

    return this.run('stats', () => {
      const totals = this.db
        .prepare<[number], { total: number; successes: number | null; avg: number | null }>(
          `SELECT COUNT(*) AS total,
                  SUM(CASE WHEN exit_code = 0 THEN 1 ELSE 0 END) AS successes,
                  AVG(duration_ms) AS avg
           FROM commands WHERE timestamp >= ?`
        )
        .get(since);

      const topCommands = this.db
        .prepare<[number, number], { command: string; count: number; successes: number }>(
          `SELECT parsed_command AS command,
                  COUNT(*) AS count,
                  SUM(CASE WHEN exit_code = 0 THEN 1 ELSE 0 END) AS successes
           FROM commands WHERE timestamp >= ?
           GROUP BY parsed_command
           ORDER BY count DESC, command ASC
           LIMIT ?`
        )
        .all(since, top);

      const byHour = this.db
        .prepare<[number], { hour: number; count: number }>(
          `SELECT CAST(strftime('%H', timestamp / 1000, 'unixepoch') AS INTEGER) AS hour,
                  COUNT(*) AS count
           FROM commands WHERE timestamp >= ?
           GROUP BY hour
           ORDER BY hour ASC`
        )
        .all(since);

      const topDirectories = this.db
        .prepare<[number, number], { directory: string; count: number }>(
          `SELECT working_directory AS directory, COUNT(*) AS count
           FROM commands WHERE timestamp >= ?
           GROUP BY working_directory
           ORDER BY count DESC, directory ASC
           LIMIT ?`
        )
        .all(since, top);

      const total = totals?.total ?? 0;
      return {
        totalCommands: total,
        successRate: ratio(totals?.successes ?? 0, total) ?? 0,
        averageDurationMs: Math.floor(totals?.avg ?? 0),
        topCommands: topCommands.map((row) => ({
          command: row.command,
          count: row.count,
          successRate: ratio(row.successes, row.count) ?? 0,
        })),
        commandsByHour: byHour,
        topDirectories,
      };
    });
  }

  deleteBefore(cutoff: Date): number {
    return this.run('delete_before', () =>
      this.db
        .prepare<[number]>('DELETE FROM commands WHERE timestamp < ?')
        .run(cutoff.getTime()).changes
    );
  }

  /**
   * Delete the `count` oldest commands.
   */
  deleteOldest(count: number): number {
    if (count <= 0) return 0;
    return this.run('delete_oldest', () =>
      this.db
        .prepare<[number]>(
          `DELETE FROM commands WHERE rowid IN (
             SELECT rowid FROM commands ORDER BY timestamp ASC, rowid ASC LIMIT ?
           )`
        )
        .run(count).changes
    );
  }

  vacuum(): void {
    this.run('vacuum', () => {
      this.db.exec('VACUUM');
    });
  }

  close(): void {
    this.db.close();
  }

  private insert(): Database.Statement<[CommandRow]> {
    return this.db.prepare<[CommandRow]>(
      `INSERT INTO commands (${COLUMNS}) VALUES (
         @id, @raw, @parsed_command, @arguments, @working_directory, @exit_code, @duration_ms,
         @timestamp, @session_id, @shell, @user, @hostname, @terminal
       )`
    );
  }

  private run<T>(operation: string, fn: () => T): T {
    const started = Date.now();
    try {
      const result = fn();
      logDatabaseOperation(operation, true, Date.now() - started);
      return result;
    } catch (err) {
      logDatabaseOperation(operation, false, Date.now() - started);
      if (err instanceof StorageError) throw err;
      throw new StorageError(`Database ${operation} failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}

function escapeLike(text: string): string {
  return text.replace(/[\\%_]/g, (char) => `\\${char}`);
}

function toRow(command: ShellCommand): CommandRow {
  return {
    id: command.id,
    raw: command.raw,
    parsed_command: command.parsedCommand,
    arguments: JSON.stringify(command.arguments),
    working_directory: command.workingDirectory,
    exit_code: command.exitCode,
    duration_ms: command.durationMs,
    timestamp: command.timestamp.getTime(),
    session_id: command.sessionId,
    shell: command.environment.shell,
    user: command.environment.user,
    hostname: command.environment.hostname,
    terminal: command.environment.terminal,
  };
}

function fromRow(row: CommandRow): ShellCommand {
  let args: string[];
  try {
    args = ArgumentsSchema.parse(JSON.parse(row.arguments));
  } catch (err) {
    throw new StorageError(`Corrupt arguments for command ${row.id}`, { cause: err });
  }

  return {
    id: row.id,
    raw: row.raw,
    parsedCommand: row.parsed_command,
    arguments: args,
    workingDirectory: row.working_directory,
    exitCode: row.exit_code,
    durationMs: row.duration_ms,
    timestamp: new Date(row.timestamp),
    sessionId: row.session_id,
    environment: {
      shell: row.shell,
      user: row.user,
      hostname: row.hostname,
      terminal: row.terminal,
    },
  };
}
