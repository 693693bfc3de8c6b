/**
 * Shell History Collector
 *
 * Reads shell history from ~/.zsh_history or ~/.bash_history
 * and converts entries to ShellCommand records.
 */

import { randomUUID } from 'node:crypto';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { errorMessage } from '../errors.js';
import { logger } from '../logging.js';
import { detectEnvironment, parseCommandLine } from '../recorder.js';
import type { ShellCommand } from '../types.js';
import { validateCommand } from '../validation.js';

export type HistoryShell = 'zsh' | 'bash';

export interface ShellHistoryOptions {
  historyPath?: string;
  shell?: HistoryShell;
  directory?: string;
  sessionId?: string;
  env?: NodeJS.ProcessEnv;
}

export interface HistoryEntry {
  command: string;
  timestamp: Date;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export class ShellHistoryCollector {
  private historyPath: string;
  private shell: HistoryShell;
  private readonly directory: string;
  private readonly sessionId: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: ShellHistoryOptions = {}) {
    this.directory = options.directory ?? process.cwd();
    this.sessionId = options.sessionId ?? `import-${Math.floor(Date.now() / 1000)}`;
    this.env = options.env ?? process.env;

    if (options.historyPath) {
      this.historyPath = options.historyPath;
      this.shell =
        options.shell ?? (path.basename(options.historyPath).includes('zsh') ? 'zsh' : 'bash');
      return;
    }

    // Detect shell and history file
    const zshHistory = path.join(os.homedir(), '.zsh_history');
    const bashHistory = path.join(os.homedir(), '.bash_history');

    if (fs.existsSync(zshHistory)) {
      this.historyPath = zshHistory;
      this.shell = 'zsh';
    } else if (fs.existsSync(bashHistory)) {
      this.historyPath = bashHistory;
      this.shell = 'bash';
    } else {
      this.historyPath = '';
      this.shell = options.shell ?? 'bash';
    }
  }

  get file(): string {
    return this.historyPath;
  }

  isAvailable(): boolean {
    return this.historyPath !== '' && fs.existsSync(this.historyPath);
  }

  /**
   * Read every history entry, optionally only those at or after `since`.
   */
  async collect(since?: Date): Promise<ShellCommand[]> {
    if (!this.isAvailable()) {
      return [];
    }

    const content = fs.readFileSync(this.historyPath, 'utf-8');
    const entries = this.shell === 'zsh' ? parseZshHistory(content) : this.parseBash(content);

    const commands: ShellCommand[] = [];
    for (const entry of entries) {
      if (since && entry.timestamp < since) continue;
      const command = this.createCommand(entry);
      if (command) commands.push(command);
    }
    return commands;
  }

  private parseBash(content: string): HistoryEntry[] {
    // Without HISTTIMEFORMAT there are no timestamps; spread the untimed
    // entries evenly over the day before the file was last written
    const mtime = fs.statSync(this.historyPath).mtimeMs;
    return parseBashHistory(content, mtime);
  }

  private createCommand(entry: HistoryEntry): ShellCommand | undefined {
    try {
      validateCommand(entry.command);
    } catch (err) {
      logger.debug('Skipping history entry', { reason: errorMessage(err) });
      return undefined;
    }

    const { command, args } = parseCommandLine(entry.command);
    return {
      id: randomUUID(),
      raw: entry.command,
      parsedCommand: command,
      arguments: args,
      workingDirectory: this.directory,
      // History files keep neither exit status nor timing
      exitCode: 0,
      durationMs: 0,
      timestamp: entry.timestamp,
      sessionId: this.sessionId,
      environment: detectEnvironment(this.shell, this.env),
    };
  }
}

/**
 * Zsh extended history: `: <epoch>:<elapsed>;<command>`, with multi-line
 * commands continued by a trailing backslash.
 */
export function parseZshHistory(content: string): HistoryEntry[] {
  const historyRegex = /^:\s*(\d+):\d+;(.*)$/;
  const entries: HistoryEntry[] = [];
  const lines = content.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const match = lines[i].match(historyRegex);
    if (!match) continue;

    let command = match[2];
    while (command.endsWith('\\') && i + 1 < lines.length) {
      i++;
      command = `${command.slice(0, -1)}\n${lines[i]}`;
    }

    if (command.trim()) {
      entries.push({ command, timestamp: new Date(Number.parseInt(match[1], 10) * 1000) });
    }
  }

  return entries;
}

/**
 * Bash history, where a `#<epoch>` line stamps the command that follows it.
 * Unstamped commands are spread evenly over the 24 hours before `endMs`.
 */
export function parseBashHistory(content: string, endMs: number): HistoryEntry[] {
  const lines = content.split('\n');
  const untimed = countUntimed(lines);
  const msPerCommand = untimed > 0 ? DAY_MS / untimed : 0;
  let estimated = endMs - untimed * msPerCommand;

  const entries: HistoryEntry[] = [];
  let stamp: Date | undefined;

  for (const line of lines) {
    const stampMatch = line.match(/^#(\d+)\s*$/);
    if (stampMatch) {
      stamp = new Date(Number.parseInt(stampMatch[1], 10) * 1000);
      continue;
    }

    const command = line.trim();
    if (!command || command.startsWith('#')) continue;

    if (stamp) {
      entries.push({ command, timestamp: stamp });
      stamp = undefined;
    } else {
      entries.push({ command, timestamp: new Date(estimated) });
      estimated += msPerCommand;
    }
  }

  return entries;
}

function countUntimed(lines: readonly string[]): number {
  let count = 0;
  let stamped = false;
  for (const line of lines) {
    if (/^#\d+\s*$/.test(line)) {
      stamped = true;
      continue;
    }
    const command = line.trim();
    if (!command || command.startsWith('#')) continue;
    if (!stamped) count++;
    stamped = false;
  }
  return count;
}
