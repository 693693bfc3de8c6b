import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CommandStore } from '../storage/database.js';
import { importHistory } from './import.js';

describe('importHistory', () => {
  let dir: string;
  let store: CommandStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'shellmind-import-'));
    store = new CommandStore(':memory:');
  });

  afterEach(() => {
    store.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('stores every entry of the history file', async () => {
    const file = path.join(dir, '.zsh_history');
    fs.writeFileSync(file, ': 1767261600:0;git pull\n: 1767261660:0;npm ci\n: 1767261720:0;npm test\n');

    expect(await importHistory(store, { file })).toBe(3);
    expect(store.recent(10).map((c) => c.raw)).toEqual(['git pull', 'npm ci', 'npm test']);
  });

  it('imports nothing from a missing file', async () => {
    expect(await importHistory(store, { file: path.join(dir, 'none') })).toBe(0);
    expect(store.count()).toBe(0);
  });
});
