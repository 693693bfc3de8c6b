/**
 * Record Command
 *
 * Called by the shell hook after every command. Prints nothing on success.
 */

import { recordCommand } from '../recorder.js';
import { withStore } from './shared.js';

interface RecordOptions {
  exitCode: number;
  duration: number;
  directory?: string;
  shell?: string;
}

export async function recordCommandAction(command: string, options: RecordOptions): Promise<void> {
  await withStore((store) => {
    recordCommand(store, {
      command,
      exitCode: options.exitCode,
      durationMs: options.duration,
      directory: options.directory,
      shell: options.shell,
    });
  });
}
