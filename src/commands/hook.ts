/**
 * Hook Command
 *
 * Prints the shell integration snippet, meant for `eval "$(shellmind hook zsh)"`.
 */

import { type HookShell, hookScript } from '../hooks.js';

export function hookCommand(shell: HookShell): void {
  process.stdout.write(hookScript(shell));
}
