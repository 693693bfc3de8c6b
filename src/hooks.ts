/**
 * Shell integration snippets printed by `shellmind hook <shell>`.
 *
 * Each snippet records every finished command in the background and skips
 * shellmind's own invocations.
 */

export const HOOK_SHELLS = ['bash', 'zsh'] as const;
export type HookShell = (typeof HOOK_SHELLS)[number];

function bashHook(bin: string): string {
  return `# shellmind integration for bash
export SHELLMIND_SESSION_ID="\${SHELLMIND_SESSION_ID:-$(date +%s)-$$}"

__shellmind_preexec() {
  [ -n "\${__shellmind_start:-}" ] && return
  __shellmind_start=$(date +%s%3N)
}

__shellmind_precmd() {
  local exit_code=$?
  local cmd
  cmd=$(HISTTIMEFORMAT= history 1 | sed 's/^ *[0-9]* *//')
  if [ -n "$cmd" ] && [ "$cmd" != "\${__shellmind_last:-}" ] && [ -n "\${__shellmind_start:-}" ]; then
    local duration=$(( $(date +%s%3N) - __shellmind_start ))
    case "$cmd" in
      ${bin}|${bin}\\ *) ;;
      *) (${bin} record --exit-code "$exit_code" --duration "$duration" --directory "$PWD" --shell bash -- "$cmd" >/dev/null 2>&1 &) ;;
    esac
  fi
  __shellmind_last=$cmd
  unset __shellmind_start
  return $exit_code
}

trap '__shellmind_preexec' DEBUG
PROMPT_COMMAND="__shellmind_precmd\${PROMPT_COMMAND:+; $PROMPT_COMMAND}"
`;
}

function zshHook(bin: string): string {
  return `# shellmind integration for zsh
zmodload zsh/datetime
autoload -Uz add-zsh-hook
export SHELLMIND_SESSION_ID="\${SHELLMIND_SESSION_ID:-$(date +%s)-$$}"

__shellmind_preexec() {
  __shellmind_cmd=$1
  __shellmind_start=$EPOCHREALTIME
}

__shellmind_precmd() {
  local exit_code=$?
  [ -z "\${__shellmind_cmd:-}" ] && return $exit_code
  local duration=$(( (EPOCHREALTIME - __shellmind_start) * 1000 ))
  duration=\${duration%.*}
  case "$__shellmind_cmd" in
    ${bin}|${bin}\\ *) ;;
    *) (${bin} record --exit-code "$exit_code" --duration "$duration" --directory "$PWD" --shell zsh -- "$__shellmind_cmd" >/dev/null 2>&1 &) ;;
  esac
  unset __shellmind_cmd
  return $exit_code
}

add-zsh-hook preexec __shellmind_preexec
add-zsh-hook precmd __shellmind_precmd
`;
}

export function hookScript(shell: HookShell, bin = 'shellmind'): string {
  switch (shell) {
    case 'bash':
      return bashHook(bin);
    case 'zsh':
      return zshHook(bin);
  }
}
