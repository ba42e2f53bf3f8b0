import type terminalKit from 'terminal-kit';

export type Terminal = typeof terminalKit.terminal;

export function setCursorVisible(term: Terminal, visible: boolean): void {
  // terminal-kit shows the cursor again through hideCursor(false).
  term.hideCursor(!visible);
}
