import terminalKit from 'terminal-kit';
import { normalizeKeyPress, type KeyPress } from './key-utils.js';
import { normalizeTerminalSize, type TerminalSize } from './layout.js';
import { setCursorVisible, type Terminal } from './term-cursor.js';
import type { ThemeColor } from './theme.js';

export interface TextStyle {
  color?: ThemeColor;
  bold?: boolean;
  inverse?: boolean;
}

/** Drawing surface. Coordinates are 1-based, column first. */
export interface Screen {
  size(): TerminalSize;
  clear(): void;
  moveTo(x: number, y: number): void;
  write(text: string, style?: TextStyle): void;
}

export type Unsubscribe = () => void;

export interface TerminalDevice extends Screen {
  /** Both input and output are attached to a TTY. */
  readonly interactive: boolean;
  setAlternateScreen(enabled: boolean): void;
  setRawInput(enabled: boolean): void;
  setCursorVisible(visible: boolean): void;
  onKey(listener: (key: KeyPress) => void): Unsubscribe;
  onResize(listener: () => void): Unsubscribe;
  onOutputError(listener: (error: Error) => void): Unsubscribe;
}

function applyColor(term: Terminal, color: ThemeColor): void {
  switch (color) {
    case 'black':
      term.black();
      break;
    case 'white':
      term.white();
      break;
    case 'gray':
      term.brightBlack();
      break;
    case 'blue':
      term.blue();
      break;
    case 'green':
      term.green();
      break;
    case 'brightGreen':
      term.brightGreen();
      break;
  }
}

export function createTerminalDevice(
  term: Terminal = terminalKit.terminal,
  streams: { input: NodeJS.ReadStream; output: NodeJS.WriteStream } = {
    input: process.stdin,
    output: process.stdout,
  }
): TerminalDevice {
  const { input, output } = streams;

  return {
    interactive: Boolean(input.isTTY && output.isTTY),

    size(): TerminalSize {
      return normalizeTerminalSize({
        width: term.width ?? output.columns,
        height: term.height ?? output.rows,
      });
    },

    clear(): void {
      term.clear();
    },

    moveTo(x: number, y: number): void {
      term.moveTo(x, y);
    },

    write(text: string, style: TextStyle = {}): void {
      term.styleReset();
      if (style.bold) term.bold();
      if (style.inverse) term.inverse();
      if (style.color) applyColor(term, style.color);
      term.noFormat(text);
      term.styleReset();
    },

    setAlternateScreen(enabled: boolean): void {
      term.fullscreen(enabled);
    },

    setRawInput(enabled: boolean): void {
      term.grabInput(enabled);
    },

    setCursorVisible(visible: boolean): void {
      setCursorVisible(term, visible);
    },

    onKey(listener: (key: KeyPress) => void): Unsubscribe {
      const handler = (name: string, _matches: unknown, data: unknown): void => {
        listener(normalizeKeyPress(name, data));
      };
      term.on('key', handler);
      return () => {
        term.removeListener('key', handler);
      };
    },

    onResize(listener: () => void): Unsubscribe {
      output.on('resize', listener);
      return () => {
        output.removeListener('resize', listener);
      };
    },

    onOutputError(listener: (error: Error) => void): Unsubscribe {
      output.on('error', listener);
      return () => {
        output.removeListener('error', listener);
      };
    },
  };
}
