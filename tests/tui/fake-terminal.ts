import { EventEmitter } from 'node:events';
import type { KeyPress } from '../../src/tui/key-utils.js';
import type { TerminalSize } from '../../src/tui/layout.js';
import type { Screen, TerminalDevice, TextStyle, Unsubscribe } from '../../src/tui/screen.js';
import type { ProcessHooks } from '../../src/tui/terminal-session.js';

export interface Write {
  x: number;
  y: number;
  text: string;
  style: TextStyle | undefined;
}

/** Keeps the painted text per row plus every styled write since the last clear. */
export class RecordingScreen implements Screen {
  rows = new Map<number, string>();
  writes: Write[] = [];
  clears = 0;
  private x = 1;
  private y = 1;

  constructor(public dims: TerminalSize) {}

  size(): TerminalSize {
    return this.dims;
  }

  clear(): void {
    this.clears += 1;
    this.rows.clear();
    this.writes = [];
  }

  moveTo(x: number, y: number): void {
    this.x = x;
    this.y = y;
  }

  write(text: string, style?: TextStyle): void {
    this.writes.push({ x: this.x, y: this.y, text, style });
    const row = (this.rows.get(this.y) ?? '').padEnd(this.x - 1);
    this.rows.set(this.y, row.slice(0, this.x - 1) + text + row.slice(this.x - 1 + text.length));
    this.x += text.length;
  }

  row(y: number): string {
    return this.rows.get(y) ?? '';
  }
}

export class FakeDevice extends RecordingScreen implements TerminalDevice {
  readonly calls: string[] = [];
  readonly events = new EventEmitter();
  failRawInput: Error | null = null;
  failWrites: Error | null = null;

  constructor(
    public interactive = true,
    dims: TerminalSize = { width: 80, height: 24 }
  ) {
    super(dims);
  }

  override write(text: string, style?: TextStyle): void {
    if (this.failWrites) throw this.failWrites;
    super.write(text, style);
  }

  setAlternateScreen(enabled: boolean): void {
    this.calls.push(enabled ? 'alt:on' : 'alt:off');
  }

  setRawInput(enabled: boolean): void {
    if (enabled && this.failRawInput) throw this.failRawInput;
    this.calls.push(enabled ? 'raw:on' : 'raw:off');
  }

  setCursorVisible(visible: boolean): void {
    this.calls.push(visible ? 'cursor:shown' : 'cursor:hidden');
  }

  onKey(listener: (key: KeyPress) => void): Unsubscribe {
    return this.subscribe('key', listener);
  }

  onResize(listener: () => void): Unsubscribe {
    return this.subscribe('resize', listener);
  }

  onOutputError(listener: (error: Error) => void): Unsubscribe {
    return this.subscribe('error', listener);
  }

  press(name: string, isCharacter = name.length === 1): void {
    this.events.emit('key', { name, isCharacter });
  }

  resize(dims: TerminalSize): void {
    this.dims = dims;
    this.events.emit('resize');
  }

  failOutput(error: Error): void {
    this.events.emit('error', error);
  }

  private subscribe(event: string, listener: Parameters<EventEmitter['on']>[1]): Unsubscribe {
    this.events.on(event, listener);
    return () => {
      this.events.removeListener(event, listener);
    };
  }
}

export class FakeProcess extends EventEmitter implements ProcessHooks {
  readonly exitCodes: number[] = [];

  exit(code: number): void {
    this.exitCodes.push(code);
  }
}
