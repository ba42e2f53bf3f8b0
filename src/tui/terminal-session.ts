import { isBrokenPipeError, OutputClosedError, TerminalUnavailableError } from './errors.js';
import type { Screen, TerminalDevice, TextStyle, Unsubscribe } from './screen.js';

/** The slice of `process` the session hooks into. */
export interface ProcessHooks {
  on(event: string, listener: () => void): unknown;
  removeListener(event: string, listener: () => void): unknown;
  exit(code: number): void;
}

const SIGNAL_EXIT_CODES: Record<string, number> = {
  SIGHUP: 129,
  SIGINT: 130,
  SIGTERM: 143,
};

/**
 * Exclusive hold on the terminal: alternate screen, raw input, hidden cursor.
 *
 * `exit()` restores the terminal once, however often it is called. While the session is live,
 * process `exit` and termination signals restore it as well, so an abandoned session never leaves
 * the shell in raw mode.
 */
export class TerminalSession {
  readonly screen: Screen;
  private active = true;
  private outputClosed = false;
  private pendingFailure: Error | null = null;
  private readonly disposers: Unsubscribe[] = [];

  private constructor(
    private readonly device: TerminalDevice,
    private readonly proc: ProcessHooks
  ) {
    this.screen = {
      size: () => device.size(),
      clear: () => this.draw(() => device.clear()),
      moveTo: (x: number, y: number) => this.draw(() => device.moveTo(x, y)),
      write: (text: string, style?: TextStyle) => this.draw(() => device.write(text, style)),
    };
  }

  static enter(device: TerminalDevice, proc: ProcessHooks = process): TerminalSession {
    if (!device.interactive) {
      throw new TerminalUnavailableError('stdin and stdout must both be a terminal');
    }

    const session = new TerminalSession(device, proc);
    try {
      device.setAlternateScreen(true);
      device.setRawInput(true);
      device.setCursorVisible(false);
    } catch (error) {
      session.exit();
      const reason = error instanceof Error ? error.message : String(error);
      throw new TerminalUnavailableError(reason);
    }

    session.installHooks();
    return session;
  }

  get isActive(): boolean {
    return this.active;
  }

  get isOutputClosed(): boolean {
    return this.outputClosed;
  }

  /** First non-EPIPE error the output stream reported, if any. */
  get failure(): Error | null {
    return this.pendingFailure;
  }

  exit(): void {
    if (!this.active) return;
    this.active = false;

    for (const dispose of this.disposers.splice(0)) dispose();

    this.device.setCursorVisible(true);
    this.device.setAlternateScreen(false);
    this.device.setRawInput(false);
  }

  private installHooks(): void {
    const onExit = (): void => this.exit();
    this.proc.on('exit', onExit);
    this.disposers.push(() => this.proc.removeListener('exit', onExit));

    for (const [signal, code] of Object.entries(SIGNAL_EXIT_CODES)) {
      const onSignal = (): void => {
        this.exit();
        this.proc.exit(code);
      };
      this.proc.on(signal, onSignal);
      this.disposers.push(() => this.proc.removeListener(signal, onSignal));
    }

    this.disposers.push(
      this.device.onOutputError((error) => {
        if (isBrokenPipeError(error)) {
          this.outputClosed = true;
          return;
        }
        this.pendingFailure ??= error;
      })
    );
  }

  private draw(op: () => void): void {
    if (!this.active || this.outputClosed) throw new OutputClosedError();
    try {
      op();
    } catch (error) {
      if (isBrokenPipeError(error)) this.outputClosed = true;
      throw error;
    }
  }
}

/** Runs `fn` inside a terminal session and restores the terminal however `fn` ends. */
export async function withTerminalSession<T>(
  device: TerminalDevice,
  fn: (session: TerminalSession) => Promise<T>,
  proc: ProcessHooks = process
): Promise<T> {
  const session = TerminalSession.enter(device, proc);
  try {
    return await fn(session);
  } finally {
    session.exit();
  }
}
