export class TerminalUnavailableError extends Error {
  constructor(reason: string) {
    super(`Interactive terminal unavailable: ${reason}`);
    this.name = 'TerminalUnavailableError';
  }
}

export class OutputClosedError extends Error {
  constructor() {
    super('Output stream closed');
    this.name = 'OutputClosedError';
  }
}

export function isBrokenPipeError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'EPIPE'
  );
}

export function isOutputClosedError(error: unknown): boolean {
  return error instanceof OutputClosedError || isBrokenPipeError(error);
}
