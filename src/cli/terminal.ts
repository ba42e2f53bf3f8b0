const ESC = '\u001b[';

export const supportsAnsiColor = !process.env.NO_COLOR && Boolean(process.stderr.isTTY);

function wrap(open: number, close: number): (text: string) => string {
  return (text: string) => `${ESC}${open}m${text}${ESC}${close}m`;
}

export const boldText = wrap(1, 22);
export const dimText = wrap(2, 22);
export const greenText = wrap(32, 39);
export const cyanText = wrap(36, 39);

export function printSuccess(message: string): void {
  const color = !process.env.NO_COLOR && Boolean(process.stdout.isTTY);
  console.log(color ? greenText(`${boldText('✓')} ${message}`) : `✓ ${message}`);
}
