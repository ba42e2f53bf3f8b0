export interface KeyPress {
  /** terminal-kit key name: `UP`, `CTRL_A`, `ENTER`, or the character itself for printable keys. */
  name: string;
  /** True when the key produced a printable character (plain or with Shift only). */
  isCharacter: boolean;
}

export function isSpaceKeyName(name: string): boolean {
  return name === 'SPACE' || name === ' ';
}

const FULL_WIDTH_SPACE = '　';

export function isToggleKeyName(name: string): boolean {
  return isSpaceKeyName(name) || name === FULL_WIDTH_SPACE;
}

// C0 and C1 control ranges plus DEL.
const CONTROL_CHAR = /[\u0000-\u001f\u007f-\u009f]/;

/** A single printable character that may be typed into a text field. */
export function isTypableKey(key: KeyPress): boolean {
  if (!key.isCharacter) return false;
  const chars = Array.from(key.name);
  return chars.length === 1 && !CONTROL_CHAR.test(key.name);
}

export function normalizeKeyPress(name: string, data: unknown): KeyPress {
  if (isSpaceKeyName(name)) return { name: ' ', isCharacter: true };
  const isCharacter =
    typeof data === 'object' && data !== null && 'isCharacter' in data && data.isCharacter === true;
  return { name, isCharacter };
}
