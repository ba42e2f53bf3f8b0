import { describe, expect, it } from 'vitest';
import { isToggleKeyName, isTypableKey, normalizeKeyPress } from '../../src/tui/key-utils.js';

describe('normalizeKeyPress', () => {
  it('turns the space key into a typable space', () => {
    expect(normalizeKeyPress('SPACE', { isCharacter: false })).toEqual({ name: ' ', isCharacter: true });
    expect(normalizeKeyPress(' ', undefined)).toEqual({ name: ' ', isCharacter: true });
  });

  it('reads isCharacter from the key data', () => {
    expect(normalizeKeyPress('a', { isCharacter: true })).toEqual({ name: 'a', isCharacter: true });
    expect(normalizeKeyPress('UP', { isCharacter: false })).toEqual({ name: 'UP', isCharacter: false });
  });

  it('treats missing or malformed data as a non-character key', () => {
    expect(normalizeKeyPress('x', undefined).isCharacter).toBe(false);
    expect(normalizeKeyPress('x', null).isCharacter).toBe(false);
    expect(normalizeKeyPress('x', { isCharacter: 'yes' }).isCharacter).toBe(false);
  });
});

describe('isTypableKey', () => {
  it('accepts single printable characters', () => {
    expect(isTypableKey({ name: 'a', isCharacter: true })).toBe(true);
    expect(isTypableKey({ name: 'É', isCharacter: true })).toBe(true);
    expect(isTypableKey({ name: '😀', isCharacter: true })).toBe(true);
  });

  it('rejects key names, control characters and non-character keys', () => {
    expect(isTypableKey({ name: 'ENTER', isCharacter: true })).toBe(false);
    expect(isTypableKey({ name: '\u0007', isCharacter: true })).toBe(false);
    expect(isTypableKey({ name: 'a', isCharacter: false })).toBe(false);
  });
});

describe('isToggleKeyName', () => {
  it('recognizes the ASCII and full-width spaces', () => {
    expect(isToggleKeyName('SPACE')).toBe(true);
    expect(isToggleKeyName(' ')).toBe(true);
    expect(isToggleKeyName('　')).toBe(true);
    expect(isToggleKeyName('s')).toBe(false);
  });
});
