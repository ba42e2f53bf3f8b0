import { describe, expect, it } from 'vitest';
import { createTheme, detectThemeKind, isThemeKind, resolveTheme } from '../../src/tui/theme.js';

describe('detectThemeKind', () => {
  it('reads the background from COLORFGBG', () => {
    expect(detectThemeKind({ COLORFGBG: '0;15' })).toBe('light');
    expect(detectThemeKind({ COLORFGBG: '15;0' })).toBe('dark');
    expect(detectThemeKind({ COLORFGBG: '7;8' })).toBe('light');
  });

  it('uses the last field of the three-part form', () => {
    expect(detectThemeKind({ COLORFGBG: '0;default;15' })).toBe('light');
  });

  it('falls back to dark when the variable is missing or unreadable', () => {
    expect(detectThemeKind({})).toBe('dark');
    expect(detectThemeKind({ COLORFGBG: 'default;default' })).toBe('dark');
  });
});

describe('resolveTheme', () => {
  it('prefers an explicit choice over detection', () => {
    expect(resolveTheme({ override: 'light', env: { COLORFGBG: '15;0' } }).kind).toBe('light');
    expect(resolveTheme({ override: null, env: { COLORFGBG: '0;15' } }).kind).toBe('light');
  });

  it('turns colours off when NO_COLOR is set to a value', () => {
    expect(resolveTheme({ env: { NO_COLOR: '1' } }).colors).toBe(false);
    expect(resolveTheme({ env: { NO_COLOR: '' } }).colors).toBe(true);
    expect(resolveTheme({ env: {} }).colors).toBe(true);
  });
});

describe('createTheme', () => {
  it('returns a frozen theme of the requested kind', () => {
    const theme = createTheme('light', { colors: false });
    expect(theme.kind).toBe('light');
    expect(theme.colors).toBe(false);
    expect(Object.isFrozen(theme)).toBe(true);
  });

  it('uses different checkbox colours for light and dark terminals', () => {
    expect(createTheme('light').checkboxSelected).toBe('green');
    expect(createTheme('dark').checkboxSelected).toBe('brightGreen');
  });
});

describe('isThemeKind', () => {
  it('accepts only light and dark', () => {
    expect(isThemeKind('light')).toBe(true);
    expect(isThemeKind('dark')).toBe(true);
    expect(isThemeKind('solarized')).toBe(false);
  });
});
