export type ThemeKind = 'light' | 'dark';

export type ThemeColor = 'black' | 'white' | 'gray' | 'blue' | 'green' | 'brightGreen';

export interface Theme {
  readonly kind: ThemeKind;
  /** When false the renderer only uses bold and inverse. */
  readonly colors: boolean;
  readonly checkboxSelected: ThemeColor;
  readonly checkboxUnselected: ThemeColor;
  readonly itemSelectedText: ThemeColor;
  readonly itemUnselectedText: ThemeColor;
  readonly footer: ThemeColor;
  readonly headerTitle: ThemeColor;
  readonly headerHint: ThemeColor;
}

const LIGHT: Omit<Theme, 'colors'> = {
  kind: 'light',
  checkboxSelected: 'green',
  checkboxUnselected: 'gray',
  itemSelectedText: 'black',
  itemUnselectedText: 'black',
  footer: 'blue',
  headerTitle: 'blue',
  headerHint: 'gray',
};

const DARK: Omit<Theme, 'colors'> = {
  kind: 'dark',
  checkboxSelected: 'brightGreen',
  checkboxUnselected: 'gray',
  itemSelectedText: 'white',
  itemUnselectedText: 'white',
  footer: 'white',
  headerTitle: 'white',
  headerHint: 'gray',
};

export function createTheme(kind: ThemeKind, options: { colors?: boolean } = {}): Theme {
  const base = kind === 'light' ? LIGHT : DARK;
  return Object.freeze({ ...base, colors: options.colors ?? true });
}

export function isThemeKind(value: string): value is ThemeKind {
  return value === 'light' || value === 'dark';
}

/**
 * Reads `COLORFGBG` ("fg;bg", sometimes "fg;default;bg"). Background 8 and above reads as a light
 * terminal. Anything unreadable falls back to dark.
 */
export function detectThemeKind(env: NodeJS.ProcessEnv = process.env): ThemeKind {
  const value = env.COLORFGBG;
  if (!value) return 'dark';
  const background = value.split(';').pop() ?? '';
  if (!/^\d+$/.test(background)) return 'dark';
  return Number(background) >= 8 ? 'light' : 'dark';
}

export function resolveTheme(options: {
  override?: ThemeKind | null;
  env?: NodeJS.ProcessEnv;
}): Theme {
  const env = options.env ?? process.env;
  const kind = options.override ?? detectThemeKind(env);
  return createTheme(kind, { colors: !env.NO_COLOR });
}
