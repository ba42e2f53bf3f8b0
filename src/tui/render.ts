import terminalKit from 'terminal-kit';
import { isOutputClosedError } from './errors.js';
import { CELL_PADDING, type GridLayout } from './layout.js';
import type { Screen, TextStyle } from './screen.js';
import { getLayout, type SelectionState } from './selection-state.js';
import type { Theme, ThemeColor } from './theme.js';

export interface PickerLabels {
  title: string;
  /** Plural noun used in the filter and empty-state lines. */
  noun: string;
}

export const DEFAULT_LABELS: PickerLabels = { title: 'Select templates', noun: 'templates' };

export const KEY_HINT = 'Space=toggle  Enter=confirm  Esc=cancel  Ctrl+A=all  Ctrl+U=clear';
export const FILTER_HINT = '  (/ to focus, type to filter, Delete clears)';
const NAVIGATION_HINT = 'Use arrows or hjkl to move, PgUp/PgDn to scroll';

const HEADER_ROW = 1;
const FILTER_ROW = 2;
const GRID_TOP = 3;

function fitWidth(text: string, width: number, measure: (text: string) => number): string {
  if (width <= 0) return '';
  const shown = measure(text) > width ? terminalKit.truncateString(text, width) : text;
  return shown + ' '.repeat(Math.max(0, width - measure(shown)));
}

function truncateByWidth(text: string, width: number, measure: (text: string) => number): string {
  if (width <= 0) return '';
  return measure(text) <= width ? text : terminalKit.truncateString(text, width);
}

function colored(theme: Theme, color: ThemeColor, style: TextStyle = {}): TextStyle {
  return theme.colors ? { ...style, color } : style;
}

export function getFilterLine(state: SelectionState, labels: PickerLabels = DEFAULT_LABELS): string {
  const base =
    state.search.query === '' ? `Filter: showing all ${labels.noun}` : `Filter: ${state.search.query}`;
  return state.search.active ? `${base} _` : base;
}

export function getFooterLine(state: SelectionState): string {
  const total = state.items.length;
  return `Selected ${state.selected.size}/${total} · Showing ${state.filtered.length}/${total} · ${NAVIGATION_HINT}`;
}

/**
 * Paints the picker. Reads `state` only (filling the layout cache at most). A closed output
 * stream ends the paint early without an error.
 */
export function renderSelection(
  state: SelectionState,
  screen: Screen,
  theme: Theme,
  labels: PickerLabels = DEFAULT_LABELS
): void {
  try {
    paint(state, screen, theme, labels);
  } catch (error) {
    if (isOutputClosedError(error)) return;
    throw error;
  }
}

function paint(state: SelectionState, screen: Screen, theme: Theme, labels: PickerLabels): void {
  const { width } = screen.size();
  const measure = state.measure;
  const layout = getLayout(state);

  screen.clear();

  const title = truncateByWidth(`${labels.title}  `, width, measure);
  screen.moveTo(1, HEADER_ROW);
  screen.write(title, colored(theme, theme.headerTitle, { bold: true }));
  screen.write(truncateByWidth(KEY_HINT, width - measure(title), measure), colored(theme, theme.headerHint));

  screen.moveTo(1, FILTER_ROW);
  screen.write(
    truncateByWidth(getFilterLine(state, labels) + FILTER_HINT, width, measure),
    colored(theme, theme.headerHint)
  );

  if (state.filtered.length === 0) {
    screen.moveTo(1, GRID_TOP);
    screen.write(
      truncateByWidth(`No ${labels.noun} match the current filter.`, width, measure),
      colored(theme, theme.headerHint)
    );
  } else {
    paintGrid(state, screen, theme, layout, width);
  }

  screen.moveTo(1, layout.visibleRows + GRID_TOP + 1);
  screen.write(truncateByWidth(getFooterLine(state), width, measure), colored(theme, theme.footer));
}

function paintGrid(
  state: SelectionState,
  screen: Screen,
  theme: Theme,
  layout: GridLayout,
  width: number
): void {
  const start = state.viewportOffset;
  for (let row = 0; row < layout.visibleRows; row++) {
    for (let col = 0; col < layout.columns; col++) {
      const position = start + row * layout.columns + col;
      const itemIndex = state.filtered[position];
      if (itemIndex === undefined) return;

      const x = col * layout.columnWidth + 1;
      screen.moveTo(x, row + GRID_TOP);

      const isCursor = position === state.cursor;
      const isSelected = state.selected.has(itemIndex);

      screen.write(
        isSelected ? '[x]' : '[ ]',
        colored(theme, isSelected ? theme.checkboxSelected : theme.checkboxUnselected, {
          inverse: isCursor,
        })
      );
      screen.write(' ');

      const nameWidth = Math.min(layout.columnWidth - CELL_PADDING, width - x + 1 - CELL_PADDING);
      screen.write(
        fitWidth(state.items[itemIndex] ?? '', nameWidth, state.measure),
        colored(theme, isSelected ? theme.itemSelectedText : theme.itemUnselectedText)
      );
    }
  }
}
