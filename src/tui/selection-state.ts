import terminalKit from 'terminal-kit';
import { filterIndices } from './filter.js';
import {
  computeGridLayout,
  getPageCapacity,
  normalizeTerminalSize,
  type GridLayout,
  type TerminalSize,
} from './layout.js';

export type SizeProvider = () => Partial<TerminalSize> | null | undefined;

export interface SearchState {
  active: boolean;
  query: string;
}

/**
 * Everything one picker session knows. Selection is keyed by the item's index in `items`
 * (its canonical index); `cursor` and `viewportOffset` are positions inside `filtered`.
 */
export interface SelectionState {
  readonly items: readonly string[];
  filtered: number[];
  selected: Set<number>;
  cursor: number;
  viewportOffset: number;
  layout: GridLayout | null;
  search: SearchState;
  readSize: SizeProvider;
  measure: (text: string) => number;
}

export interface SelectionStateOptions {
  previousSelection?: readonly string[];
  readSize?: SizeProvider;
  measure?: (text: string) => number;
}

function clamp(n: number, min: number, max: number): number {
  return Math.min(Math.max(n, min), max);
}

export function createSelectionState(
  items: readonly string[],
  options: SelectionStateOptions = {}
): SelectionState {
  const state: SelectionState = {
    items: [...items],
    filtered: [],
    selected: new Set<number>(),
    cursor: 0,
    viewportOffset: 0,
    layout: null,
    search: { active: false, query: '' },
    readSize: options.readSize ?? (() => null),
    measure: options.measure ?? ((text: string) => terminalKit.stringWidth(text)),
  };

  refreshFilter(state, { resetPosition: true });

  const previous = new Set(options.previousSelection ?? []);
  state.items.forEach((item, index) => {
    if (previous.has(item)) selectItem(state, index);
  });

  return state;
}

export function invalidateLayout(state: SelectionState): void {
  state.layout = null;
}

export function getLayout(state: SelectionState): GridLayout {
  if (state.layout) return state.layout;

  let maxItemWidth = 0;
  for (const index of state.filtered) {
    maxItemWidth = Math.max(maxItemWidth, state.measure(state.items[index] ?? ''));
  }

  state.layout = computeGridLayout({
    size: normalizeTerminalSize(state.readSize()),
    maxItemWidth,
    itemCount: state.filtered.length,
  });
  return state.layout;
}

/**
 * Moves the viewport to the page holding the cursor. Pages are `columns * visibleRows` cells,
 * so the offset is always a multiple of that capacity.
 */
export function ensureVisible(state: SelectionState): void {
  const visible = state.filtered.length;
  if (visible === 0) {
    state.cursor = 0;
    state.viewportOffset = 0;
    return;
  }

  state.cursor = clamp(state.cursor, 0, visible - 1);
  const capacity = getPageCapacity(getLayout(state));
  state.viewportOffset = Math.floor(state.cursor / capacity) * capacity;
}

export function refreshFilter(state: SelectionState, options: { resetPosition: boolean }): void {
  state.filtered = filterIndices(state.items, state.search.query);
  invalidateLayout(state);

  if (options.resetPosition || state.filtered.length === 0) {
    state.cursor = 0;
    state.viewportOffset = 0;
    return;
  }

  state.cursor = Math.min(state.cursor, state.filtered.length - 1);
  ensureVisible(state);
}

export function setQuery(state: SelectionState, query: string): void {
  state.search.query = query;
  refreshFilter(state, { resetPosition: true });
}

export function currentItemIndex(state: SelectionState): number | null {
  return state.filtered[state.cursor] ?? null;
}

export function isFullFilter(state: SelectionState): boolean {
  return state.filtered.length === state.items.length;
}

export function moveUp(state: SelectionState): void {
  const { columns } = getLayout(state);
  if (state.cursor >= columns) state.cursor -= columns;
  ensureVisible(state);
}

export function moveDown(state: SelectionState): void {
  const visible = state.filtered.length;
  if (visible === 0) return;
  const { columns } = getLayout(state);
  state.cursor = Math.min(state.cursor + columns, visible - 1);
  ensureVisible(state);
}

export function moveLeft(state: SelectionState): void {
  if (state.cursor > 0) state.cursor -= 1;
  ensureVisible(state);
}

export function moveRight(state: SelectionState): void {
  if (state.cursor + 1 < state.filtered.length) state.cursor += 1;
  ensureVisible(state);
}

export function pageUp(state: SelectionState): void {
  const step = getPageCapacity(getLayout(state));
  state.cursor = Math.max(0, state.cursor - step);
  ensureVisible(state);
}

export function pageDown(state: SelectionState): void {
  const visible = state.filtered.length;
  if (visible === 0) return;
  const step = getPageCapacity(getLayout(state));
  state.cursor = Math.min(state.cursor + step, visible - 1);
  ensureVisible(state);
}

export function moveHome(state: SelectionState): void {
  state.cursor = 0;
  ensureVisible(state);
}

export function moveEnd(state: SelectionState): void {
  if (state.filtered.length === 0) return;
  state.cursor = state.filtered.length - 1;
  ensureVisible(state);
}

export function toggleCurrent(state: SelectionState): void {
  const index = currentItemIndex(state);
  if (index === null) return;
  if (state.selected.has(index)) state.selected.delete(index);
  else state.selected.add(index);
}

export function selectItem(state: SelectionState, index: number): void {
  if (Number.isInteger(index) && index >= 0 && index < state.items.length) {
    state.selected.add(index);
  }
}

/**
 * With every item visible the selection becomes exactly the full list. Under a narrower filter
 * only the visible items are added; hidden items keep whatever state they had.
 */
export function selectAll(state: SelectionState): void {
  if (isFullFilter(state)) state.selected.clear();
  for (const index of state.filtered) state.selected.add(index);
}

/** Mirror of {@link selectAll}: a narrower filter only deselects the visible items. */
export function clearAll(state: SelectionState): void {
  if (isFullFilter(state)) {
    state.selected.clear();
    return;
  }
  for (const index of state.filtered) state.selected.delete(index);
}

export function enterSearchMode(state: SelectionState): void {
  state.search.active = true;
}

export function exitSearchMode(state: SelectionState): void {
  state.search.active = false;
}

export function pushSearchChar(state: SelectionState, ch: string): void {
  setQuery(state, state.search.query + ch);
}

export function popSearchChar(state: SelectionState): void {
  const chars = Array.from(state.search.query);
  chars.pop();
  setQuery(state, chars.join(''));
}

export function clearSearch(state: SelectionState): void {
  if (state.search.query !== '') setQuery(state, '');
  state.search.active = false;
}

/** Selected items in canonical order. */
export function finishSelection(state: SelectionState): string[] {
  return [...state.selected]
    .sort((a, b) => a - b)
    .flatMap((index) => {
      const item = state.items[index];
      return item === undefined ? [] : [item];
    });
}
