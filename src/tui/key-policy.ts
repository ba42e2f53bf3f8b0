import { isToggleKeyName, isTypableKey, type KeyPress } from './key-utils.js';
import {
  clearAll,
  clearSearch,
  enterSearchMode,
  exitSearchMode,
  moveDown,
  moveEnd,
  moveHome,
  moveLeft,
  moveRight,
  moveUp,
  pageDown,
  pageUp,
  popSearchChar,
  pushSearchChar,
  selectAll,
  setQuery,
  toggleCurrent,
  type SelectionState,
} from './selection-state.js';

export type PickerCommand =
  | 'cancel'
  | 'confirm'
  | 'toggle'
  | 'up'
  | 'down'
  | 'left'
  | 'right'
  | 'pageUp'
  | 'pageDown'
  | 'home'
  | 'end'
  | 'selectAll'
  | 'clearAll';

export type KeyOutcome = 'continue' | 'confirm' | 'cancel';

export const SEARCH_KEY = '/';

/** Letters that act as commands while navigating instead of starting a search. */
const RESERVED_HOTKEYS = new Set(['q', 'h', 'j', 'k', 'l']);

export function isReservedHotkey(name: string): boolean {
  return RESERVED_HOTKEYS.has(name) || isToggleKeyName(name);
}

/**
 * Routes a key through the search field. Returns true when the key was consumed as text entry
 * (or as a search-mode transition) and must not be treated as a command.
 */
export function handleSearchKey(state: SelectionState, key: KeyPress): boolean {
  if (state.search.active) {
    switch (key.name) {
      case 'ESCAPE':
      case 'DELETE':
        clearSearch(state);
        return true;
      case 'BACKSPACE':
        if (state.search.query === '') exitSearchMode(state);
        else popSearchChar(state);
        return true;
      case 'ENTER':
        exitSearchMode(state);
        return true;
      default:
        break;
    }
    if (isTypableKey(key)) {
      pushSearchChar(state, key.name);
      return true;
    }
    return false;
  }

  if (key.name === SEARCH_KEY && key.isCharacter) {
    enterSearchMode(state);
    return true;
  }
  if (isTypableKey(key) && !isReservedHotkey(key.name)) {
    enterSearchMode(state);
    setQuery(state, key.name);
    return true;
  }
  return false;
}

export function resolveCommand(key: KeyPress): PickerCommand | null {
  if (isToggleKeyName(key.name)) return 'toggle';
  switch (key.name) {
    case 'ESCAPE':
    case 'q':
    case 'CTRL_C':
      return 'cancel';
    case 'ENTER':
      return 'confirm';
    case 'UP':
    case 'k':
      return 'up';
    case 'DOWN':
    case 'j':
      return 'down';
    case 'LEFT':
    case 'h':
      return 'left';
    case 'RIGHT':
    case 'l':
      return 'right';
    case 'PAGE_UP':
      return 'pageUp';
    case 'PAGE_DOWN':
      return 'pageDown';
    case 'HOME':
      return 'home';
    case 'END':
      return 'end';
    case 'CTRL_A':
      return 'selectAll';
    case 'CTRL_U':
      return 'clearAll';
    default:
      return null;
  }
}

export function applyCommand(state: SelectionState, command: PickerCommand): KeyOutcome {
  switch (command) {
    case 'cancel':
      return 'cancel';
    case 'confirm':
      return 'confirm';
    case 'toggle':
      toggleCurrent(state);
      break;
    case 'up':
      moveUp(state);
      break;
    case 'down':
      moveDown(state);
      break;
    case 'left':
      moveLeft(state);
      break;
    case 'right':
      moveRight(state);
      break;
    case 'pageUp':
      pageUp(state);
      break;
    case 'pageDown':
      pageDown(state);
      break;
    case 'home':
      moveHome(state);
      break;
    case 'end':
      moveEnd(state);
      break;
    case 'selectAll':
      selectAll(state);
      break;
    case 'clearAll':
      clearAll(state);
      break;
  }
  return 'continue';
}

export function dispatchKey(state: SelectionState, key: KeyPress): KeyOutcome {
  // Ctrl+C always leaves, even while typing a query.
  if (key.name === 'CTRL_C') return 'cancel';
  if (handleSearchKey(state, key)) return 'continue';
  const command = resolveCommand(key);
  return command ? applyCommand(state, command) : 'continue';
}
