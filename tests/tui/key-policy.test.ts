import { describe, expect, it } from 'vitest';
import { dispatchKey, isReservedHotkey, resolveCommand } from '../../src/tui/key-policy.js';
import type { KeyPress } from '../../src/tui/key-utils.js';
import { createSelectionState, finishSelection, type SelectionState } from '../../src/tui/selection-state.js';

const char = (name: string): KeyPress => ({ name, isCharacter: true });
const special = (name: string): KeyPress => ({ name, isCharacter: false });

function createState(items: readonly string[], previousSelection: readonly string[] = []): SelectionState {
  return createSelectionState(items, {
    previousSelection,
    measure: (text) => text.length,
    readSize: () => ({ width: 40, height: 10 }),
  });
}

function press(state: SelectionState, ...keys: KeyPress[]): string[] {
  return keys.map((key) => dispatchKey(state, key));
}

describe('search routing', () => {
  it('starts a search when a non-hotkey letter is typed', () => {
    const state = createState(['go', 'node', 'rust']);
    expect(dispatchKey(state, char('g'))).toBe('continue');
    expect(state.search).toEqual({ active: true, query: 'g' });
    expect(state.filtered).toEqual([0]);
  });

  it('stays in search on the first backspace and leaves on the second', () => {
    const state = createState(['go', 'node', 'rust']);
    press(state, char('g'), special('BACKSPACE'));
    expect(state.search).toEqual({ active: true, query: '' });

    expect(dispatchKey(state, special('BACKSPACE'))).toBe('continue');
    expect(state.search).toEqual({ active: false, query: '' });
  });

  it('leaves selection and cursor alone when backspace exits the search', () => {
    const state = createState(['go', 'node', 'rust'], ['node']);
    press(state, special('RIGHT'), char('/'), special('BACKSPACE'));
    expect(state.search.active).toBe(false);
    expect(state.cursor).toBe(1);
    expect(finishSelection(state)).toEqual(['node']);
  });

  it('replaces the previous query on an implicit search start', () => {
    const state = createState(['go', 'node', 'rust']);
    press(state, char('r'), special('ENTER'), char('n'));
    expect(state.search).toEqual({ active: true, query: 'n' });
  });

  it('keeps the query when the search key reopens the search', () => {
    const state = createState(['go', 'node', 'rust']);
    press(state, char('n'), char('o'), special('ENTER'));
    expect(state.search).toEqual({ active: false, query: 'no' });

    press(state, char('/'));
    expect(state.search).toEqual({ active: true, query: 'no' });
  });

  it('treats Enter while searching as leaving the search, not confirming', () => {
    const state = createState(['go', 'node']);
    expect(press(state, char('g'), special('ENTER'))).toEqual(['continue', 'continue']);
    expect(state.search).toEqual({ active: false, query: 'g' });
    expect(dispatchKey(state, special('ENTER'))).toBe('confirm');
  });

  it('clears the query on Escape or Delete and keeps the session going', () => {
    const state = createState(['go', 'node']);
    expect(press(state, char('g'), special('ESCAPE'))).toEqual(['continue', 'continue']);
    expect(state.search).toEqual({ active: false, query: '' });
    expect(state.filtered).toEqual([0, 1]);

    press(state, char('n'), special('DELETE'));
    expect(state.search).toEqual({ active: false, query: '' });
  });

  it('types hotkeys and space as text while searching', () => {
    const state = createState(['a q', 'b']);
    press(state, char('/'), char('a'), char(' '), char('q'), char('j'));
    expect(state.search.query).toBe('a qj');
    expect(state.selected.size).toBe(0);
  });

  it('ignores keys that are neither text nor commands', () => {
    const state = createState(['go', 'node']);
    expect(press(state, char('/'), special('F1'), special('UP'))).toEqual(['continue', 'continue', 'continue']);
    expect(state.search).toEqual({ active: true, query: '' });
  });

  it('cancels on Ctrl+C even while searching', () => {
    const state = createState(['go']);
    expect(press(state, char('g'), special('CTRL_C'))).toEqual(['continue', 'cancel']);
  });
});

describe('navigation keys', () => {
  it('uses hjkl and space as commands while navigating', () => {
    // 40 columns, width-4 names: 4 columns of 8.
    const state = createState(['aaaa', 'bbbb', 'cccc', 'dddd', 'eeee', 'ffff']);
    press(state, char('l'), char('j'));
    expect(state.cursor).toBe(5);
    press(state, char('k'), char('h'), char(' '));
    expect(state.cursor).toBe(0);
    expect(finishSelection(state)).toEqual(['aaaa']);
    expect(state.search.active).toBe(false);
  });

  it('selects and clears everything with Ctrl+A and Ctrl+U', () => {
    const state = createState(['A', 'B', 'C']);
    press(state, special('CTRL_A'));
    expect(finishSelection(state)).toEqual(['A', 'B', 'C']);
    press(state, special('CTRL_U'));
    expect(finishSelection(state)).toEqual([]);
  });

  it('cancels with Escape or q and confirms with Enter', () => {
    const state = createState(['A']);
    expect(dispatchKey(state, special('ESCAPE'))).toBe('cancel');
    expect(dispatchKey(state, char('q'))).toBe('cancel');
    expect(dispatchKey(state, special('ENTER'))).toBe('confirm');
  });
});

describe('resolveCommand', () => {
  it('maps terminal key names to commands', () => {
    expect(resolveCommand(special('UP'))).toBe('up');
    expect(resolveCommand(special('DOWN'))).toBe('down');
    expect(resolveCommand(special('LEFT'))).toBe('left');
    expect(resolveCommand(special('RIGHT'))).toBe('right');
    expect(resolveCommand(special('PAGE_UP'))).toBe('pageUp');
    expect(resolveCommand(special('PAGE_DOWN'))).toBe('pageDown');
    expect(resolveCommand(special('HOME'))).toBe('home');
    expect(resolveCommand(special('END'))).toBe('end');
    expect(resolveCommand(char('　'))).toBe('toggle');
    expect(resolveCommand(special('TAB'))).toBeNull();
  });
});

describe('isReservedHotkey', () => {
  it('reserves the toggle, direction and quit keys', () => {
    for (const name of ['q', 'h', 'j', 'k', 'l', ' ']) {
      expect(isReservedHotkey(name)).toBe(true);
    }
    expect(isReservedHotkey('g')).toBe(false);
    expect(isReservedHotkey('Q')).toBe(false);
  });
});
