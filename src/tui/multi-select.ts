import { dispatchKey } from './key-policy.js';
import { DEFAULT_LABELS, renderSelection, type PickerLabels } from './render.js';
import { createTerminalDevice, type TerminalDevice, type Unsubscribe } from './screen.js';
import {
  createSelectionState,
  ensureVisible,
  finishSelection,
  invalidateLayout,
  type SelectionState,
} from './selection-state.js';
import { withTerminalSession, type ProcessHooks, type TerminalSession } from './terminal-session.js';
import type { Theme } from './theme.js';

export type SelectionOutcome =
  | { kind: 'confirmed'; selected: string[] }
  | { kind: 'cancelled' };

export interface MultiSelectOptions {
  items: readonly string[];
  /** Items to pre-check. Strings that are not in `items` are ignored. */
  previousSelection?: readonly string[];
  theme: Theme;
  labels?: PickerLabels;
  device?: TerminalDevice;
  process?: ProcessHooks;
}

/**
 * Full-screen multi-select over `items`. Resolves once the user confirms or cancels; the terminal
 * is restored before the promise settles, on success and on failure.
 */
export async function selectItems(options: MultiSelectOptions): Promise<SelectionOutcome> {
  if (options.items.length === 0) {
    return { kind: 'confirmed', selected: [] };
  }

  const device = options.device ?? createTerminalDevice();
  return withTerminalSession(
    device,
    (session) => runSelectionLoop(session, device, options),
    options.process
  );
}

function runSelectionLoop(
  session: TerminalSession,
  device: TerminalDevice,
  options: MultiSelectOptions
): Promise<SelectionOutcome> {
  const labels = options.labels ?? DEFAULT_LABELS;
  const state: SelectionState = createSelectionState(options.items, {
    previousSelection: options.previousSelection,
    readSize: () => device.size(),
  });

  return new Promise<SelectionOutcome>((resolve, reject) => {
    const disposers: Unsubscribe[] = [];
    let settled = false;

    const settle = (finish: () => void): void => {
      if (settled) return;
      settled = true;
      for (const dispose of disposers.splice(0)) dispose();
      finish();
    };

    const paint = (): void => {
      ensureVisible(state);
      renderSelection(state, session.screen, options.theme, labels);
      const failure = session.failure;
      if (failure) settle(() => reject(failure));
    };

    const guarded = (step: () => void): void => {
      try {
        step();
      } catch (error) {
        settle(() => reject(error));
      }
    };

    disposers.push(
      device.onKey((key) =>
        guarded(() => {
          const outcome = dispatchKey(state, key);
          if (outcome === 'cancel') {
            settle(() => resolve({ kind: 'cancelled' }));
            return;
          }
          if (outcome === 'confirm') {
            const selected = finishSelection(state);
            settle(() => resolve({ kind: 'confirmed', selected }));
            return;
          }
          paint();
        })
      )
    );

    disposers.push(
      device.onResize(() =>
        guarded(() => {
          invalidateLayout(state);
          paint();
        })
      )
    );

    guarded(paint);
  });
}
