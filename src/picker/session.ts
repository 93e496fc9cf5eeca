/**
 * Session state machine: Browsing until a confirm or quit.
 *
 * Each turn renders, waits for exactly one key, and applies at most one
 * action. Unbound keys change nothing and the loop renders again.
 */

import type { SelectionModel } from './selection.ts';
import { resolveAction, type KeyEvent, type PickerAction } from './keymap.ts';
import { NoSelectionError } from '../ssh-config/errors.ts';

export type SessionOutcome =
  | { status: 'confirmed'; hostId: string }
  | { status: 'aborted'; reason: 'quit' | 'interrupt' }
  | { status: 'no-selection' };

/** Blocking source of key events, one per call. */
export interface KeySource {
  next(): Promise<KeyEvent>;
}

export interface PickerSessionOptions {
  model: SelectionModel;
  keys: KeySource;
  render: (model: SelectionModel) => void;
}

/**
 * Apply one action to the model. Returns the terminal outcome for
 * confirm, quit and interrupt; null when browsing continues.
 */
export function applyAction(model: SelectionModel, action: PickerAction): SessionOutcome | null {
  switch (action) {
    case 'quit':
      return { status: 'aborted', reason: 'quit' };
    case 'interrupt':
      return { status: 'aborted', reason: 'interrupt' };
    case 'clear':
      model.clear();
      return null;
    case 'next':
      model.next();
      return null;
    case 'previous':
      model.previous();
      return null;
    case 'first':
      model.first();
      return null;
    case 'last':
      model.last();
      return null;
    case 'toggle-expand':
      model.toggleExpand();
      return null;
    case 'confirm':
      try {
        return { status: 'confirmed', hostId: model.confirm() };
      } catch (err) {
        if (err instanceof NoSelectionError) {
          return { status: 'no-selection' };
        }
        throw err;
      }
  }
}

export async function runPickerSession({ model, keys, render }: PickerSessionOptions): Promise<SessionOutcome> {
  for (;;) {
    render(model);
    const action = resolveAction(await keys.next());
    if (!action) continue;

    const outcome = applyAction(model, action);
    if (outcome) return outcome;
  }
}
