export type KeyAction =
  | 'next'
  | 'previous'
  | 'pageDown'
  | 'pageUp'
  | 'goToFirst'
  | 'goToLast'
  | 'enter'
  | 'goUp'
  | 'refresh'
  | 'sortBySize'
  | 'sortByModifiedTime'
  | 'sortByItemCount'
  | 'toggleHelp'
  | 'closeHelp'
  | 'quit';

/** The key flags the bindings look at. Ink's `Key` satisfies this shape. */
export interface KeyPress {
  upArrow: boolean;
  downArrow: boolean;
  leftArrow: boolean;
  rightArrow: boolean;
  pageUp: boolean;
  pageDown: boolean;
  return: boolean;
  escape: boolean;
  ctrl: boolean;
  backspace: boolean;
  delete: boolean;
  home?: boolean;
  end?: boolean;
}

export const NO_KEY: KeyPress = {
  upArrow: false,
  downArrow: false,
  leftArrow: false,
  rightArrow: false,
  pageUp: false,
  pageDown: false,
  return: false,
  escape: false,
  ctrl: false,
  backspace: false,
  delete: false
};

// Terminals that are not reported as home/end arrive as raw sequences with the ESC stripped.
const HOME_SEQUENCES = new Set(['[H', 'OH', '[1~', '[7~']);
const END_SEQUENCES = new Set(['[F', 'OF', '[4~', '[8~']);

const CHARACTER_ACTIONS = new Map<string, KeyAction>([
  ['j', 'next'],
  ['k', 'previous'],
  ['H', 'goToFirst'],
  ['G', 'goToLast'],
  ['l', 'enter'],
  ['o', 'enter'],
  ['h', 'goUp'],
  ['u', 'goUp'],
  ['r', 'refresh'],
  ['s', 'sortBySize'],
  ['m', 'sortByModifiedTime'],
  ['c', 'sortByItemCount']
]);

/**
 * Maps a key press to an action. While the help overlay is shown, every key
 * other than `?` just closes it.
 */
export function resolveKeyAction(input: string, key: KeyPress, helpVisible: boolean): KeyAction | null {
  if (helpVisible) {
    return input === '?' ? 'toggleHelp' : 'closeHelp';
  }

  if (key.escape || input === 'q') return 'quit';
  if (input === '?') return 'toggleHelp';

  if (key.ctrl) {
    if (input === 'd') return 'pageDown';
    if (input === 'u') return 'pageUp';
    return null;
  }

  if (key.downArrow) return 'next';
  if (key.upArrow) return 'previous';
  if (key.pageDown) return 'pageDown';
  if (key.pageUp) return 'pageUp';
  if (key.home === true || HOME_SEQUENCES.has(input)) return 'goToFirst';
  if (key.end === true || END_SEQUENCES.has(input)) return 'goToLast';
  if (key.return || key.rightArrow) return 'enter';
  // Most terminals send DEL for Backspace, which Ink reports as `delete`.
  if (key.backspace || key.delete || key.leftArrow) return 'goUp';

  return CHARACTER_ACTIONS.get(input) ?? null;
}
