/**
 * Raw terminal input decoding and the picker's fixed key table.
 *
 * Terminals in raw mode deliver key presses only, so there are no
 * release or repeat events to filter out here.
 */

export type NamedKey = 'up' | 'down' | 'left' | 'right' | 'home' | 'end' | 'enter' | 'escape' | 'ctrl-c';

export type KeyEvent =
  | { kind: 'named'; name: NamedKey }
  | { kind: 'char'; char: string }
  | { kind: 'unknown'; sequence: string };

export type PickerAction =
  | 'quit'
  | 'interrupt'
  | 'clear'
  | 'next'
  | 'previous'
  | 'first'
  | 'last'
  | 'toggle-expand'
  | 'confirm';

const ESC = '\x1b';

/** CSI and SS3 sequences, keyed by everything after ESC. */
const ESCAPE_SEQUENCES: Record<string, NamedKey> = {
  '[A': 'up',
  '[B': 'down',
  '[C': 'right',
  '[D': 'left',
  OA: 'up',
  OB: 'down',
  OC: 'right',
  OD: 'left',
  '[H': 'home',
  '[F': 'end',
  OH: 'home',
  OF: 'end',
  '[1~': 'home',
  '[7~': 'home',
  '[4~': 'end',
  '[8~': 'end',
};

const CONTROL_KEYS: Record<string, NamedKey> = {
  '\r': 'enter',
  '\x03': 'ctrl-c',
};

const NAMED_BINDINGS: Partial<Record<NamedKey, PickerAction>> = {
  escape: 'quit',
  'ctrl-c': 'interrupt',
  left: 'clear',
  down: 'next',
  up: 'previous',
  home: 'first',
  end: 'last',
  right: 'toggle-expand',
  enter: 'confirm',
};

const CHAR_BINDINGS: Record<string, PickerAction> = {
  q: 'quit',
  h: 'clear',
  j: 'next',
  k: 'previous',
  g: 'first',
  G: 'last',
  l: 'toggle-expand',
};

interface DecodedKey {
  key: KeyEvent;
  length: number;
}

/** CSI: parameter bytes, then one final byte in 0x40-0x7e. */
function readControlSequence(data: string, start: number): DecodedKey | null {
  let i = start + 2;
  while (i < data.length && /[0-9;]/.test(data[i])) i++;
  if (i >= data.length) return null;

  const code = data.charCodeAt(i);
  const end = code >= 0x40 && code <= 0x7e ? i + 1 : i;
  const sequence = data.slice(start, end);
  const name = ESCAPE_SEQUENCES[sequence.slice(1)];
  return {
    key: name ? { kind: 'named', name } : { kind: 'unknown', sequence },
    length: end - start,
  };
}

/**
 * Decode the key starting at `start`. Returns null when the data ends in
 * the middle of an escape sequence.
 *
 * ESC in front of anything other than a CSI or SS3 introducer is the Alt
 * modifier: Alt+j reads as `j` and Alt+Left as Left.
 */
function readKey(data: string, start: number): DecodedKey | null {
  if (data[start] === ESC) {
    const introducer = data[start + 1];
    if (introducer === undefined) return null;
    if (introducer === '[') return readControlSequence(data, start);
    if (introducer === 'O') {
      if (start + 2 >= data.length) return null;
      const sequence = data.slice(start, start + 3);
      const name = ESCAPE_SEQUENCES[sequence.slice(1)];
      return { key: name ? { kind: 'named', name } : { kind: 'unknown', sequence }, length: 3 };
    }
    const modified = readKey(data, start + 1);
    return modified && { key: modified.key, length: modified.length + 1 };
  }

  const codePoint = data.codePointAt(start) ?? 0;
  const char = String.fromCodePoint(codePoint);
  const control = CONTROL_KEYS[char];
  if (control) {
    return { key: { kind: 'named', name: control }, length: char.length };
  }
  if (codePoint < 0x20 || codePoint === 0x7f) {
    return { key: { kind: 'unknown', sequence: char }, length: char.length };
  }
  return { key: { kind: 'char', char }, length: char.length };
}

export interface KeyStreamChunk {
  keys: KeyEvent[];
  /** Trailing bytes of an escape sequence that has not finished arriving. */
  pending: string;
}

/**
 * Split raw stdin data into key events, holding back an escape sequence
 * cut off at the end of the data. A chunk may carry several keys when
 * input is pasted or arrives faster than it is read.
 */
export function decodeKeyStream(data: string): KeyStreamChunk {
  const keys: KeyEvent[] = [];
  let i = 0;

  while (i < data.length) {
    const decoded = readKey(data, i);
    if (!decoded) {
      return { keys, pending: data.slice(i) };
    }
    keys.push(decoded.key);
    i += decoded.length;
  }

  return { keys, pending: '' };
}

/**
 * Split data known to be complete into key events. A trailing lone ESC is
 * the Escape key; any other cut-off sequence is unknown.
 */
export function decodeKeys(data: string): KeyEvent[] {
  const { keys, pending } = decodeKeyStream(data);
  if (pending) {
    keys.push(/^\x1b+$/.test(pending) ? { kind: 'named', name: 'escape' } : { kind: 'unknown', sequence: pending });
  }
  return keys;
}

/** Look a key up in the key table. Unbound keys resolve to null. */
export function resolveAction(key: KeyEvent): PickerAction | null {
  switch (key.kind) {
    case 'named':
      return NAMED_BINDINGS[key.name] ?? null;
    case 'char':
      return CHAR_BINDINGS[key.char] ?? null;
    case 'unknown':
      return null;
  }
}
