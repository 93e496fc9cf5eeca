import { describe, it, expect } from 'vitest';
import { decodeKeyStream, decodeKeys, resolveAction, type KeyEvent } from './keymap.ts';

const named = (name: string) => ({ kind: 'named', name });
const char = (c: string) => ({ kind: 'char', char: c });

describe('decodeKeys', () => {
  it('decodes printable characters one by one', () => {
    expect(decodeKeys('jkG')).toEqual([char('j'), char('k'), char('G')]);
  });

  it('decodes CSI and SS3 arrow keys', () => {
    expect(decodeKeys('\x1b[A')).toEqual([named('up')]);
    expect(decodeKeys('\x1b[B')).toEqual([named('down')]);
    expect(decodeKeys('\x1bOC')).toEqual([named('right')]);
    expect(decodeKeys('\x1bOD')).toEqual([named('left')]);
  });

  it('decodes the common Home and End encodings', () => {
    for (const seq of ['\x1b[H', '\x1bOH', '\x1b[1~', '\x1b[7~']) {
      expect(decodeKeys(seq)).toEqual([named('home')]);
    }
    for (const seq of ['\x1b[F', '\x1bOF', '\x1b[4~', '\x1b[8~']) {
      expect(decodeKeys(seq)).toEqual([named('end')]);
    }
  });

  it('tells a bare Escape apart from escape sequences', () => {
    expect(decodeKeys('\x1b')).toEqual([named('escape')]);
    expect(decodeKeys('\x1b[A\x1b')).toEqual([named('up'), named('escape')]);
  });

  it('reads Alt-modified keys as the plain key', () => {
    expect(decodeKeys('\x1bj')).toEqual([char('j')]);
    expect(decodeKeys('\x1bj').map(resolveAction)).toEqual(['next']);
    expect(decodeKeys('\x1b\x1b[D')).toEqual([named('left')]);
    expect(decodeKeys('\x1b\x1b[D').map(resolveAction)).toEqual(['clear']);
    expect(decodeKeys('\x1bx').map(resolveAction)).toEqual([null]);
  });

  it('decodes Enter and Ctrl+C', () => {
    expect(decodeKeys('\r')).toEqual([named('enter')]);
    expect(decodeKeys('\x03')).toEqual([named('ctrl-c')]);
  });

  it('leaves Ctrl+J unbound', () => {
    expect(decodeKeys('\n')).toEqual([{ kind: 'unknown', sequence: '\n' }]);
    expect(resolveAction({ kind: 'unknown', sequence: '\n' })).toBeNull();
  });

  it('splits a chunk holding several keys', () => {
    expect(decodeKeys('\x1b[B\x1b[Bj\r')).toEqual([named('down'), named('down'), char('j'), named('enter')]);
  });

  it('marks unbound sequences and control bytes as unknown', () => {
    expect(decodeKeys('\x1b[5~')).toEqual([{ kind: 'unknown', sequence: '\x1b[5~' }]);
    expect(decodeKeys('\x7f')).toEqual([{ kind: 'unknown', sequence: '\x7f' }]);
  });

  it('marks a cut-off sequence at the end of complete data as unknown', () => {
    expect(decodeKeys('\x1b[1')).toEqual([{ kind: 'unknown', sequence: '\x1b[1' }]);
  });

  it('keeps astral characters whole', () => {
    expect(decodeKeys('😀')).toEqual([char('😀')]);
  });
});

describe('decodeKeyStream', () => {
  it('holds back an escape sequence cut off at the end of a chunk', () => {
    expect(decodeKeyStream('j\x1b')).toEqual({ keys: [char('j')], pending: '\x1b' });
    expect(decodeKeyStream('\x1b[')).toEqual({ keys: [], pending: '\x1b[' });
    expect(decodeKeyStream('\x1b[1')).toEqual({ keys: [], pending: '\x1b[1' });
    expect(decodeKeyStream('\x1bO')).toEqual({ keys: [], pending: '\x1bO' });
    expect(decodeKeyStream('\x1b\x1b[')).toEqual({ keys: [], pending: '\x1b\x1b[' });
  });

  it('decodes the sequence once the rest of it arrives', () => {
    const first = decodeKeyStream('\x1b');
    expect(decodeKeyStream(first.pending + '[A')).toEqual({ keys: [named('up')], pending: '' });
  });
});

describe('resolveAction', () => {
  const cases: Array<[string, KeyEvent, string]> = [
    ['q', { kind: 'char', char: 'q' }, 'quit'],
    ['Esc', { kind: 'named', name: 'escape' }, 'quit'],
    ['Ctrl+C', { kind: 'named', name: 'ctrl-c' }, 'interrupt'],
    ['h', { kind: 'char', char: 'h' }, 'clear'],
    ['Left', { kind: 'named', name: 'left' }, 'clear'],
    ['j', { kind: 'char', char: 'j' }, 'next'],
    ['Down', { kind: 'named', name: 'down' }, 'next'],
    ['k', { kind: 'char', char: 'k' }, 'previous'],
    ['Up', { kind: 'named', name: 'up' }, 'previous'],
    ['g', { kind: 'char', char: 'g' }, 'first'],
    ['Home', { kind: 'named', name: 'home' }, 'first'],
    ['G', { kind: 'char', char: 'G' }, 'last'],
    ['End', { kind: 'named', name: 'end' }, 'last'],
    ['l', { kind: 'char', char: 'l' }, 'toggle-expand'],
    ['Right', { kind: 'named', name: 'right' }, 'toggle-expand'],
    ['Enter', { kind: 'named', name: 'enter' }, 'confirm'],
  ];

  it.each(cases)('maps %s', (_label, key, action) => {
    expect(resolveAction(key)).toBe(action);
  });

  it('ignores everything else', () => {
    expect(resolveAction({ kind: 'char', char: 'Q' })).toBeNull();
    expect(resolveAction({ kind: 'char', char: 'x' })).toBeNull();
    expect(resolveAction({ kind: 'unknown', sequence: '\x1b[5~' })).toBeNull();
  });
});
