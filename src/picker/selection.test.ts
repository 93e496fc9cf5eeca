import { describe, it, expect } from 'vitest';
import { SelectionModel } from './selection.ts';
import { createHostRecord } from '../ssh-config/host.ts';
import { NoSelectionError } from '../ssh-config/errors.ts';

function model(...ids: string[]): SelectionModel {
  return new SelectionModel(ids.map((id) => createHostRecord(id)));
}

describe('SelectionModel', () => {
  it('starts with no selection', () => {
    const m = model('a', 'b');
    expect(m.selected).toBeNull();
    expect(m.selectedHost).toBeNull();
  });

  describe('next', () => {
    it('selects the first entry when nothing is selected', () => {
      const m = model('a', 'b', 'c');
      m.next();
      expect(m.selected).toBe(0);
    });

    it('advances and stops at the last entry without wrapping', () => {
      const m = model('a', 'b', 'c');
      for (let i = 0; i < 10; i++) m.next();
      expect(m.selected).toBe(2);
      m.next();
      expect(m.selected).toBe(2);
    });
  });

  describe('previous', () => {
    it('moves back and stops at the first entry', () => {
      const m = model('a', 'b', 'c');
      m.last();
      for (let i = 0; i < 10; i++) m.previous();
      expect(m.selected).toBe(0);
    });

    it('selects the last entry when nothing is selected', () => {
      const m = model('a', 'b', 'c');
      m.previous();
      expect(m.selected).toBe(2);
    });
  });

  it('jumps to the first and last entries', () => {
    const m = model('a', 'b', 'c', 'd');
    m.last();
    expect(m.selected).toBe(3);
    m.first();
    expect(m.selected).toBe(0);
  });

  it('clears the selection unconditionally', () => {
    const m = model('a', 'b');
    m.clear();
    expect(m.selected).toBeNull();
    m.next();
    m.clear();
    expect(m.selected).toBeNull();
  });

  it('leaves an empty list unselected whatever the navigation', () => {
    const m = model();
    m.next();
    m.previous();
    m.first();
    m.last();
    expect(m.selected).toBeNull();
    expect(m.length).toBe(0);
  });

  describe('toggleExpand', () => {
    it('flips the selected host and back again', () => {
      const m = model('a', 'b');
      m.next();
      m.next();
      m.toggleExpand();
      expect(m.hosts[1].expanded).toBe(true);
      expect(m.hosts[0].expanded).toBe(false);
      m.toggleExpand();
      expect(m.hosts[1].expanded).toBe(false);
    });

    it('does nothing without a selection', () => {
      const m = model('a');
      m.toggleExpand();
      expect(m.hosts[0].expanded).toBe(false);
    });

    it('keeps the expanded flag when the cursor moves away', () => {
      const m = model('a', 'b');
      m.first();
      m.toggleExpand();
      m.next();
      expect(m.hosts[0].expanded).toBe(true);
    });
  });

  describe('confirm', () => {
    it('returns the identifier under the cursor', () => {
      const m = model('alpha', 'beta');
      m.last();
      expect(m.confirm()).toBe('beta');
    });

    it('throws NoSelectionError without a cursor', () => {
      const m = model('alpha');
      expect(() => m.confirm()).toThrow(NoSelectionError);
      expect(() => m.confirm()).toThrow('No ssh config selected!');
    });
  });
});
