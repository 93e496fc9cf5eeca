/**
 * Cursor and expand/collapse state over a fixed, ordered host list.
 *
 * The host list never changes after construction. The cursor is either
 * null or a valid index into it; navigation clamps and never wraps.
 */

import type { HostRecord } from '../ssh-config/host.ts';
import { NoSelectionError } from '../ssh-config/errors.ts';

export class SelectionModel {
  private cursor: number | null = null;

  constructor(private readonly records: readonly HostRecord[]) {}

  get hosts(): readonly HostRecord[] {
    return this.records;
  }

  get selected(): number | null {
    return this.cursor;
  }

  get selectedHost(): HostRecord | null {
    return this.cursor === null ? null : this.records[this.cursor];
  }

  get length(): number {
    return this.records.length;
  }

  next(): void {
    if (this.records.length === 0) return;
    this.cursor = this.cursor === null ? 0 : Math.min(this.cursor + 1, this.records.length - 1);
  }

  /** With no cursor, selects the last entry. */
  previous(): void {
    if (this.records.length === 0) return;
    this.cursor = this.cursor === null ? this.records.length - 1 : Math.max(this.cursor - 1, 0);
  }

  first(): void {
    if (this.records.length === 0) return;
    this.cursor = 0;
  }

  last(): void {
    if (this.records.length === 0) return;
    this.cursor = this.records.length - 1;
  }

  clear(): void {
    this.cursor = null;
  }

  toggleExpand(): void {
    const host = this.selectedHost;
    if (host) {
      host.expanded = !host.expanded;
    }
  }

  /**
   * Identifier of the host under the cursor.
   * @throws NoSelectionError when nothing is selected
   */
  confirm(): string {
    const host = this.selectedHost;
    if (!host) {
      throw new NoSelectionError();
    }
    return host.hostId;
  }
}
