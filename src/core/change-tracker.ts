/**
 * Change Tracker
 *
 * Two offset sets: `dirty` holds offsets edited since the last commit,
 * `committed` holds offsets edited before it. Offsets only leave a set
 * through a bulk clear or a commit.
 */

export class ChangeTracker {
  private dirty: Set<number> = new Set();
  private committed: Set<number> = new Set();

  /**
   * Record an edited offset.
   */
  markDirty(offset: number): void {
    this.dirty.add(offset);
  }

  /**
   * Record a run of edited offsets.
   */
  markDirtyRange(start: number, count: number): void {
    for (let offset = start; offset < start + count; offset++) {
      this.dirty.add(offset);
    }
  }

  /**
   * Move every dirty offset into the committed set.
   */
  commit(): void {
    if (this.dirty.size === 0) return;
    for (const offset of this.dirty) {
      this.committed.add(offset);
    }
    this.dirty.clear();
  }

  clearDirty(): void {
    this.dirty.clear();
  }

  clearCommitted(): void {
    this.committed.clear();
  }

  /**
   * Replace the dirty set, e.g. with offsets carried by a new store.
   */
  replaceDirty(offsets: Iterable<number>): void {
    this.dirty = new Set(offsets);
  }

  isDirty(offset: number): boolean {
    return this.dirty.has(offset);
  }

  isCommitted(offset: number): boolean {
    return this.committed.has(offset);
  }

  getDirty(): ReadonlySet<number> {
    return this.dirty;
  }

  getCommitted(): ReadonlySet<number> {
    return this.committed;
  }

  /**
   * Union of both sets, ascending.
   */
  allChanged(): number[] {
    const all = new Set([...this.committed, ...this.dirty]);
    return [...all].sort((a, b) => a - b);
  }
}
