/**
 * Per-record bookkeeping. Holds no references to the record itself.
 */
export class ChangeState {
  /** Field -> value before the first detected change, in detection order */
  readonly original = new Map<string, unknown>();
  readonly selfChanged = new Set<string>();
  readonly markers = new Set<string>();

  /**
   * Record an intercepted write. The first original of a field wins.
   */
  recordAssignment(field: string, previous: unknown): void {
    if (this.selfChanged.has(field)) return;
    this.original.set(field, previous);
    this.selfChanged.add(field);
  }

  /**
   * Record an explicitly reported change. Without `original` only the
   * changed set grows.
   */
  recordExplicit(field: string, original?: { value: unknown }): void {
    if (original && !this.original.has(field)) {
      this.original.set(field, original.value);
    }
    this.selfChanged.add(field);
  }

  hasChanged(): boolean {
    return this.selfChanged.size > 0 || this.markers.size > 0;
  }

  // Returns false when the marker was already present
  mark(marker: string): boolean {
    if (this.markers.has(marker)) return false;
    this.markers.add(marker);
    return true;
  }

  unmark(marker: string): boolean {
    return this.markers.delete(marker);
  }

  reset(): void {
    this.original.clear();
    this.selfChanged.clear();
    this.markers.clear();
  }
}
