/**
 * Copy-on-write view over a Map
 *
 * Writes land in a private layer until commit; dropping the overlay discards
 * them. Values are treated as immutable, so readers never see a half-applied
 * update.
 */
export class OverlayMap<K, V> {
  private readonly writes = new Map<K, V>();

  constructor(private readonly base: Map<K, V>) {}

  get(key: K): V | undefined {
    return this.writes.has(key) ? this.writes.get(key) : this.base.get(key);
  }

  set(key: K, value: V): void {
    this.writes.set(key, value);
  }

  get dirty(): boolean {
    return this.writes.size > 0;
  }

  commit(): void {
    for (const [key, value] of this.writes) {
      this.base.set(key, value);
    }
    this.writes.clear();
  }
}
