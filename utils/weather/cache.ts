/**
 * Same-day memo of rendered forecast reports, keyed by city and calendar day.
 *
 * The key ignores the requested date range: a second request for
 * the same city on the same day gets the first report back. Entries for past
 * days stay until `evictStale` or `clear` is called, so the size is bounded by
 * the number of distinct cities requested since the last rotation.
 */
export class WeatherCache {
  private readonly entries = new Map<string, string>();

  static keyFor(city: string, day: string): string {
    return `${city.toLowerCase()}-${day}`;
  }

  get(key: string): string | undefined {
    return this.entries.get(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  put(key: string, value: string): void {
    this.entries.set(key, value);
  }

  /** Drops every entry whose key was not made for `day`. Returns how many were removed. */
  evictStale(day: string): number {
    let removed = 0;
    for (const key of this.entries.keys()) {
      if (!key.endsWith(`-${day}`)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
