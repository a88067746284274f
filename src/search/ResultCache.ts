const renderBigInt = (_key: string, value: unknown): unknown =>
  typeof value === 'bigint' ? `${value.toString()}n` : value;

/**
 * Default canonical key: the JSON rendering of the state. Two states with the
 * same content but a different property order render differently and are
 * cached separately. States JSON cannot render (circular ones) fall back to
 * `String(state)`.
 */
export function defaultStateKey(state: unknown): string {
  let rendered: string | undefined;
  try {
    rendered = JSON.stringify(state, renderBigInt);
  } catch {
    return String(state);
  }
  return rendered === undefined ? String(state) : rendered;
}

/**
 * Scores memoized by canonical state key for the lifetime of one search run.
 */
export class ResultCache {
  private readonly entries = new Map<string, number>();

  get(key: string): number | undefined {
    return this.entries.get(key);
  }

  put(key: string, score: number): void {
    this.entries.set(key, score);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }
}
