/**
 * Run `fn` over `items` with at most `concurrency` calls in flight.
 * Results keep the input order. A rejection from `fn` rejects the whole run,
 * so callers that need isolation catch inside `fn`.
 */
export async function withConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const workers: Promise<void>[] = [];

  for (let i = 0; i < Math.min(Math.max(1, concurrency), items.length); i++) {
    workers.push(
      (async () => {
        while (next < items.length) {
          const index = next++;
          results[index] = await fn(items[index], index);
        }
      })(),
    );
  }

  await Promise.all(workers);
  return results;
}

/**
 * Per-key exclusion tokens. `tryAcquire` never waits: a held key reports false.
 */
export class KeyedLocks<K> {
  private readonly held = new Set<K>();

  tryAcquire(key: K): boolean {
    if (this.held.has(key)) return false;
    this.held.add(key);
    return true;
  }

  release(key: K): void {
    this.held.delete(key);
  }

  isHeld(key: K): boolean {
    return this.held.has(key);
  }
}
