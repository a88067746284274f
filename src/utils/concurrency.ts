/**
 * Runs `worker` over `items` with at most `maxConcurrency` calls in flight.
 * Output order matches input order. The first rejection rejects the whole
 * call once every in-flight worker has settled.
 */
export async function mapWithConcurrency<TInput, TOutput>(
  items: readonly TInput[],
  maxConcurrency: number,
  worker: (item: TInput, index: number) => Promise<TOutput>
): Promise<TOutput[]> {
  if (items.length === 0) {
    return [];
  }
  const concurrency = Math.max(1, Math.floor(maxConcurrency));
  const output = new Array<TOutput>(items.length);
  let nextIndex = 0;
  let failed = false;

  const runners = Array.from({ length: Math.min(concurrency, items.length) }, async () => {
    while (!failed) {
      const index = nextIndex;
      nextIndex += 1;
      if (index >= items.length) {
        break;
      }
      try {
        output[index] = await worker(items[index], index);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  });

  const settled = await Promise.allSettled(runners);
  for (const result of settled) {
    if (result.status === 'rejected') {
      throw result.reason;
    }
  }
  return output;
}

export function range(count: number): number[] {
  return Array.from({ length: Math.max(0, count) }, (_, i) => i);
}
