/**
 * Run tasks with at most `concurrency` in flight. After the first failure no
 * new task starts; in-flight tasks are awaited, then the first error is
 * rethrown. Results keep task order.
 */
export async function runWithConcurrency<T>(
  tasks: ReadonlyArray<() => Promise<T>>,
  concurrency: number
): Promise<T[]> {
  const safeConcurrency = Math.max(1, Math.floor(concurrency));
  const results: T[] = new Array(tasks.length);
  let nextIndex = 0;
  let failed = false;
  let firstError: unknown;

  async function worker(): Promise<void> {
    while (!failed && nextIndex < tasks.length) {
      const current = nextIndex;
      nextIndex += 1;
      try {
        results[current] = await tasks[current]();
      } catch (error) {
        if (!failed) {
          failed = true;
          firstError = error;
        }
      }
    }
  }

  const workers = Array.from({ length: Math.min(safeConcurrency, tasks.length) }, () => worker());
  await Promise.all(workers);
  if (failed) {
    throw firstError;
  }
  return results;
}
