export type TransitionTask = (signal: AbortSignal) => Promise<void>;

/**
 * Starts every task at once and waits for all of them. The first failure
 * aborts the others through their shared signal and is rethrown once every
 * task has settled.
 */
export async function playTogether(
  tasks: readonly TransitionTask[],
  signal?: AbortSignal
): Promise<void> {
  const controller = new AbortController();
  const onAbort = () => controller.abort(signal?.reason);

  if (signal?.aborted) {
    onAbort();
  } else {
    signal?.addEventListener('abort', onAbort, { once: true });
  }

  const failures: unknown[] = [];
  try {
    await Promise.all(
      tasks.map(async (task) => {
        try {
          await task(controller.signal);
        } catch (error) {
          if (failures.length === 0) {
            controller.abort(error);
          }
          failures.push(error);
        }
      })
    );
  } finally {
    signal?.removeEventListener('abort', onAbort);
  }

  if (failures.length > 0) {
    throw failures[0];
  }
}
