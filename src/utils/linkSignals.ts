export type LinkedSignal = {
  signal: AbortSignal;
  controller: AbortController;
  /** Detaches from the source signals. */
  dispose: () => void;
};

/**
 * A signal that aborts as soon as any source aborts, with that source's
 * reason.
 */
export function linkSignals(
  ...sources: (AbortSignal | undefined)[]
): LinkedSignal {
  const controller = new AbortController();
  const cleanups: (() => void)[] = [];

  for (const source of sources) {
    if (!source) continue;
    if (source.aborted) {
      controller.abort(source.reason);
      break;
    }
    const onAbort = () => controller.abort(source.reason);
    source.addEventListener('abort', onAbort, { once: true });
    cleanups.push(() => source.removeEventListener('abort', onAbort));
  }

  return {
    signal: controller.signal,
    controller,
    dispose: () => {
      for (const cleanup of cleanups.splice(0)) cleanup();
    },
  };
}
