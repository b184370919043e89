/**
 * Source of time for animations. `nextFrame` resolves once per rendered
 * frame; `delay` resolves after at least `ms` milliseconds. Both reject with
 * the signal's reason when it aborts.
 */
export interface FrameTicker {
  now(): number;
  nextFrame(signal?: AbortSignal): Promise<void>;
  delay(ms: number, signal?: AbortSignal): Promise<void>;
}

const FRAME_MS = 16;

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timeout);
      reject(signal?.reason);
    };

    const timeout = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export const timerTicker: FrameTicker = {
  now: () => Date.now(),
  nextFrame: (signal) => sleep(FRAME_MS, signal),
  delay: (ms, signal) => sleep(Math.max(0, ms), signal),
};

export type ManualTickerOptions = {
  frameMs?: number;
  /**
   * When true every wait completes on the next microtask and the clock jumps
   * forward to its due time. When false waits stay pending until `tick()`.
   */
  auto?: boolean;
};

export type ManualTicker = FrameTicker & {
  readonly frameMs: number;
  /** Advances the clock by `frames` frames, settling due waits after each. */
  tick(frames?: number): Promise<void>;
  pendingCount(): number;
};

type Waiter = {
  due: number;
  resolve: () => void;
  signal?: AbortSignal;
  onAbort?: () => void;
};

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

/**
 * Virtual clock for headless hosts and tests.
 */
export function createManualTicker(
  options: ManualTickerOptions = {}
): ManualTicker {
  const frameMs = options.frameMs ?? FRAME_MS;
  const auto = options.auto ?? false;
  let time = 0;
  let waiters: Waiter[] = [];

  const waitUntil = async (due: number, signal?: AbortSignal) => {
    signal?.throwIfAborted();

    if (auto) {
      await Promise.resolve();
      signal?.throwIfAborted();
      time = Math.max(time, due);
      return;
    }

    await new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { due, resolve, signal };
      if (signal) {
        waiter.onAbort = () => {
          waiters = waiters.filter((w) => w !== waiter);
          reject(signal.reason);
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }
      waiters.push(waiter);
    });
  };

  return {
    frameMs,
    now: () => time,
    nextFrame: (signal) => waitUntil(time + frameMs, signal),
    delay: (ms, signal) => waitUntil(time + Math.max(0, ms), signal),
    pendingCount: () => waiters.length,
    async tick(frames = 1) {
      for (let i = 0; i < frames; i++) {
        time += frameMs;
        const due = waiters.filter((w) => w.due <= time);
        waiters = waiters.filter((w) => w.due > time);
        for (const waiter of due) {
          if (waiter.signal && waiter.onAbort) {
            waiter.signal.removeEventListener('abort', waiter.onAbort);
          }
          waiter.resolve();
        }
        await flush();
      }
    },
  };
}
