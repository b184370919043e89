import type { Vector2, VisualSurface } from '../types';
import { timerTicker, type FrameTicker } from './FrameTicker';

export interface TransitionAnimation {
  play(surface: VisualSurface, signal?: AbortSignal): Promise<void>;
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function lerp(from: number, to: number, t: number): number {
  return from + (to - from) * t;
}

/**
 * Runs `apply(t)` once per frame with `t` rising from 0 to 1 over `duration`
 * milliseconds. The last frame always gets `t === 1`.
 */
async function runTimeline(
  ticker: FrameTicker,
  duration: number,
  apply: (t: number) => void,
  signal?: AbortSignal
): Promise<void> {
  const start = ticker.now();
  let elapsed = 0;
  while (elapsed < duration) {
    signal?.throwIfAborted();
    await ticker.nextFrame(signal);
    elapsed = ticker.now() - start;
    apply(clamp01(elapsed / duration));
  }
  apply(1);
}

export class NopTransitionAnimation implements TransitionAnimation {
  public async play(): Promise<void> {}
}

/**
 * Holds for `duration` without touching the surface. Used to line up with a
 * partner animation running on another page.
 */
export class WaitTransitionAnimation implements TransitionAnimation {
  constructor(
    private readonly duration: number,
    private readonly ticker: FrameTicker = timerTicker
  ) {}

  public async play(_surface: VisualSurface, signal?: AbortSignal) {
    signal?.throwIfAborted();
    await this.ticker.delay(this.duration, signal);
  }
}

export class FadeTransitionAnimation implements TransitionAnimation {
  private readonly from: number;
  private readonly to: number;

  constructor(
    from: number,
    to: number,
    private readonly duration: number,
    private readonly ticker: FrameTicker = timerTicker
  ) {
    this.from = clamp01(from);
    this.to = clamp01(to);
  }

  public async play(surface: VisualSurface, signal?: AbortSignal) {
    await runTimeline(
      this.ticker,
      this.duration,
      (t) => {
        surface.opacity = t >= 1 ? this.to : clamp01(lerp(this.from, this.to, t));
      },
      signal
    );
  }
}

/**
 * Moves the surface between two anchors expressed in parent-size units:
 * `{ x: -1, y: 0 }` is one parent width to the left.
 */
export class SlideTransitionAnimation implements TransitionAnimation {
  constructor(
    private readonly fromAnchor: Vector2,
    private readonly toAnchor: Vector2,
    private readonly duration: number,
    private readonly ticker: FrameTicker = timerTicker
  ) {}

  public async play(surface: VisualSurface, signal?: AbortSignal) {
    const parentSize = surface.parent?.size ?? { width: 0, height: 0 };
    const from = {
      x: parentSize.width * this.fromAnchor.x,
      y: parentSize.height * this.fromAnchor.y,
    };
    const to = {
      x: parentSize.width * this.toAnchor.x,
      y: parentSize.height * this.toAnchor.y,
    };

    await runTimeline(
      this.ticker,
      this.duration,
      (t) => {
        surface.offset =
          t >= 1
            ? { ...to }
            : { x: lerp(from.x, to.x, t), y: lerp(from.y, to.y, t) };
      },
      signal
    );
  }
}

const LEFT: Vector2 = { x: -1, y: 0 };
const RIGHT: Vector2 = { x: 1, y: 0 };
const CENTER: Vector2 = { x: 0, y: 0 };

const nop = new NopTransitionAnimation();

export const TransitionAnimations = {
  nop,
  wait: (duration: number, ticker?: FrameTicker): TransitionAnimation =>
    new WaitTransitionAnimation(duration, ticker),
  fade: (
    from: number,
    to: number,
    duration: number,
    ticker?: FrameTicker
  ): TransitionAnimation =>
    new FadeTransitionAnimation(from, to, duration, ticker),
  fadeIn: (duration: number, ticker?: FrameTicker): TransitionAnimation =>
    new FadeTransitionAnimation(0, 1, duration, ticker),
  fadeOut: (duration: number, ticker?: FrameTicker): TransitionAnimation =>
    new FadeTransitionAnimation(1, 0, duration, ticker),
  slide: (
    fromAnchor: Vector2,
    toAnchor: Vector2,
    duration: number,
    ticker?: FrameTicker
  ): TransitionAnimation =>
    new SlideTransitionAnimation(fromAnchor, toAnchor, duration, ticker),
  slideFromLeftToCenter: (duration: number, ticker?: FrameTicker) =>
    new SlideTransitionAnimation(LEFT, CENTER, duration, ticker),
  slideFromCenterToLeft: (duration: number, ticker?: FrameTicker) =>
    new SlideTransitionAnimation(CENTER, LEFT, duration, ticker),
  slideFromRightToCenter: (duration: number, ticker?: FrameTicker) =>
    new SlideTransitionAnimation(RIGHT, CENTER, duration, ticker),
  slideFromCenterToRight: (duration: number, ticker?: FrameTicker) =>
    new SlideTransitionAnimation(CENTER, RIGHT, duration, ticker),
};
